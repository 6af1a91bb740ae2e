/**
 * Error types raised by the exporter.
 *
 * Only `ConfigurationError` is fatal, and only at start-up. The other two are
 * confined to a single target's unit of work within one collection cycle.
 */

/** A status page could not be fetched (network failure, timeout, non-2xx) */
export class TransportError extends Error {
  constructor(
    public url: string,
    message: string,
    public status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** A status field was present but could not be read as a number */
export class ProjectionError extends Error {
  constructor(
    public field: string,
    public value: string,
  ) {
    super(`Field "${field}" is not numeric: ${JSON.stringify(value)}`);
    this.name = "ProjectionError";
  }
}

/** The configuration file is missing, unreadable or invalid */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    /** One entry per offending setting, e.g. `/web-1/url: Expected string` */
    public details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}\n  ${details.join("\n  ")}` : message);
    this.name = "ConfigurationError";
  }
}
