import type { Target } from "./target.js";

/** pino log levels accepted in the `log_level` setting */
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/** Global settings from the `config` section */
export interface ExporterSettings {
  /** Seconds between the end of one cycle and the start of the next */
  scrapeIntervalSeconds: number;
  /** Log "Updating server metrics for ..." and sleep notices */
  verbose: boolean;
  /** Default proxies applied to targets without an override */
  proxy: {
    httpProxy?: string;
    httpsProxy?: string;
  };
  /** Metrics server bind address */
  listenAddress: string;
  /** Metrics server port */
  listenPort: number;
  /** Per-request timeout for status fetches */
  timeoutMs: number;
  logLevel: LogLevel;
}

/** Fully loaded configuration file */
export interface ExporterConfig {
  settings: ExporterSettings;
  /** In file order */
  targets: Target[];
}
