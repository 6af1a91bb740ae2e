import pino, { type Logger } from "pino";
import type { ExporterSettings } from "@modstatus-exporter/shared";

const isDev = process.env.NODE_ENV !== "production";

/** Subset of the pino logger the collection code writes to */
export type ExporterLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

/**
 * Build the process logger. Handed to Fastify as its `loggerInstance`, so the
 * metrics server and the collection loop write to the same stream.
 */
export function createLogger(
  settings: Pick<ExporterSettings, "logLevel">,
): Logger {
  return pino({
    level: settings.logLevel,
    ...(isDev
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true },
          },
        }
      : {}),
  });
}
