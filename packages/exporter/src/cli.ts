import { parseArgs } from "node:util";
import { DEFAULT_CONFIG_PATH } from "./config/load.js";

export const USAGE = `Usage: modstatus-exporter [-c <path>]

Polls web server status pages and exposes them as Prometheus gauges.

Options:
  -c, --config <path>  Path to the configuration file (default: ${DEFAULT_CONFIG_PATH})
  -h, --help           Show this help`;

export interface CliArgs {
  configPath: string;
  help: boolean;
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Throws a TypeError for unknown options or a missing option value.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c", default: DEFAULT_CONFIG_PATH },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    help: values.help ?? false,
  };
}
