#!/usr/bin/env node
import { buildApp } from "./app.js";
import { USAGE, parseCliArgs } from "./cli.js";
import { loadConfig } from "./config/load.js";
import { createLogger } from "./logger.js";

let configPath: string;
try {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    process.exit(0);
  }
  configPath = args.configPath;
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  console.error(USAGE);
  process.exit(1);
}

const config = await loadConfig(configPath).catch((err: unknown) => {
  // No logger yet: settings (and the log level) come from this file
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});

const logger = createLogger(config.settings);
const app = await buildApp({ config, logger });

// Close gracefully so an in-flight cycle can finish
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "Shutdown failed");
        process.exit(1);
      },
    );
  });
}

// Start
const { listenAddress: host, listenPort: port } = config.settings;

try {
  app.log.info("Starting metrics server");
  await app.listen({ port, host });
  app.log.info(`Exporter listening on ${host}:${port} (${config.targets.length} target(s))`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
