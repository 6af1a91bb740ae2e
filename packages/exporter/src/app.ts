import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import type { Logger } from "pino";
import type { ExporterConfig } from "@modstatus-exporter/shared";

import {
  CollectionScheduler,
  StatusCollector,
  StatusFetcher,
  StatusMetrics,
  type StatusSource,
} from "./collector/index.js";
import { createLogger } from "./logger.js";
import { metricsRoutes } from "./routes/metrics.js";
import { healthRoutes } from "./routes/health.js";

export interface BuildAppOptions {
  config: ExporterConfig;
  /** Shared by Fastify and the collection loop (default: built from settings) */
  logger?: Logger;
  /** Override the metric registry (for testing) */
  statusMetrics?: StatusMetrics;
  /** Override the status fetcher (for testing) */
  source?: StatusSource;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const { config } = opts;
  const { settings } = config;
  const logger = opts.logger ?? createLogger(settings);

  const loggerInstance: FastifyBaseLogger = logger;
  const app = Fastify({ loggerInstance });

  // Registry + Collector + Scheduler (decorated so routes can access them)
  const statusMetrics = opts.statusMetrics ?? new StatusMetrics();
  const fetcher = new StatusFetcher({ timeoutMs: settings.timeoutMs });
  const collector = new StatusCollector(config.targets, {
    source: opts.source ?? fetcher,
    sink: statusMetrics,
    logger,
    verbose: settings.verbose,
  });
  const scheduler = new CollectionScheduler(collector, {
    intervalMs: settings.scrapeIntervalSeconds * 1000,
    logger,
    verbose: settings.verbose,
  });
  app.decorate("statusMetrics", statusMetrics);
  app.decorate("collector", collector);
  app.decorate("scheduler", scheduler);

  // ---------------------------------------------------------------------------
  // Global error handler
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    request.log.error({ err: error }, "Request failed");
    reply.status(error.statusCode ?? 500).send({ error: "Internal server error" });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: "/metrics" });
  await app.register(healthRoutes, { prefix: "/health" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Start collecting once the server is ready
  app.addHook("onReady", async () => {
    app.log.info("Starting metrics collection loop");
    scheduler.start();
  });

  // Let an in-flight cycle finish, then release proxy connections
  app.addHook("onClose", async () => {
    await scheduler.stop();
    await fetcher.close();
  });

  return app;
}
