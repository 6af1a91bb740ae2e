import "fastify";
import type { StatusMetrics } from "../collector/status-metrics.js";
import type { StatusCollector } from "../collector/status-collector.js";
import type { CollectionScheduler } from "../collector/scheduler.js";

declare module "fastify" {
  interface FastifyInstance {
    statusMetrics: StatusMetrics;
    collector: StatusCollector;
    scheduler: CollectionScheduler;
  }
}
