/**
 * Collector Module
 *
 * Polls status pages and keeps the exporter's gauges current.
 */

export { StatusCollector } from "./status-collector.js";
export type { StatusCollectorOptions } from "./status-collector.js";
export { CollectionScheduler } from "./scheduler.js";
export type { CollectionSchedulerOptions, CycleRunner } from "./scheduler.js";
export { StatusFetcher, ensureAutoParameter, resolveProxy } from "./status-fetcher.js";
export type { StatusFetcherOptions, StatusSource } from "./status-fetcher.js";
export { StatusMetrics, STATUS_METRICS } from "./status-metrics.js";
export type { MetricSink } from "./status-metrics.js";
export { parseStatus } from "./status-parser.js";
export { projectStatus, workerRatio } from "./metric-projector.js";
export type { ProjectOptions, ProjectionResult } from "./metric-projector.js";
