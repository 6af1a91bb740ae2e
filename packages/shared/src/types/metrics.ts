/**
 * Types describing the gauges the exporter publishes.
 */

/** Status page contents: trimmed key → trimmed value */
export type RawStatus = Map<string, string>;

/** Base name of every published gauge (without the `apache_` prefix) */
export type StatusMetricName =
  | "total_accesses"
  | "cpu_load"
  | "uptime"
  | "req_per_sec"
  | "bytes_per_sec"
  | "busy_workers"
  | "idle_workers"
  | "worker_ratio";

/** Values written for one target in one projection */
export type StatusMetricValues = Record<StatusMetricName, number>;

/** Outcome of the most recent collection cycle */
export interface CycleSummary {
  /** ISO 8601 timestamp of when the cycle finished */
  finishedAt: string;
  /** Labels whose fetch/parse/project completed */
  succeeded: string[];
  /** Labels whose unit of work failed */
  failed: string[];
}
