/**
 * Metric registry for the exporter.
 *
 * One `StatusMetrics` instance is created at start-up and handed to the
 * collector (which writes) and the `/metrics` route (which reads). Tests build
 * their own instance, so no state is shared through module globals.
 */

import { Gauge, Registry } from "prom-client";
import type { StatusMetricName } from "@modstatus-exporter/shared";

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export const METRIC_PREFIX = "apache_";

/** Label carrying the target's configured name */
export const HOSTNAME_LABEL = "hostname";

/** Every published gauge, in exposition order */
export const STATUS_METRICS: readonly StatusMetricName[] = [
  "total_accesses",
  "cpu_load",
  "uptime",
  "req_per_sec",
  "bytes_per_sec",
  "worker_ratio",
  "busy_workers",
  "idle_workers",
];

export const METRIC_HELP: Record<StatusMetricName, string> = {
  total_accesses: "Total number of accesses",
  cpu_load: "CPU load",
  uptime: "Uptime in seconds",
  req_per_sec: "Requests per second",
  bytes_per_sec: "Bytes transferred per second",
  worker_ratio: "Ratio of busy to idle workers",
  busy_workers: "Number of busy workers",
  idle_workers: "Number of idle workers",
};

// ---------------------------------------------------------------------------
// Sink interface
// ---------------------------------------------------------------------------

/** Write side of the registry: set gauge `metric` for `label` to `value` */
export interface MetricSink {
  set(metric: StatusMetricName, label: string, value: number): void;
}

// ---------------------------------------------------------------------------
// StatusMetrics
// ---------------------------------------------------------------------------

export class StatusMetrics implements MetricSink {
  readonly registry: Registry;
  private gauges = new Map<StatusMetricName, Gauge<typeof HOSTNAME_LABEL>>();

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;
    for (const metric of STATUS_METRICS) {
      this.gauges.set(
        metric,
        new Gauge({
          name: METRIC_PREFIX + metric,
          help: METRIC_HELP[metric],
          labelNames: [HOSTNAME_LABEL],
          registers: [registry],
        }),
      );
    }
  }

  set(metric: StatusMetricName, label: string, value: number): void {
    this.gauge(metric).set({ [HOSTNAME_LABEL]: label }, value);
  }

  /** Current value of a gauge for a label, or undefined if never set */
  async get(metric: StatusMetricName, label: string): Promise<number | undefined> {
    const { values } = await this.gauge(metric).get();
    return values.find((v) => v.labels[HOSTNAME_LABEL] === label)?.value;
  }

  /** Prometheus text exposition of every gauge */
  expose(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  private gauge(metric: StatusMetricName): Gauge<typeof HOSTNAME_LABEL> {
    const gauge = this.gauges.get(metric);
    if (!gauge) throw new Error(`Unknown metric: ${metric}`);
    return gauge;
  }
}
