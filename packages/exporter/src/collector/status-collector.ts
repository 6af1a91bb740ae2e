/**
 * Status Collector — runs one collection cycle over every configured target.
 *
 * Each target is an independent unit of work (fetch → parse → project). All
 * units start together and the cycle ends when every one has settled, so a
 * slow or failing target never blocks or cancels the others.
 *
 * IMPORTANT: Like the metrics server, this module receives its collaborators
 * via constructor injection and knows nothing about Fastify.
 */

import type { CycleSummary, Target } from "@modstatus-exporter/shared";
import type { ExporterLogger } from "../logger.js";
import { projectStatus } from "./metric-projector.js";
import type { StatusSource } from "./status-fetcher.js";
import type { MetricSink } from "./status-metrics.js";
import { parseStatus } from "./status-parser.js";

export interface StatusCollectorOptions {
  source: StatusSource;
  sink: MetricSink;
  logger: ExporterLogger;
  verbose?: boolean;
}

export class StatusCollector {
  private targets: readonly Target[];
  private source: StatusSource;
  private sink: MetricSink;
  private logger: ExporterLogger;
  private verbose: boolean;
  private summary: CycleSummary | null = null;

  constructor(targets: readonly Target[], options: StatusCollectorOptions) {
    this.targets = targets;
    this.source = options.source;
    this.sink = options.sink;
    this.logger = options.logger;
    this.verbose = options.verbose ?? false;
  }

  /** Number of configured targets */
  get targetCount(): number {
    return this.targets.length;
  }

  /** Outcome of the last finished cycle, or null before the first one */
  get lastCycle(): CycleSummary | null {
    return this.summary;
  }

  /** Run one full cycle; resolves once every target has settled */
  async runCycle(): Promise<void> {
    const results = await Promise.allSettled(
      this.targets.map((target) => this.collectTarget(target)),
    );

    const succeeded: string[] = [];
    const failed: string[] = [];
    results.forEach((result, i) => {
      const { label } = this.targets[i];
      if (result.status === "fulfilled") {
        succeeded.push(label);
      } else {
        failed.push(label);
        this.logger.error(
          { target: label, err: result.reason },
          `Error fetching data from ${label}`,
        );
      }
    });

    this.summary = { finishedAt: new Date().toISOString(), succeeded, failed };
  }

  /** Fetch, parse and project a single target */
  private async collectTarget(target: Target): Promise<void> {
    const text = await this.source.fetch(target);
    const status = parseStatus(text);
    const { errors } = projectStatus(this.sink, target.label, status, {
      verbose: this.verbose,
      logger: this.logger,
    });
    for (const err of errors) {
      this.logger.warn(
        { target: target.label, field: err.field, value: err.value },
        `${err.message}; using 0 for ${target.label}`,
      );
    }
  }
}
