/**
 * Collection Scheduler — runs the collector forever, one cycle at a time.
 *
 * Unlike a `setInterval` timer, the next cycle is only scheduled after the
 * previous one has finished, and the wait is measured from that point.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ExporterLogger } from "../logger.js";

/** Anything that can run one collection cycle */
export interface CycleRunner {
  runCycle(): Promise<void>;
}

export interface CollectionSchedulerOptions {
  /** Wait between cycles in ms */
  intervalMs: number;
  logger: ExporterLogger;
  /** Log a line before each sleep */
  verbose?: boolean;
}

export class CollectionScheduler {
  private runner: CycleRunner;
  private intervalMs: number;
  private logger: ExporterLogger;
  private verbose: boolean;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(runner: CycleRunner, options: CollectionSchedulerOptions) {
    this.runner = runner;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger;
    this.verbose = options.verbose ?? false;
  }

  /** Start the collection loop; the first cycle runs immediately */
  start(): void {
    if (this.loop) return; // already running
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal);
  }

  /** Stop the loop, waiting for an in-flight cycle to finish */
  async stop(): Promise<void> {
    if (!this.loop) return;
    this.abort?.abort();
    await this.loop;
    this.abort = null;
    this.loop = null;
  }

  /** Whether the loop is running */
  get isRunning(): boolean {
    return this.loop !== null;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runner.runCycle();
      } catch (err) {
        this.logger.error({ err }, "Collection cycle failed");
      }
      if (signal.aborted) break;

      if (this.verbose) {
        this.logger.info(
          `Sleeping for ${this.intervalMs / 1000} seconds before next collection cycle`,
        );
      }
      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch {
        // sleep only rejects when stop() aborts it
        break;
      }
    }
  }
}
