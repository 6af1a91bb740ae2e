import { describe, it, expect, vi, afterEach } from "vitest";
import { CollectionScheduler, type CycleRunner } from "./scheduler.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Poll until a condition is met */
async function waitFor(fn: () => void, timeout = 1000): Promise<void> {
  const start = Date.now();
  while (true) {
    try {
      fn();
      return;
    } catch {
      if (Date.now() - start > timeout) throw new Error("waitFor timed out");
      await new Promise((r) => setTimeout(r, 10));
    }
  }
}

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Runner whose cycles take `durationMs` and record their overlap */
function createRunner(durationMs = 0) {
  const state = { cycles: 0, active: 0, maxActive: 0 };
  const runner: CycleRunner = {
    runCycle: vi.fn(async () => {
      state.active++;
      state.maxActive = Math.max(state.maxActive, state.active);
      await new Promise((r) => setTimeout(r, durationMs));
      state.active--;
      state.cycles++;
    }),
  };
  return { runner, state };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

let scheduler: CollectionScheduler | undefined;

afterEach(async () => {
  await scheduler?.stop();
  scheduler = undefined;
});

describe("CollectionScheduler", () => {
  it("starts and stops the collection loop", async () => {
    const { runner } = createRunner();
    scheduler = new CollectionScheduler(runner, { intervalMs: 60_000, logger: createMockLogger() });

    expect(scheduler.isRunning).toBe(false);
    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    await scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
  });

  it("runs the first cycle immediately and does not start twice", async () => {
    const { runner, state } = createRunner();
    scheduler = new CollectionScheduler(runner, { intervalMs: 60_000, logger: createMockLogger() });

    scheduler.start();
    scheduler.start(); // no-op
    await waitFor(() => expect(state.cycles).toBe(1));

    expect(runner.runCycle).toHaveBeenCalledTimes(1);
  });

  it("keeps cycling on the interval", async () => {
    const { runner, state } = createRunner();
    scheduler = new CollectionScheduler(runner, { intervalMs: 5, logger: createMockLogger() });

    scheduler.start();
    await waitFor(() => expect(state.cycles).toBeGreaterThanOrEqual(3));
  });

  it("never overlaps cycles, even when a cycle outlasts the interval", async () => {
    const { runner, state } = createRunner(30);
    scheduler = new CollectionScheduler(runner, { intervalMs: 1, logger: createMockLogger() });

    scheduler.start();
    await waitFor(() => expect(state.cycles).toBeGreaterThanOrEqual(3));

    expect(state.maxActive).toBe(1);
  });

  it("waits for the in-flight cycle when stopped", async () => {
    const { runner, state } = createRunner(30);
    scheduler = new CollectionScheduler(runner, { intervalMs: 60_000, logger: createMockLogger() });

    scheduler.start();
    await scheduler.stop();

    expect(state.cycles).toBe(1);
    expect(state.active).toBe(0);
  });

  it("logs a failed cycle and carries on", async () => {
    const logger = createMockLogger();
    const err = new Error("boom");
    const runner: CycleRunner = {
      runCycle: vi.fn().mockRejectedValueOnce(err).mockResolvedValue(undefined),
    };
    scheduler = new CollectionScheduler(runner, { intervalMs: 5, logger });

    scheduler.start();
    await waitFor(() => expect(runner.runCycle).toHaveBeenCalledTimes(2));

    expect(logger.error).toHaveBeenCalledWith({ err }, "Collection cycle failed");
  });

  it("announces the sleep in verbose mode", async () => {
    const logger = createMockLogger();
    const { runner } = createRunner();
    scheduler = new CollectionScheduler(runner, {
      intervalMs: 60_000,
      logger,
      verbose: true,
    });

    scheduler.start();
    await waitFor(() =>
      expect(logger.info).toHaveBeenCalledWith(
        "Sleeping for 60 seconds before next collection cycle",
      ),
    );
  });

  it("stops cleanly when never started", async () => {
    const { runner } = createRunner();
    scheduler = new CollectionScheduler(runner, { intervalMs: 5, logger: createMockLogger() });

    await expect(scheduler.stop()).resolves.toBeUndefined();
  });
});
