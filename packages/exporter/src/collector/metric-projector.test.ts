import { describe, it, expect, vi, beforeEach } from "vitest";
import type { RawStatus } from "@modstatus-exporter/shared";
import { ProjectionError } from "../errors.js";
import type { ExporterLogger } from "../logger.js";
import { projectStatus, workerRatio } from "./metric-projector.js";
import { StatusMetrics, type MetricSink } from "./status-metrics.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function status(entries: Record<string, string>): RawStatus {
  return new Map(Object.entries(entries));
}

function createMockLogger(): ExporterLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const FULL_PAGE = status({
  "Total Accesses": "1520",
  CPULoad: ".0123",
  Uptime: "3600",
  ReqPerSec: ".422222",
  BytesPerSec: "2048.5",
  BusyWorkers: "3",
  IdleWorkers: "6",
  Scoreboard: "__W___",
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

let metrics: StatusMetrics;

beforeEach(() => {
  metrics = new StatusMetrics();
});

describe("projectStatus", () => {
  it("writes every gauge for the label", async () => {
    const { values, errors } = projectStatus(metrics, "web-1", FULL_PAGE);

    expect(errors).toEqual([]);
    expect(values).toEqual({
      total_accesses: 1520,
      cpu_load: 0.0123,
      uptime: 3600,
      req_per_sec: 0.422222,
      bytes_per_sec: 2048.5,
      busy_workers: 3,
      idle_workers: 6,
      worker_ratio: 0.5,
    });
    expect(await metrics.get("total_accesses", "web-1")).toBe(1520);
    expect(await metrics.get("cpu_load", "web-1")).toBe(0.0123);
    expect(await metrics.get("busy_workers", "web-1")).toBe(3);
    expect(await metrics.get("worker_ratio", "web-1")).toBe(0.5);
  });

  it("sets all eight gauges in one call", () => {
    const sink: MetricSink = { set: vi.fn() };
    projectStatus(sink, "web-1", FULL_PAGE);

    expect(sink.set).toHaveBeenCalledTimes(8);
    expect(sink.set).toHaveBeenCalledWith("idle_workers", "web-1", 6);
    expect(sink.set).toHaveBeenCalledWith("worker_ratio", "web-1", 0.5);
  });

  it("falls back to the busy count when no workers are idle", () => {
    const { values } = projectStatus(
      metrics,
      "web-1",
      status({ BusyWorkers: "5", IdleWorkers: "0" }),
    );
    expect(values.worker_ratio).toBe(5);
  });

  it("defaults missing fields to 0", async () => {
    const { values, errors } = projectStatus(
      metrics,
      "web-1",
      status({ BusyWorkers: "2", IdleWorkers: "4" }),
    );

    expect(errors).toEqual([]);
    expect(values.total_accesses).toBe(0);
    expect(values.uptime).toBe(0);
    expect(await metrics.get("total_accesses", "web-1")).toBe(0);
  });

  it("writes zeros for an empty status page", () => {
    const { values } = projectStatus(metrics, "web-1", new Map());
    expect(Object.values(values)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("substitutes 0 for a non-numeric field and keeps the others", async () => {
    const { values, errors } = projectStatus(
      metrics,
      "web-1",
      status({ CPULoad: "n/a", Uptime: "42", BusyWorkers: "1", IdleWorkers: "2" }),
    );

    expect(values.cpu_load).toBe(0);
    expect(values.uptime).toBe(42);
    expect(values.worker_ratio).toBe(0.5);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ProjectionError);
    expect(errors[0]).toMatchObject({ field: "CPULoad", value: "n/a" });
    expect(await metrics.get("cpu_load", "web-1")).toBe(0);
  });

  it("rejects fractional and empty values for worker counts", () => {
    const { values, errors } = projectStatus(
      metrics,
      "web-1",
      status({ BusyWorkers: "3.5", IdleWorkers: "", Uptime: "" }),
    );

    expect(values.busy_workers).toBe(0);
    expect(values.idle_workers).toBe(0);
    expect(values.uptime).toBe(0);
    expect(errors.map((e) => e.field)).toEqual(["BusyWorkers", "IdleWorkers", "Uptime"]);
  });

  it("accepts exponent notation for float fields", () => {
    const { values } = projectStatus(metrics, "web-1", status({ BytesPerSec: "1.5e3" }));
    expect(values.bytes_per_sec).toBe(1500);
  });

  it("rejects hexadecimal, binary and octal literals in float fields", () => {
    const { values, errors } = projectStatus(
      metrics,
      "web-1",
      status({ Uptime: "0x10", CPULoad: "0b11", ReqPerSec: "0o7", BytesPerSec: "+.5" }),
    );

    expect(values.uptime).toBe(0);
    expect(values.cpu_load).toBe(0);
    expect(values.req_per_sec).toBe(0);
    expect(values.bytes_per_sec).toBe(0.5);
    expect(errors.map((e) => e.field)).toEqual(["CPULoad", "Uptime", "ReqPerSec"]);
  });

  it("keeps labels independent", async () => {
    projectStatus(metrics, "web-1", status({ Uptime: "10" }));
    projectStatus(metrics, "web-2", status({ Uptime: "20" }));

    expect(await metrics.get("uptime", "web-1")).toBe(10);
    expect(await metrics.get("uptime", "web-2")).toBe(20);
  });

  it("produces the same values when projected twice", async () => {
    projectStatus(metrics, "web-1", FULL_PAGE);
    const first = await metrics.expose();
    projectStatus(metrics, "web-1", FULL_PAGE);

    expect(await metrics.expose()).toBe(first);
  });

  it("logs the target name in verbose mode only", () => {
    const logger = createMockLogger();

    projectStatus(metrics, "web-1", FULL_PAGE, { logger });
    expect(logger.info).not.toHaveBeenCalled();

    projectStatus(metrics, "web-1", FULL_PAGE, { logger, verbose: true });
    expect(logger.info).toHaveBeenCalledWith("Updating server metrics for web-1");
  });
});

describe("workerRatio", () => {
  it("divides busy by idle", () => {
    expect(workerRatio(3, 6)).toBe(0.5);
  });

  it("returns the busy count when idle is 0", () => {
    expect(workerRatio(5, 0)).toBe(5);
    expect(workerRatio(0, 0)).toBe(0);
  });
});
