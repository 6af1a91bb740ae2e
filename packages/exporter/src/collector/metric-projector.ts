/**
 * Maps a parsed status page onto the exporter's gauges.
 */

import type {
  RawStatus,
  StatusMetricName,
  StatusMetricValues,
} from "@modstatus-exporter/shared";
import { ProjectionError } from "../errors.js";
import type { ExporterLogger } from "../logger.js";
import { STATUS_METRICS, type MetricSink } from "./status-metrics.js";

// ---------------------------------------------------------------------------
// Field table
// ---------------------------------------------------------------------------

type FieldMetricName = Exclude<StatusMetricName, "worker_ratio">;

interface FieldSpec {
  /** Key as it appears on the status page */
  key: string;
  kind: "float" | "int";
}

export const STATUS_FIELDS: Record<FieldMetricName, FieldSpec> = {
  total_accesses: { key: "Total Accesses", kind: "float" },
  cpu_load: { key: "CPULoad", kind: "float" },
  uptime: { key: "Uptime", kind: "float" },
  req_per_sec: { key: "ReqPerSec", kind: "float" },
  bytes_per_sec: { key: "BytesPerSec", kind: "float" },
  busy_workers: { key: "BusyWorkers", kind: "int" },
  idle_workers: { key: "IdleWorkers", kind: "int" },
};

const FIELD_DEFAULT = 0;

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

export interface ProjectOptions {
  verbose?: boolean;
  logger?: ExporterLogger;
}

export interface ProjectionResult {
  values: StatusMetricValues;
  /** Fields that were present but non-numeric; each was written as 0 */
  errors: ProjectionError[];
}

/**
 * Write every gauge for `label` from `status`.
 *
 * Missing fields default to 0. A non-numeric field also becomes 0 and is
 * reported in `errors`; the remaining fields are still written.
 */
export function projectStatus(
  sink: MetricSink,
  label: string,
  status: RawStatus,
  options: ProjectOptions = {},
): ProjectionResult {
  if (options.verbose) {
    options.logger?.info(`Updating server metrics for ${label}`);
  }

  const errors: ProjectionError[] = [];
  const read = (metric: FieldMetricName): number => {
    const { key, kind } = STATUS_FIELDS[metric];
    const raw = status.get(key);
    if (raw === undefined) return FIELD_DEFAULT;
    const value = coerce(raw, kind);
    if (value === null) {
      errors.push(new ProjectionError(key, raw));
      return FIELD_DEFAULT;
    }
    return value;
  };

  const busy = read("busy_workers");
  const idle = read("idle_workers");
  const values: StatusMetricValues = {
    total_accesses: read("total_accesses"),
    cpu_load: read("cpu_load"),
    uptime: read("uptime"),
    req_per_sec: read("req_per_sec"),
    bytes_per_sec: read("bytes_per_sec"),
    busy_workers: busy,
    idle_workers: idle,
    worker_ratio: workerRatio(busy, idle),
  };

  for (const metric of STATUS_METRICS) {
    sink.set(metric, label, values[metric]);
  }

  return { values, errors };
}

/** busy / idle, or busy itself when there are no idle workers */
export function workerRatio(busy: number, idle: number): number {
  return idle > 0 ? busy / idle : busy;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Read a status value as a number, or null if it is not one */
function coerce(raw: string, kind: FieldSpec["kind"]): number | null {
  if (kind === "int") {
    return INT_RE.test(raw) ? parseInt(raw, 10) : null;
  }
  if (!FLOAT_RE.test(raw)) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}
