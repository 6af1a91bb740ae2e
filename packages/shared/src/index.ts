export type { ProxyConfig, Target } from "./types/target.js";
export type {
  ExporterConfig,
  ExporterSettings,
  LogLevel,
} from "./types/settings.js";
export type {
  CycleSummary,
  RawStatus,
  StatusMetricName,
  StatusMetricValues,
} from "./types/metrics.js";
