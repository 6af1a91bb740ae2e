/**
 * Configuration loading.
 *
 * The file is YAML. The top-level `config` key holds global settings; every
 * other top-level key names a target:
 *
 *   config:
 *     scrape_time_delay: 60
 *     http_proxy: http://proxy.internal:3128
 *     verbose: true
 *   www.example.org:
 *     url: https://www.example.org/server-status
 *   intranet:
 *     url: http://10.0.0.5/server-status
 *     http_proxy: None
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { Value } from "@sinclair/typebox/value";
import type { Static, TSchema } from "@sinclair/typebox";
import type {
  ExporterConfig,
  ExporterSettings,
  Target,
} from "@modstatus-exporter/shared";
import { ConfigurationError } from "../errors.js";
import {
  GlobalSection,
  TargetSection,
  type ProxySetting,
} from "./config.schemas.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const GLOBAL_SECTION = "config";
export const DEFAULT_CONFIG_PATH = "config.yaml";

const DEFAULT_SCRAPE_INTERVAL_SECONDS = 300;
const DEFAULT_LISTEN_ADDRESS = "127.0.0.1";
const DEFAULT_LISTEN_PORT = 9081;
const DEFAULT_TIMEOUT_MS = 10_000;

/** Written in a proxy setting to mean "no proxy" */
const NO_PROXY = "None";

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Read and validate the configuration file.
 *
 * @throws {ConfigurationError} if the file is unreadable or invalid
 */
export async function loadConfig(path: string): Promise<ExporterConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read configuration file ${path}: ${reason}`);
  }
  return parseConfig(text, path);
}

/**
 * Validate configuration text.
 *
 * @param source - name used in error messages
 * @throws {ConfigurationError} on a YAML syntax error or an invalid setting
 */
export function parseConfig(text: string, source = "configuration"): ExporterConfig {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid YAML in ${source}`, [reason]);
  }

  // An empty file parses as null
  const sections = doc ?? {};
  if (!isRecord(sections)) {
    throw new ConfigurationError(`Invalid ${source}: expected a mapping of sections`);
  }

  const problems: string[] = [];
  const globals = checkSection(
    GlobalSection,
    sections[GLOBAL_SECTION] ?? {},
    GLOBAL_SECTION,
    problems,
  );
  if (globals) checkProxies(globals, GLOBAL_SECTION, problems);

  const targetSections: Array<[string, TargetSection]> = [];
  for (const [label, section] of Object.entries(sections)) {
    if (label === GLOBAL_SECTION) continue;
    const checked = checkSection(TargetSection, section, label, problems);
    if (!checked) continue;
    if (!isHttpUrl(checked.url)) {
      problems.push(`/${label}/url: Expected an http or https URL`);
      continue;
    }
    if (!checkProxies(checked, label, problems)) continue;
    targetSections.push([label, checked]);
  }

  if (problems.length > 0 || !globals) {
    throw new ConfigurationError(`Invalid ${source}`, problems);
  }
  if (targetSections.length === 0) {
    throw new ConfigurationError(`No targets configured in ${source}`);
  }

  const settings: ExporterSettings = {
    scrapeIntervalSeconds: globals.scrape_time_delay ?? DEFAULT_SCRAPE_INTERVAL_SECONDS,
    verbose: globals.verbose ?? false,
    proxy: {
      httpProxy: proxyValue(globals.http_proxy),
      httpsProxy: proxyValue(globals.https_proxy),
    },
    listenAddress: globals.listen_address ?? DEFAULT_LISTEN_ADDRESS,
    listenPort: globals.listen_port ?? DEFAULT_LISTEN_PORT,
    timeoutMs: globals.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    logLevel: globals.log_level ?? "info",
  };

  const targets: Target[] = targetSections.map(([label, section]) => ({
    label,
    url: section.url,
    proxy: {
      // A key present in the target section wins, even when it says "None"
      httpProxy:
        section.http_proxy !== undefined
          ? proxyValue(section.http_proxy)
          : settings.proxy.httpProxy,
      httpsProxy:
        section.https_proxy !== undefined
          ? proxyValue(section.https_proxy)
          : settings.proxy.httpsProxy,
    },
  }));

  return { settings, targets };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Check one section, appending `/section/path: message` lines on failure */
function checkSection<T extends TSchema>(
  schema: T,
  value: unknown,
  name: string,
  problems: string[],
): Static<T> | null {
  if (Value.Check(schema, value)) return value;
  for (const error of Value.Errors(schema, value)) {
    problems.push(`/${name}${error.path}: ${error.message}`);
  }
  return null;
}

/** Check that set proxy URLs parse, appending a problem line for each that does not */
function checkProxies(
  section: { http_proxy?: ProxySetting; https_proxy?: ProxySetting },
  name: string,
  problems: string[],
): boolean {
  let ok = true;
  for (const key of ["http_proxy", "https_proxy"] as const) {
    const proxy = proxyValue(section[key]);
    if (proxy !== undefined && !isHttpUrl(proxy)) {
      problems.push(`/${name}/${key}: Expected an http or https URL`);
      ok = false;
    }
  }
  return ok;
}

function proxyValue(setting: ProxySetting | undefined): string | undefined {
  if (setting === undefined || setting === null) return undefined;
  const trimmed = setting.trim();
  return trimmed === "" || trimmed === NO_PROXY ? undefined : trimmed;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
