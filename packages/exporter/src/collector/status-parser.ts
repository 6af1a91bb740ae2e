/**
 * Parser for the machine-readable (`?auto`) status page.
 *
 * The page is plain text, one `Key: Value` pair per line:
 *
 *   Total Accesses: 1520
 *   CPULoad: .0123
 *   BusyWorkers: 3
 *   Scoreboard: ___W_K.....
 */

import type { RawStatus } from "@modstatus-exporter/shared";

const SEPARATOR = ": ";

/**
 * Parse status text into a key → value map.
 *
 * A line is kept only when it contains the separator exactly once; anything
 * else is skipped. Keys and values are trimmed and later duplicates win.
 */
export function parseStatus(text: string): RawStatus {
  const status: RawStatus = new Map();

  for (const line of text.split("\n")) {
    const parts = line.split(SEPARATOR);
    if (parts.length !== 2) continue;

    const [key, value] = parts;
    status.set(key.trim(), value.trim());
  }

  return status;
}
