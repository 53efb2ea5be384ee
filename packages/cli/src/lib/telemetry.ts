/**
 * Command timing diagnostics, printed to stderr when MICRODM_CLI_DEBUG=1
 */

import { isVerbose } from "./env.js";
import type { CliIo } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line: `metric <key> k=v ...`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Run a command body and report its duration and outcome
 */
export async function withTiming<T>(io: CliIo, label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    if (isVerbose()) {
      io.err(`${formatMetric(label, { duration_ms: Date.now() - start, success })}\n`);
    }
  }
}
