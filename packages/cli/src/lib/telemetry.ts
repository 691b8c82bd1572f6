/**
 * Timing metrics for commands
 */

import type { CliOutput } from "./render.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: string | number | boolean): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line to stderr
 */
export function emitMetric(
  output: CliOutput,
  key: string,
  fields: Record<string, string | number | boolean>
): void {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  output.err(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics, emitted only in verbose mode
 */
export async function withTiming<T>(
  label: string,
  context: { output: CliOutput; verbose: boolean },
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    if (context.verbose) {
      emitMetric(context.output, label, {
        duration_ms: Date.now() - start,
        success,
      });
    }
  }
}
