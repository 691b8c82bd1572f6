/**
 * Auto-correction engine
 *
 * Applies a document's auto_corrections to free text. Rules run in document order,
 * each on the output of the previous one. A rule that is malformed or fails to
 * compile is skipped; the rest still apply.
 */

import { compileCorrection, type CompiledCorrection } from "./regex.js";
import { isJsonObject } from "./io.js";
import { describeError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { ContextStore } from "./types.js";

export interface CorrectionOutcome {
  text: string;
  applied: string[];
  skipped: Array<{ rule: string; reason: string }>;
}

/**
 * Compile every usable rule in an auto_corrections section
 */
export function compileRules(
  rules: unknown,
  contextLabel = "unknown"
): { compiled: CompiledCorrection[]; skipped: CorrectionOutcome["skipped"] } {
  const compiled: CompiledCorrection[] = [];
  const skipped: CorrectionOutcome["skipped"] = [];
  if (!isJsonObject(rules)) {
    return { compiled, skipped };
  }

  for (const [name, rule] of Object.entries(rules)) {
    if (!isJsonObject(rule) || typeof rule.pattern !== "string" || typeof rule.replacement !== "string") {
      skipped.push({ rule: name, reason: "missing pattern or replacement" });
      continue;
    }
    try {
      compiled.push(compileCorrection(name, rule.pattern, rule.replacement));
    } catch (err) {
      const reason = describeError(err);
      skipped.push({ rule: name, reason });
      logger.warn("correction.invalid", { context: contextLabel, message: `${name}: ${reason}` });
    }
  }

  return { compiled, skipped };
}

/**
 * Apply an auto_corrections section to text
 */
export function applyCorrectionRules(
  rules: unknown,
  text: string,
  contextLabel?: string
): CorrectionOutcome {
  const { compiled, skipped } = compileRules(rules, contextLabel);
  let current = text;
  const applied: string[] = [];

  for (const rule of compiled) {
    const next = rule.apply(current);
    if (next !== current) {
      applied.push(rule.name);
    }
    current = next;
  }

  return { text: current, applied, skipped };
}

/**
 * Resolves tools through the store and applies their corrections
 */
export class CorrectionEngine {
  #store: Pick<ContextStore, "getByTool">;

  constructor(store: Pick<ContextStore, "getByTool">) {
    this.#store = store;
  }

  /**
   * Correct `text` for a tool; an unknown tool returns the text unchanged
   */
  applyCorrections(toolId: string, text: string): string {
    return this.explain(toolId, text).text;
  }

  /**
   * Like applyCorrections, also reporting which rules changed the text and which were skipped
   */
  explain(toolId: string, text: string): CorrectionOutcome {
    const doc = this.#store.getByTool(toolId);
    return applyCorrectionRules(doc.auto_corrections, text, toolId);
  }
}
