/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isJsonObject, type JsonObject } from "@ctxrules/sdk";

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    const parsed: unknown = JSON.parse(cleaned);
    return parsed;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse JSON that must be an object
 */
export function parseJsonObject(value: string, source: string): JsonObject {
  const parsed = parseJson(value, source);
  if (!isJsonObject(parsed)) {
    throw new InvalidArgumentError(`${source} must be a JSON object`);
  }
  return parsed;
}
