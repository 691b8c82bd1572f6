/**
 * Validation utilities for context names and context documents
 *
 * Everything here is pure: results are returned, never thrown, so the store can
 * report them as structured failures.
 */

import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { contextDocumentSchema } from "./schema/context-document.js";
import { compileCorrection } from "./regex.js";
import { isJsonObject } from "./io.js";
import type { ValidationReport } from "./types.js";

// Both packages are CommonJS; under NodeNext the default import is module.exports
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Valid characters for context names and tool categories
 */
export const VALID_NAME_PATTERN = /^[A-Za-z0-9_-]{1,50}$/;

/**
 * Names that would collide with the hosting server's own namespaces
 */
export const RESERVED_NAMES: ReadonlySet<string> = new Set(["system", "admin", "config", "server"]);

/**
 * Recommended upper bound for descriptions; longer ones only warn
 */
export const DESCRIPTION_SOFT_LIMIT = 500;

const SEMVER_PATTERN = /^\d+\.\d+\.\d+(?:[-+].*)?$/;

const ajv = new Ajv({ allErrors: true, strict: true });
addFormats(ajv, ["date-time"]);

const validateStructure: ValidateFunction = ajv.compile(contextDocumentSchema);
const validateTimestamp: ValidateFunction = ajv.compile({ type: "string", format: "date-time" });

/**
 * Check a context name or tool category
 * @param value - Candidate name
 * @param label - Label for error messages
 * @returns Error message, or null when valid
 */
export function checkName(value: unknown, label: "context name" | "tool category"): string | null {
  if (typeof value !== "string" || value.length === 0) {
    return `${label} must be a non-empty string`;
  }

  if (!VALID_NAME_PATTERN.test(value)) {
    return (
      `Invalid ${label} "${value}": ` +
      `use 1-50 letters, digits, underscores or hyphens`
    );
  }

  if (label === "context name" && RESERVED_NAMES.has(value)) {
    return `Invalid ${label} "${value}": reserved names are ${[...RESERVED_NAMES].join(", ")}`;
  }

  return null;
}

/**
 * Convert an ajv instance path into the dotted form used in messages
 * @example "/session_initialization/actions/on_startup/0" -> "session_initialization.actions.on_startup[0]"
 */
function formatPath(instancePath: string): string {
  return instancePath
    .split("/")
    .filter(Boolean)
    .reduce((acc, segment) => {
      const key = segment.replace(/~1/g, "/").replace(/~0/g, "~");
      if (/^\d+$/.test(key)) return `${acc}[${key}]`;
      return acc ? `${acc}.${key}` : key;
    }, "");
}

/**
 * Normalize one ajv error into a message
 */
function formatError(err: ErrorObject): string {
  const path = formatPath(err.instancePath);
  const params: Record<string, unknown> = err.params;

  switch (err.keyword) {
    case "required": {
      const missing = String(params.missingProperty);
      if (!path) return `Missing required field: ${missing}`;
      return `${path} must have '${missing}' field`;
    }
    case "type": {
      const expected = String(params.type);
      if (expected === "object") return `${path || "document"} must be an object`;
      if (expected === "array") return `${path} must be a list`;
      const article = /^[aeiou]/.test(expected) ? "an" : "a";
      if (!path.includes(".") && !path.includes("[")) {
        return `Field '${path}' must be ${article} ${expected}`;
      }
      return `${path} must be ${article} ${expected}`;
    }
    case "pattern":
      return `${path} must contain only letters, digits, underscores and hyphens (1-50 characters)`;
    case "minimum":
      return `${path} must be >= ${String(params.limit)}`;
    default:
      return `${path || "document"} ${err.message ?? "is invalid"}`;
  }
}

/**
 * Validate a candidate context document
 *
 * Errors block persistence; warnings are reported but never block a write.
 */
export function validateDocument(doc: unknown): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isJsonObject(doc)) {
    return { errors: ["document must be an object"], warnings };
  }

  if (!validateStructure(doc)) {
    for (const err of validateStructure.errors ?? []) {
      const message = formatError(err);
      if (!errors.includes(message)) {
        errors.push(message);
      }
    }
  }

  if (typeof doc.description === "string" && doc.description.length > DESCRIPTION_SOFT_LIMIT) {
    warnings.push(
      `description is ${doc.description.length} characters; keep it under ${DESCRIPTION_SOFT_LIMIT}`
    );
  }

  const metadata = doc.metadata;
  if (isJsonObject(metadata)) {
    if (
      "version" in metadata &&
      (typeof metadata.version !== "string" || !SEMVER_PATTERN.test(metadata.version))
    ) {
      warnings.push("metadata.version should follow semantic versioning (x.y.z)");
    }
    if ("last_updated" in metadata && !validateTimestamp(metadata.last_updated)) {
      warnings.push("metadata.last_updated should be an ISO-8601 date-time");
    }
  }

  const corrections = doc.auto_corrections;
  if (isJsonObject(corrections)) {
    for (const [name, rule] of Object.entries(corrections)) {
      if (!isJsonObject(rule)) {
        warnings.push(`auto_corrections.${name} is not an object and will be skipped`);
        continue;
      }
      if (typeof rule.pattern !== "string" || typeof rule.replacement !== "string") {
        warnings.push(`auto_corrections.${name} needs string 'pattern' and 'replacement'; it will be skipped`);
        continue;
      }
      try {
        compileCorrection(name, rule.pattern, rule.replacement);
      } catch (err) {
        warnings.push(
          `auto_corrections.${name} will be skipped: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }

  return { errors, warnings };
}
