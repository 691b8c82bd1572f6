/**
 * Main store implementation
 */

import * as path from "node:path";
import type {
  AddPatternResult,
  AuditChange,
  ContextDocument,
  ContextMetadata,
  ContextStore,
  ContextStoreOptions,
  CreateResult,
  JsonObject,
  LoadReport,
  MutationFailure,
  OptimizeResult,
  PatternSection,
  UpdateResult,
  ValidationReport,
} from "./types.js";
import { PATTERN_SECTIONS } from "./types.js";
import { checkName, validateDocument } from "./validation.js";
import {
  atomicWrite,
  ensureDirectory,
  fileExists,
  isJsonObject,
  listFiles,
  readJsonObject,
  serializeDocument,
} from "./io.js";
import { BackupManager, CONTEXT_SUFFIX } from "./backup.js";
import { AuditHook } from "./audit.js";
import { UnavailableMemoryService, DEFAULT_MEMORY_TIMEOUT_MS } from "./memory.js";
import { DirectoryError, ListFilesError, describeError } from "./errors.js";
import { logger } from "./observability/logs.js";

export const DEFAULT_CREATED_BY = "context-rules-store";
export const DEFAULT_VERSION = "1.0.0";
export const DEFAULT_PRIORITY = "medium";

interface Entry {
  doc: ContextDocument;
  filePath: string;
}

/**
 * Derive a context name from a file name, or null for files the store ignores
 */
export function contextNameFromFile(fileName: string): string | null {
  if (!fileName.endsWith(".json")) return null;
  const name = fileName.endsWith(CONTEXT_SUFFIX)
    ? fileName.slice(0, -CONTEXT_SUFFIX.length)
    : fileName.slice(0, -".json".length);
  return name.length > 0 ? name : null;
}

/**
 * Narrow a validated object to a context document
 */
function isContextDocument(value: JsonObject): value is ContextDocument {
  return typeof value.tool_category === "string" && typeof value.description === "string";
}

/**
 * Recursively merge `source` into `target`; nested objects merge, everything else replaces
 */
export function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const merged: JsonObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = merged[key];
    merged[key] =
      isJsonObject(existing) && isJsonObject(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

/**
 * Category part of a tool identifier: "git:commit" -> "git"
 */
export function toolCategoryOf(toolId: string): string {
  const colon = toolId.indexOf(":");
  return colon === -1 ? toolId : toolId.slice(0, colon);
}

function isPatternSection(value: string): value is PatternSection {
  return PATTERN_SECTIONS.some((section) => section === value);
}

/**
 * File-backed context rules store
 *
 * Each document lives in <dir>/<name>_context.json. Reads come from the in-memory
 * map; every mutation runs validate -> backup -> atomic write -> swap, so a failed
 * write leaves both the file and the loaded copy untouched.
 *
 * @example
 * ```typescript
 * const store = await openContextStore({ dir: "./contexts" });
 *
 * await store.create("docker", "docker", { description: "Docker rules" });
 * store.getSyntaxRules("docker");
 * await store.addPattern("docker", "auto_store_triggers", "build_errors", {
 *   patterns: ["build failed"],
 * });
 * ```
 */
class FileContextStore implements ContextStore {
  #dir: string;
  #entries = new Map<string, Entry>();
  #backups: BackupManager;
  #audit: AuditHook | null;
  #now: () => Date;

  constructor(options: ContextStoreOptions) {
    this.#dir = path.resolve(options.dir);
    this.#now = options.now ?? (() => new Date());
    this.#backups = new BackupManager(this.#dir, this.#now);
    this.#audit =
      options.audit === false
        ? null
        : new AuditHook(options.memory ?? new UnavailableMemoryService(), {
            queueSize: options.auditQueueSize,
            timeoutMs: options.memoryTimeoutMs ?? DEFAULT_MEMORY_TIMEOUT_MS,
            now: this.#now,
          });
  }

  get dir(): string {
    return this.#dir;
  }

  /**
   * Scan the directory and replace the loaded set
   *
   * Files that cannot be read or parsed are skipped and reported. When both
   * <name>_context.json and <name>.json exist, the _context file wins.
   */
  async loadAll(): Promise<LoadReport> {
    let files: string[];
    try {
      await ensureDirectory(this.#dir);
      files = await listFiles(this.#dir, ".json");
    } catch (err) {
      if (!(err instanceof DirectoryError || err instanceof ListFilesError)) throw err;
      // An unusable directory leaves the store open and empty
      const reason = describeError(err);
      this.#entries = new Map();
      logger.warn("contexts.dir_unavailable", { file: this.#dir, message: reason });
      return { loaded: [], skipped: [{ file: this.#dir, reason }] };
    }

    const loaded = new Map<string, Entry>();
    const skipped: LoadReport["skipped"] = [];

    for (const file of files) {
      const name = contextNameFromFile(file);
      if (!name) continue;

      const filePath = path.join(this.#dir, file);
      const existing = loaded.get(name);
      if (existing && existing.filePath.endsWith(CONTEXT_SUFFIX)) {
        skipped.push({ file, reason: `shadowed by ${path.basename(existing.filePath)}` });
        continue;
      }

      try {
        const doc = await readJsonObject(filePath);
        if (!isContextDocument(doc)) {
          const reason = validateDocument(doc).errors.join("; ");
          skipped.push({ file, reason });
          logger.warn("context.load_failed", { file: filePath, message: reason });
          continue;
        }
        if (existing) {
          skipped.push({ file: path.basename(existing.filePath), reason: `shadowed by ${file}` });
        }
        loaded.set(name, { doc, filePath });
        logger.debug("context.loaded", { context: name, file: filePath });
      } catch (err) {
        const reason = describeError(err);
        skipped.push({ file, reason });
        logger.warn("context.load_failed", { file: filePath, message: reason });
      }
    }

    this.#entries = loaded;
    logger.info("contexts.loaded", {
      message: `${loaded.size} loaded, ${skipped.length} skipped`,
      details: { dir: this.#dir },
    });

    return { loaded: this.listContexts(), skipped };
  }

  listContexts(): string[] {
    return [...this.#entries.keys()].sort();
  }

  getContext(name: string): ContextDocument | null {
    const entry = this.#entries.get(name);
    return entry ? structuredClone(entry.doc) : null;
  }

  entries(): Array<[string, ContextDocument]> {
    return [...this.#entries.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, entry]): [string, ContextDocument] => [name, structuredClone(entry.doc)]);
  }

  getByTool(toolId: string): Partial<ContextDocument> {
    const entry = this.#resolve(toolId);
    return entry ? structuredClone(entry.doc) : {};
  }

  getSyntaxRules(toolId: string): JsonObject {
    const rules = this.#resolve(toolId)?.doc.syntax_rules;
    return isJsonObject(rules) ? structuredClone(rules) : {};
  }

  getPreferences(toolId: string): JsonObject {
    const preferences = this.#resolve(toolId)?.doc.preferences;
    return isJsonObject(preferences) ? structuredClone(preferences) : {};
  }

  shouldAutoConvert(toolId: string): boolean {
    return this.#resolve(toolId)?.doc.auto_convert === true;
  }

  /**
   * Create a new context file
   * @param name - Context name, also the file stem
   * @param toolCategory - Tool category recorded in the document
   * @param rules - Initial sections; metadata entries other than version and last_updated are kept
   */
  async create(
    name: string,
    toolCategory: string,
    rules: unknown = {}
  ): Promise<CreateResult | MutationFailure> {
    const nameError = checkName(name, "context name") ?? checkName(toolCategory, "tool category");
    if (nameError) {
      return { success: false, error: nameError, context_name: name };
    }
    if (!isJsonObject(rules)) {
      return { success: false, error: "rules must be an object", context_name: name };
    }

    const filePath = path.join(this.#dir, `${name}${CONTEXT_SUFFIX}`);
    if (
      this.#entries.has(name) ||
      (await fileExists(filePath)) ||
      (await fileExists(path.join(this.#dir, `${name}.json`)))
    ) {
      return this.#conflict(name, `Context '${name}' already exists`);
    }

    const sections = Object.fromEntries(
      Object.entries(rules).filter(([key]) => key !== "metadata" && key !== "tool_category")
    );
    const supplied = isJsonObject(rules.metadata) ? rules.metadata : {};
    const metadata: ContextMetadata = {
      created_by: DEFAULT_CREATED_BY,
      applies_to_tools: [toolCategory],
      priority: DEFAULT_PRIORITY,
      optimization_count: 0,
      ...supplied,
      version: DEFAULT_VERSION,
      last_updated: this.#timestamp(),
    };
    const candidate: JsonObject = { tool_category: toolCategory, ...sections, metadata };

    const report = validateDocument(candidate);
    if (report.errors.length > 0 || !isContextDocument(candidate)) {
      return this.#invalid(name, report);
    }

    const writeFailure = await this.#commit(name, filePath, candidate, report);
    if (writeFailure) return writeFailure;

    this.#record(name, { operation: "created", tool_category: toolCategory });
    return {
      success: true,
      message: `Created context '${name}'`,
      context_name: name,
      tool_category: toolCategory,
      file_path: filePath,
      ...warningsOf(report),
    };
  }

  /**
   * Shallow-merge top-level fields into a context; metadata is deep-merged
   */
  async update(name: string, updates: unknown): Promise<UpdateResult | MutationFailure> {
    const merged = await this.#merge(name, updates, { incrementOptimization: false });
    if (!merged.success) return merged;

    this.#record(name, { operation: "updated", updated_fields: merged.updated_fields });
    return {
      success: true,
      message: `Updated context '${name}'`,
      context_name: name,
      file_path: merged.file_path,
      updated_fields: merged.updated_fields,
      ...(merged.backup_path ? { backup_path: merged.backup_path } : {}),
      ...warningsOf(merged.report),
    };
  }

  /**
   * Update a context and count it as an optimization pass
   */
  async optimize(
    name: string,
    updates: unknown,
    reason?: string
  ): Promise<OptimizeResult | MutationFailure> {
    const merged = await this.#merge(name, updates, { incrementOptimization: true });
    if (!merged.success) return merged;

    this.#record(name, {
      operation: "optimized",
      updated_fields: merged.updated_fields,
      optimization_count: merged.optimization_count,
      ...(reason ? { reason } : {}),
    });
    return {
      success: true,
      message: `Optimized context '${name}'`,
      context_name: name,
      file_path: merged.file_path,
      updated_fields: merged.updated_fields,
      optimization_count: merged.optimization_count,
      ...(merged.backup_path ? { backup_path: merged.backup_path } : {}),
      ...warningsOf(merged.report),
    };
  }

  /**
   * Insert or overwrite one entry of a trigger section
   */
  async addPattern(
    name: string,
    section: string,
    patternName: string,
    config: unknown
  ): Promise<AddPatternResult | MutationFailure> {
    if (!isPatternSection(section)) {
      return {
        success: false,
        error: `Invalid section '${section}'; expected one of ${PATTERN_SECTIONS.join(", ")}`,
        context_name: name,
      };
    }
    if (typeof patternName !== "string" || patternName.length === 0) {
      return { success: false, error: "pattern name must be a non-empty string", context_name: name };
    }
    if (!isJsonObject(config)) {
      return { success: false, error: "pattern config must be an object", context_name: name };
    }

    const entry = this.#entries.get(name);
    if (!entry) {
      return this.#conflict(name, `Context '${name}' not found`);
    }

    const current = entry.doc[section];
    if (current !== undefined && !isJsonObject(current)) {
      return { success: false, error: `${section} must be an object`, context_name: name };
    }

    const backupPath = await this.#backups.backup(name, entry.filePath);
    const candidate: JsonObject = {
      ...entry.doc,
      [section]: { ...current, [patternName]: config },
      metadata: this.#touch(entry.doc.metadata),
    };

    const report = validateDocument(candidate);
    if (report.errors.length > 0 || !isContextDocument(candidate)) {
      return withBackup(this.#invalid(name, report), backupPath);
    }

    const writeFailure = await this.#commit(name, entry.filePath, candidate, report);
    if (writeFailure) return withBackup(writeFailure, backupPath);

    this.#record(name, { operation: "pattern_added", section, pattern_name: patternName });
    return {
      success: true,
      message: `Added pattern '${patternName}' to ${section} in context '${name}'`,
      context_name: name,
      file_path: entry.filePath,
      section,
      pattern_name: patternName,
      ...(backupPath ? { backup_path: backupPath } : {}),
      ...warningsOf(report),
    };
  }

  async flush(): Promise<void> {
    await this.#audit?.flush();
  }

  async close(): Promise<void> {
    await this.#audit?.close();
  }

  async #merge(
    name: string,
    updates: unknown,
    options: { incrementOptimization: boolean }
  ): Promise<
    | MutationFailure
    | {
        success: true;
        file_path: string;
        backup_path: string | null;
        updated_fields: string[];
        optimization_count: number;
        report: ValidationReport;
      }
  > {
    if (!isJsonObject(updates)) {
      return { success: false, error: "updates must be an object", context_name: name };
    }

    const entry = this.#entries.get(name);
    if (!entry) {
      return this.#conflict(name, `Context '${name}' not found`);
    }

    const backupPath = await this.#backups.backup(name, entry.filePath);

    const { metadata: metadataUpdates, ...fields } = updates;
    const candidate: JsonObject = { ...entry.doc, ...fields };
    const previousCount = countOf(entry.doc.metadata);
    let optimizationCount = previousCount;

    if (metadataUpdates !== undefined && !isJsonObject(metadataUpdates)) {
      // Leave the bad value in place so validation reports it
      candidate.metadata = metadataUpdates;
    } else {
      const base = isJsonObject(entry.doc.metadata) ? entry.doc.metadata : {};
      const metadata = this.#touch(deepMerge(base, metadataUpdates ?? {}));
      // The counter never moves backwards through a merge
      optimizationCount = Math.max(previousCount, countOf(metadata));
      if (options.incrementOptimization) optimizationCount++;
      metadata.optimization_count = optimizationCount;
      candidate.metadata = metadata;
    }

    const report = validateDocument(candidate);
    if (report.errors.length > 0 || !isContextDocument(candidate)) {
      return withBackup(this.#invalid(name, report), backupPath);
    }

    const writeFailure = await this.#commit(name, entry.filePath, candidate, report);
    if (writeFailure) return withBackup(writeFailure, backupPath);

    return {
      success: true,
      file_path: entry.filePath,
      backup_path: backupPath,
      updated_fields: Object.keys(updates),
      optimization_count: optimizationCount,
      report,
    };
  }

  /**
   * Write the document, then swap it into memory. Returns a failure instead of throwing.
   */
  async #commit(
    name: string,
    filePath: string,
    doc: ContextDocument,
    report: ValidationReport
  ): Promise<MutationFailure | null> {
    try {
      await atomicWrite(filePath, serializeDocument(doc));
    } catch (err) {
      const message = describeError(err);
      logger.error("context.write_failed", { context: name, file: filePath, message });
      return { success: false, error: message, context_name: name, ...warningsOf(report) };
    }

    this.#entries.set(name, { doc, filePath });
    logger.info("context.written", { context: name, file: filePath });
    return null;
  }

  #record(name: string, change: AuditChange): void {
    this.#audit?.record(name, change);
  }

  #resolve(toolId: string): Entry | undefined {
    return this.#entries.get(toolCategoryOf(toolId));
  }

  #touch(metadata: unknown): ContextMetadata {
    const base = isJsonObject(metadata) ? metadata : {};
    return {
      version: DEFAULT_VERSION,
      optimization_count: 0,
      ...base,
      last_updated: this.#timestamp(),
    };
  }

  #timestamp(): string {
    return this.#now().toISOString();
  }

  #conflict(name: string, error: string): MutationFailure {
    return { success: false, error, context_name: name, available_contexts: this.listContexts() };
  }

  #invalid(name: string, report: ValidationReport): MutationFailure {
    logger.warn("context.invalid", { context: name, message: report.errors.join("; ") });
    return {
      success: false,
      error: "Validation failed",
      context_name: name,
      validation_errors: report.errors,
      ...warningsOf(report),
    };
  }
}

function countOf(metadata: unknown): number {
  if (!isJsonObject(metadata)) return 0;
  const count = metadata.optimization_count;
  return typeof count === "number" && Number.isInteger(count) && count > 0 ? count : 0;
}

function warningsOf(report: ValidationReport): { warnings?: string[] } {
  return report.warnings.length > 0 ? { warnings: report.warnings } : {};
}

function withBackup(failure: MutationFailure, backupPath: string | null): MutationFailure {
  return backupPath ? { ...failure, backup_path: backupPath } : failure;
}

/**
 * Open a context store
 *
 * The directory is created if missing and, unless `autoLoad` is false, loaded
 * before the store is returned. A directory that cannot be used gives an empty store.
 */
export async function openContextStore(options: ContextStoreOptions): Promise<ContextStore> {
  const store = new FileContextStore(options);
  if (options.autoLoad !== false) {
    await store.loadAll();
    return store;
  }

  try {
    await ensureDirectory(store.dir);
  } catch (err) {
    if (!(err instanceof DirectoryError)) throw err;
    logger.warn("contexts.dir_unavailable", { file: store.dir, message: describeError(err) });
  }
  return store;
}
