/**
 * Core types for the context rules store
 */

/**
 * Arbitrary JSON object. Used for the free-form sections of a context document.
 */
export type JsonObject = Record<string, unknown>;

/**
 * A single auto-correction rule. Entries that lack either key are skipped at apply time.
 */
export interface CorrectionRule {
  pattern: string;
  replacement: string;
  description?: string;
  [extra: string]: unknown;
}

/**
 * One startup action declared under session_initialization.actions.on_startup
 */
export interface StartupAction {
  action: string;
  parameters?: JsonObject;
  description?: string;
}

export interface SessionInitialization {
  enabled?: boolean;
  actions?: {
    on_startup?: StartupAction[];
    [extra: string]: unknown;
  };
  [extra: string]: unknown;
}

/**
 * Trigger pattern config stored under auto_store_triggers / auto_retrieve_triggers.
 * Shape is owned by the caller; the store only inserts and overwrites entries.
 */
export interface PatternConfig {
  patterns?: string[];
  action?: string;
  tags?: string[];
  [extra: string]: unknown;
}

export interface ContextMetadata {
  version?: string;
  last_updated?: string;
  created_by?: string;
  applies_to_tools?: string[];
  priority?: string;
  optimization_count?: number;
  [extra: string]: unknown;
}

/**
 * A context document as persisted on disk.
 *
 * Fields the store inspects are typed; syntax_rules, preferences and trigger
 * configs stay open. Unknown top-level keys survive a load/write cycle.
 */
export interface ContextDocument {
  tool_category: string;
  description: string;
  auto_convert?: boolean;
  syntax_rules?: JsonObject;
  preferences?: JsonObject;
  auto_corrections?: Record<string, CorrectionRule>;
  session_initialization?: SessionInitialization;
  auto_store_triggers?: Record<string, PatternConfig>;
  auto_retrieve_triggers?: Record<string, PatternConfig>;
  metadata?: ContextMetadata;
  [extra: string]: unknown;
}

/**
 * Sections that addPattern() may write into
 */
export type PatternSection = "auto_store_triggers" | "auto_retrieve_triggers";

export const PATTERN_SECTIONS: readonly PatternSection[] = [
  "auto_store_triggers",
  "auto_retrieve_triggers",
];

/**
 * Outcome of running the document validator
 */
export interface ValidationReport {
  errors: string[];
  warnings: string[];
}

/**
 * Options for opening a context store
 */
export interface ContextStoreOptions {
  /** Directory holding <name>_context.json files */
  dir: string;

  /** Load the directory when the store is opened (default: true) */
  autoLoad?: boolean;

  /** External memory service used by the audit hook (default: unavailable) */
  memory?: MemoryService;

  /** Enable the audit hook (default: true) */
  audit?: boolean;

  /** Maximum queued audit events before the oldest is dropped (default: 100) */
  auditQueueSize?: number;

  /** Timeout applied to every memory-service call in milliseconds (default: 5000) */
  memoryTimeoutMs?: number;

  /** Clock override, used for metadata timestamps and backup names */
  now?: () => Date;
}

/**
 * Result of loadAll()
 */
export interface LoadReport {
  loaded: string[];
  skipped: Array<{ file: string; reason: string }>;
}

/**
 * Fields shared by every mutating operation result
 */
interface MutationBase {
  context_name: string;
  warnings?: string[];
}

export interface MutationSuccess extends MutationBase {
  success: true;
  message: string;
  file_path: string;
  backup_path?: string;
}

export interface MutationFailure extends MutationBase {
  success: false;
  error: string;
  validation_errors?: string[];
  available_contexts?: string[];
  backup_path?: string;
}

export type MutationResult = MutationSuccess | MutationFailure;

export interface CreateResult extends MutationSuccess {
  tool_category: string;
}

export interface UpdateResult extends MutationSuccess {
  updated_fields: string[];
}

export interface AddPatternResult extends MutationSuccess {
  section: PatternSection;
  pattern_name: string;
}

export interface OptimizeResult extends MutationSuccess {
  updated_fields: string[];
  optimization_count: number;
}

// ─── Memory service ─────────────────────────────────────────────

export interface MemoryEntry {
  content: string;
  relevance?: number;
  tags?: string[];
  timestamp?: string;
  [extra: string]: unknown;
}

export interface MemoryStoreResult {
  success: boolean;
  memory_id?: string;
  error?: string;
}

export interface MemoryQueryResult {
  success: boolean;
  results: MemoryEntry[];
  error?: string;
}

export interface MemoryStatsResult {
  success: boolean;
  total_memories?: number;
  tags_available?: string[];
  storage_backend?: string;
  service_status?: string;
  error?: string;
}

/**
 * Narrow async contract the core uses to talk to the external memory service
 */
export interface MemoryService {
  store(content: string, tags: string[], metadata: JsonObject): Promise<MemoryStoreResult>;
  recall(query: string, limit: number): Promise<MemoryQueryResult>;
  searchByTag(tags: string[], limit: number): Promise<MemoryQueryResult>;
  stats(): Promise<MemoryStatsResult>;
}

// ─── Session initialization ─────────────────────────────────────

export type ActionStatus = "success" | "failed" | "skipped";

export interface ExecutedAction {
  context: string;
  action: string;
  description?: string;
  status: ActionStatus;
  summary: string;
}

export interface SessionError {
  context: string;
  action: string;
  error: string;
}

export interface SessionStatus {
  initialized: boolean;
  initialization_time: string | null;
  executed_actions: ExecutedAction[];
  errors: SessionError[];
  memory_retrieval_results: Record<string, MemoryQueryResult>;
  execution_time_seconds: number;
  initialized_contexts: string[];
}

// ─── Audit ──────────────────────────────────────────────────────

/**
 * One successful mutation, described by what it changed
 */
export type AuditChange =
  | { operation: "created"; tool_category: string }
  | { operation: "updated"; updated_fields: string[] }
  | { operation: "pattern_added"; section: PatternSection; pattern_name: string }
  | {
      operation: "optimized";
      updated_fields: string[];
      optimization_count: number;
      reason?: string;
    };

export type AuditOperation = AuditChange["operation"];

export interface AuditEvent {
  contextName: string;
  change: AuditChange;
  timestamp: string;
}

// ─── Store ──────────────────────────────────────────────────────

/**
 * Context rules store
 *
 * Reads are served from memory. Mutations validate, back up, write atomically and
 * only then swap the in-memory copy; every mutation resolves to a structured result
 * and never rejects for expected failures.
 */
export interface ContextStore {
  /** Directory the store reads and writes */
  readonly dir: string;

  /** Scan the directory and replace the in-memory set */
  loadAll(): Promise<LoadReport>;

  /** Sorted names of loaded contexts */
  listContexts(): string[];

  /** Loaded document by context name, or null */
  getContext(name: string): ContextDocument | null;

  /** Loaded (name, document) pairs sorted by name */
  entries(): Array<[string, ContextDocument]>;

  /**
   * Resolve a tool identifier ("<category>:<specific>" or a bare category) to the
   * context named by its category, else {}
   */
  getByTool(toolId: string): Partial<ContextDocument>;

  getSyntaxRules(toolId: string): JsonObject;
  getPreferences(toolId: string): JsonObject;
  shouldAutoConvert(toolId: string): boolean;

  create(name: string, toolCategory: string, rules?: unknown): Promise<CreateResult | MutationFailure>;
  update(name: string, updates: unknown): Promise<UpdateResult | MutationFailure>;
  addPattern(
    name: string,
    section: string,
    patternName: string,
    config: unknown
  ): Promise<AddPatternResult | MutationFailure>;
  optimize(name: string, updates: unknown, reason?: string): Promise<OptimizeResult | MutationFailure>;

  /** Wait for queued audit events to be delivered */
  flush(): Promise<void>;

  /** Flush and stop the audit hook */
  close(): Promise<void>;
}
