/**
 * Context rules SDK
 *
 * A file-backed store of per-tool context documents with auto-corrections,
 * session initialization and an audit trail in an external memory service
 */

// Re-export types
export type {
  JsonObject,
  CorrectionRule,
  StartupAction,
  SessionInitialization,
  PatternConfig,
  ContextMetadata,
  ContextDocument,
  PatternSection,
  ValidationReport,
  ContextStoreOptions,
  LoadReport,
  MutationSuccess,
  MutationFailure,
  MutationResult,
  CreateResult,
  UpdateResult,
  AddPatternResult,
  OptimizeResult,
  MemoryEntry,
  MemoryStoreResult,
  MemoryQueryResult,
  MemoryStatsResult,
  MemoryService,
  ActionStatus,
  ExecutedAction,
  SessionError,
  SessionStatus,
  AuditChange,
  AuditOperation,
  AuditEvent,
  ContextStore,
} from "./types.js";
export { PATTERN_SECTIONS } from "./types.js";

// Store implementation
export {
  openContextStore,
  contextNameFromFile,
  toolCategoryOf,
  deepMerge,
  DEFAULT_CREATED_BY,
  DEFAULT_PRIORITY,
  DEFAULT_VERSION,
} from "./store.js";

// Validation
export {
  checkName,
  validateDocument,
  VALID_NAME_PATTERN,
  RESERVED_NAMES,
  DESCRIPTION_SOFT_LIMIT,
} from "./validation.js";
export { contextDocumentSchema } from "./schema/context-document.js";

// Corrections
export type { CompiledCorrection, ReplacementToken } from "./regex.js";
export { compileCorrection, translatePattern, parseReplacement } from "./regex.js";
export type { CorrectionOutcome } from "./corrections.js";
export { CorrectionEngine, applyCorrectionRules, compileRules } from "./corrections.js";

// Session and audit
export type { SessionInitializerOptions } from "./session.js";
export {
  SessionInitializer,
  emptySessionStatus,
  DEFAULT_RECALL_LIMIT,
  DEFAULT_TAG_SEARCH_LIMIT,
} from "./session.js";
export type { AuditHookOptions } from "./audit.js";
export {
  AuditHook,
  summarizeChange,
  auditTags,
  auditMetadata,
  DEFAULT_AUDIT_QUEUE_SIZE,
} from "./audit.js";
export {
  UnavailableMemoryService,
  TimeoutMemoryService,
  withTimeout,
  withMemoryTimeout,
  DEFAULT_MEMORY_TIMEOUT_MS,
} from "./memory.js";
export { BackupManager, backupTimestamp, BACKUP_DIR, CONTEXT_SUFFIX } from "./backup.js";

// Re-export I/O operations
export {
  atomicWrite,
  readDocument,
  readJsonObject,
  serializeDocument,
  ensureDirectory,
  listFiles,
  isJsonObject,
} from "./io.js";

// Re-export errors
export {
  ContextStoreError,
  ContextFileError,
  DocumentReadError,
  DocumentParseError,
  DocumentWriteError,
  DirectoryError,
  ListFilesError,
  MemoryServiceTimeoutError,
  describeError,
  errnoCode,
} from "./errors.js";

export { logger } from "./observability/logs.js";
export { StoreLogger, formatLogLine } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogFields, LogSink } from "./observability/logs.js";
