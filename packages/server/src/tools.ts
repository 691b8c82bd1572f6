/**
 * MCP tool implementations for the context rules store
 * Every tool returns a one-line text summary followed by the JSON payload as text
 */

import { validateDocument, withMemoryTimeout, DEFAULT_MEMORY_TIMEOUT_MS, errnoCode } from "@ctxrules/sdk";
import type {
  ContextStore,
  CorrectionEngine,
  MemoryService,
  MutationFailure,
  MutationSuccess,
  SessionInitializer,
} from "@ctxrules/sdk";
import {
  ToolNameInputSchema,
  EmptyInputSchema,
  ApplyCorrectionsInputSchema,
  CreateContextInputSchema,
  UpdateContextInputSchema,
  AddPatternInputSchema,
  OptimizeContextInputSchema,
  ValidateContextInputSchema,
} from "./schemas.js";
import { logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export interface TextContent {
  type: "text";
  text: string;
}

export interface ToolResult {
  [key: string]: unknown;
  content: TextContent[];
  isError?: boolean;
}

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

export interface ToolServices {
  store: ContextStore;
  session: SessionInitializer;
  corrections: CorrectionEngine;
  memory: MemoryService;
}

export interface ToolOptions {
  /** Timeout for memory-service calls made directly by tools */
  memoryTimeoutMs?: number;
  /** Overall timeout for execute_session_initialization */
  sessionTimeoutMs?: number;
}

const READ_TIMEOUT_MS = 2000;
const WRITE_TIMEOUT_MS = 5000;
const DEFAULT_SESSION_TIMEOUT_MS = 60_000;

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly tool: string,
    public readonly timeoutMs: number
  ) {
    super(`Tool ${tool} timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

// Wraps tool execution with a timeout, logging and metrics
export async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
    });

    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, errnoCode(error));
  }
}

export function toolResult(summary: string, data: unknown, isError = false): ToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(data, null, 2) },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

function mutationResult(result: MutationSuccess | MutationFailure): ToolResult {
  return result.success
    ? toolResult(result.message, result)
    : toolResult(result.error, result, true);
}

/**
 * Tool names that change files on disk
 */
export const MUTATING_TOOLS: ReadonlySet<string> = new Set([
  "create_context_file",
  "update_context_rules",
  "add_context_pattern",
  "optimize_context",
]);

export type ToolName =
  | "get_tool_context"
  | "get_syntax_rules"
  | "get_tool_preferences"
  | "list_available_contexts"
  | "apply_auto_corrections"
  | "create_context_file"
  | "update_context_rules"
  | "add_context_pattern"
  | "optimize_context"
  | "execute_session_initialization"
  | "get_session_status"
  | "get_memory_stats"
  | "validate_context";

/**
 * Build the handler for every tool over explicitly constructed services
 */
export function createToolHandlers(services: ToolServices, options: ToolOptions = {}): Record<ToolName, ToolHandler> {
  const { store, session, corrections } = services;
  const memory = withMemoryTimeout(services.memory, options.memoryTimeoutMs ?? DEFAULT_MEMORY_TIMEOUT_MS);
  const sessionTimeoutMs = options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;

  return {
    async get_tool_context(args) {
      const { tool_name } = ToolNameInputSchema.parse(args);
      return executeTool("get_tool_context", READ_TIMEOUT_MS, async () => {
        const doc = store.getByTool(tool_name);
        const found = Object.keys(doc).length > 0;
        return toolResult(
          found ? `Context for tool '${tool_name}'` : `No context for tool '${tool_name}'`,
          doc
        );
      });
    },

    async get_syntax_rules(args) {
      const { tool_name } = ToolNameInputSchema.parse(args);
      return executeTool("get_syntax_rules", READ_TIMEOUT_MS, async () => {
        const rules = store.getSyntaxRules(tool_name);
        return toolResult(`${Object.keys(rules).length} syntax rules for '${tool_name}'`, rules);
      });
    },

    async get_tool_preferences(args) {
      const { tool_name } = ToolNameInputSchema.parse(args);
      return executeTool("get_tool_preferences", READ_TIMEOUT_MS, async () => {
        const preferences = store.getPreferences(tool_name);
        return toolResult(`${Object.keys(preferences).length} preferences for '${tool_name}'`, preferences);
      });
    },

    async list_available_contexts(args) {
      EmptyInputSchema.parse(args);
      return executeTool("list_available_contexts", READ_TIMEOUT_MS, async () => {
        const contexts = store.entries().map(([name, doc]) => ({
          name,
          tool_category: doc.tool_category,
          description: doc.description,
          auto_convert: doc.auto_convert === true,
          ...(doc.metadata?.version ? { version: doc.metadata.version } : {}),
        }));
        return toolResult(`${contexts.length} contexts available`, { contexts, count: contexts.length });
      });
    },

    async apply_auto_corrections(args) {
      const { tool_name, text } = ApplyCorrectionsInputSchema.parse(args);
      return executeTool("apply_auto_corrections", READ_TIMEOUT_MS, async () => {
        const outcome = corrections.explain(tool_name, text);
        return toolResult(`Applied ${outcome.applied.length} corrections for '${tool_name}'`, {
          original_text: text,
          corrected_text: outcome.text,
          applied_rules: outcome.applied,
          skipped_rules: outcome.skipped,
        });
      });
    },

    async create_context_file(args) {
      const { context_name, tool_category, rules } = CreateContextInputSchema.parse(args);
      return executeTool("create_context_file", WRITE_TIMEOUT_MS, async () =>
        mutationResult(await store.create(context_name, tool_category, rules ?? {}))
      );
    },

    async update_context_rules(args) {
      const { context_name, updates } = UpdateContextInputSchema.parse(args);
      return executeTool("update_context_rules", WRITE_TIMEOUT_MS, async () =>
        mutationResult(await store.update(context_name, updates))
      );
    },

    async add_context_pattern(args) {
      const { context_name, section, pattern_name, pattern_config } = AddPatternInputSchema.parse(args);
      return executeTool("add_context_pattern", WRITE_TIMEOUT_MS, async () =>
        mutationResult(await store.addPattern(context_name, section, pattern_name, pattern_config))
      );
    },

    async optimize_context(args) {
      const { context_name, updates, reason } = OptimizeContextInputSchema.parse(args);
      return executeTool("optimize_context", WRITE_TIMEOUT_MS, async () =>
        mutationResult(await store.optimize(context_name, updates, reason))
      );
    },

    async execute_session_initialization(args) {
      EmptyInputSchema.parse(args);
      return executeTool("execute_session_initialization", sessionTimeoutMs, async () => {
        const status = await session.run();
        return toolResult(
          `Initialized ${status.initialized_contexts.length} contexts with ${status.executed_actions.length} actions (${status.errors.length} errors)`,
          status
        );
      });
    },

    async get_session_status(args) {
      EmptyInputSchema.parse(args);
      return executeTool("get_session_status", READ_TIMEOUT_MS, async () => {
        const status = session.getStatus();
        return toolResult(status.initialized ? "Session initialized" : "Session not initialized", status);
      });
    },

    async get_memory_stats(args) {
      EmptyInputSchema.parse(args);
      return executeTool("get_memory_stats", WRITE_TIMEOUT_MS, async () => {
        const stats = await memory.stats();
        return toolResult(
          stats.success ? `Memory service ${stats.service_status ?? "available"}` : stats.error ?? "Memory service unavailable",
          stats,
          !stats.success
        );
      });
    },

    async validate_context(args) {
      const { document } = ValidateContextInputSchema.parse(args);
      return executeTool("validate_context", READ_TIMEOUT_MS, async () => {
        const report = validateDocument(document);
        const valid = report.errors.length === 0;
        return toolResult(valid ? "Document is valid" : `${report.errors.length} validation errors`, {
          valid,
          errors: report.errors,
          warnings: report.warnings,
        });
      });
    },
  };
}

/**
 * Tool definitions advertised by tools/list
 */
export const toolDefinitions: Array<{ name: ToolName; description: string; inputSchema: { type: "object"; properties: Record<string, object>; required?: string[] } }> = [
  {
    name: "get_tool_context",
    description: "Full context document for a tool ('<category>:<tool>' or a bare category)",
    inputSchema: {
      type: "object",
      properties: {
        tool_name: { type: "string", description: "Tool identifier, e.g. 'git:commit'" },
      },
      required: ["tool_name"],
    },
  },
  {
    name: "get_syntax_rules",
    description: "Syntax rules section for a tool",
    inputSchema: {
      type: "object",
      properties: {
        tool_name: { type: "string", description: "Tool identifier" },
      },
      required: ["tool_name"],
    },
  },
  {
    name: "get_tool_preferences",
    description: "Preferences section for a tool",
    inputSchema: {
      type: "object",
      properties: {
        tool_name: { type: "string", description: "Tool identifier" },
      },
      required: ["tool_name"],
    },
  },
  {
    name: "list_available_contexts",
    description: "List loaded contexts with their tool category and description",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "apply_auto_corrections",
    description: "Apply a tool's auto-correction rules to text, in document order",
    inputSchema: {
      type: "object",
      properties: {
        tool_name: { type: "string", description: "Tool identifier" },
        text: { type: "string", description: "Text to correct" },
      },
      required: ["tool_name", "text"],
    },
  },
  {
    name: "create_context_file",
    description: "Create a new context document (fails if the name exists)",
    inputSchema: {
      type: "object",
      properties: {
        context_name: { type: "string", description: "Letters, digits, '_' and '-' (max 50)" },
        tool_category: { type: "string", description: "Tool category the context applies to" },
        rules: { type: "object", description: "Initial sections (syntax_rules, preferences, ...)" },
      },
      required: ["context_name", "tool_category"],
    },
  },
  {
    name: "update_context_rules",
    description: "Merge updates into an existing context; metadata is deep-merged",
    inputSchema: {
      type: "object",
      properties: {
        context_name: { type: "string", description: "Existing context name" },
        updates: { type: "object", description: "Top-level sections to replace" },
      },
      required: ["context_name", "updates"],
    },
  },
  {
    name: "add_context_pattern",
    description: "Add or replace a named pattern in auto_store_triggers or auto_retrieve_triggers",
    inputSchema: {
      type: "object",
      properties: {
        context_name: { type: "string", description: "Existing context name" },
        section: {
          type: "string",
          enum: ["auto_store_triggers", "auto_retrieve_triggers"],
          description: "Trigger section",
        },
        pattern_name: { type: "string", description: "Pattern key" },
        pattern_config: { type: "object", description: "Pattern configuration" },
      },
      required: ["context_name", "section", "pattern_name", "pattern_config"],
    },
  },
  {
    name: "optimize_context",
    description: "Apply updates and bump the context's optimization count",
    inputSchema: {
      type: "object",
      properties: {
        context_name: { type: "string", description: "Existing context name" },
        updates: { type: "object", description: "Top-level sections to replace" },
        reason: { type: "string", description: "Why the context was optimized" },
      },
      required: ["context_name", "updates"],
    },
  },
  {
    name: "execute_session_initialization",
    description: "Run every enabled context's on_startup memory actions",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "get_session_status",
    description: "Status of the last session initialization",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "get_memory_stats",
    description: "Health and statistics of the memory service",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "validate_context",
    description: "Validate a candidate context document without writing it",
    inputSchema: {
      type: "object",
      properties: {
        document: { type: "object", description: "Candidate context document" },
      },
      required: ["document"],
    },
  },
];
