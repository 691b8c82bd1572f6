/**
 * Session initializer
 *
 * Runs the on_startup actions of every context that enables session initialization,
 * in context-name order and declaration order within a context. Each action is
 * isolated: a failure or timeout is recorded and the next action still runs.
 */

import { performance } from "node:perf_hooks";
import { withMemoryTimeout, DEFAULT_MEMORY_TIMEOUT_MS } from "./memory.js";
import { isJsonObject } from "./io.js";
import { describeError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type {
  ContextStore,
  ExecutedAction,
  JsonObject,
  MemoryQueryResult,
  MemoryService,
  SessionStatus,
} from "./types.js";

export const DEFAULT_RECALL_LIMIT = 5;
export const DEFAULT_TAG_SEARCH_LIMIT = 10;

export interface SessionInitializerOptions {
  timeoutMs?: number;
  now?: () => Date;
}

type ActionOutcome =
  | { status: "success"; summary: string; query?: MemoryQueryResult }
  | { status: "failed"; summary: string; error: string; query?: MemoryQueryResult }
  | { status: "skipped"; summary: string };

/**
 * Status reported before the first run
 */
export function emptySessionStatus(): SessionStatus {
  return {
    initialized: false,
    initialization_time: null,
    executed_actions: [],
    errors: [],
    memory_retrieval_results: {},
    execution_time_seconds: 0,
    initialized_contexts: [],
  };
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

function stringList(value: unknown): string[] {
  if (typeof value === "string") return value.length > 0 ? [value] : [];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === "string");
  return [];
}

export class SessionInitializer {
  #store: Pick<ContextStore, "entries">;
  #memory: MemoryService;
  #now: () => Date;
  #status: SessionStatus = emptySessionStatus();

  constructor(
    store: Pick<ContextStore, "entries">,
    memory: MemoryService,
    options: SessionInitializerOptions = {}
  ) {
    this.#store = store;
    this.#memory = withMemoryTimeout(memory, options.timeoutMs ?? DEFAULT_MEMORY_TIMEOUT_MS);
    this.#now = options.now ?? (() => new Date());
  }

  /**
   * Execute startup actions for every enabled context
   */
  async run(): Promise<SessionStatus> {
    const started = performance.now();
    const status: SessionStatus = {
      ...emptySessionStatus(),
      initialization_time: this.#now().toISOString(),
    };

    for (const [contextName, doc] of this.#store.entries()) {
      const init = doc.session_initialization;
      if (!isJsonObject(init) || init.enabled !== true) continue;

      status.initialized_contexts.push(contextName);
      const actions = isJsonObject(init.actions) ? init.actions.on_startup : undefined;
      if (!Array.isArray(actions)) continue;

      for (const declared of actions) {
        const action = isJsonObject(declared) && typeof declared.action === "string" ? declared.action : "";
        const parameters = isJsonObject(declared) && isJsonObject(declared.parameters) ? declared.parameters : {};
        const description =
          isJsonObject(declared) && typeof declared.description === "string" ? declared.description : undefined;

        const outcome = await this.#execute(action, parameters);

        const executed: ExecutedAction = {
          context: contextName,
          action,
          status: outcome.status,
          summary: outcome.summary,
          ...(description ? { description } : {}),
        };
        status.executed_actions.push(executed);

        if (outcome.status !== "skipped" && outcome.query) {
          status.memory_retrieval_results[`${contextName}_${action}`] = outcome.query;
        }
        if (outcome.status === "failed") {
          status.errors.push({ context: contextName, action, error: outcome.error });
          logger.warn("session.action_failed", {
            context: contextName,
            message: `${action}: ${outcome.error}`,
          });
        }
      }
    }

    status.initialized = true;
    status.execution_time_seconds = Math.round(performance.now() - started) / 1000;
    this.#status = status;

    logger.info("session.initialized", {
      message: `${status.executed_actions.length} actions across ${status.initialized_contexts.length} contexts, ${status.errors.length} errors`,
    });
    return this.getStatus();
  }

  /**
   * Last run's status, or the empty status before any run
   */
  getStatus(): SessionStatus {
    return structuredClone(this.#status);
  }

  async #execute(action: string, parameters: JsonObject): Promise<ActionOutcome> {
    try {
      switch (action) {
        case "recall_memory":
          return await this.#recall(parameters);
        case "search_by_tag":
          return await this.#searchByTag(parameters);
        case "store_memory":
          return await this.#storeMemory(parameters);
        default:
          return { status: "skipped", summary: `Unknown action '${action}'` };
      }
    } catch (err) {
      const error = describeError(err);
      return { status: "failed", summary: `${action} failed: ${error}`, error };
    }
  }

  async #recall(parameters: JsonObject): Promise<ActionOutcome> {
    const query = parameters.query;
    if (typeof query !== "string" || query.length === 0) {
      const error = "recall_memory requires a 'query' parameter";
      return { status: "failed", summary: error, error };
    }

    const result = await this.#memory.recall(query, positiveInt(parameters.limit, DEFAULT_RECALL_LIMIT));
    return queryOutcome(result, `Recalled ${result.results.length} memories for '${query}'`);
  }

  async #searchByTag(parameters: JsonObject): Promise<ActionOutcome> {
    const tags = stringList(parameters.tags);
    if (tags.length === 0) {
      const error = "search_by_tag requires a 'tags' parameter";
      return { status: "failed", summary: error, error };
    }

    const result = await this.#memory.searchByTag(tags, positiveInt(parameters.limit, DEFAULT_TAG_SEARCH_LIMIT));
    return queryOutcome(result, `Found ${result.results.length} memories tagged ${tags.join(", ")}`);
  }

  async #storeMemory(parameters: JsonObject): Promise<ActionOutcome> {
    const content = parameters.content;
    if (typeof content !== "string" || content.length === 0) {
      const error = "store_memory requires a 'content' parameter";
      return { status: "failed", summary: error, error };
    }

    const metadata = isJsonObject(parameters.metadata) ? parameters.metadata : {};
    const result = await this.#memory.store(content, stringList(parameters.tags), metadata);
    if (!result.success) {
      const error = result.error ?? "store failed";
      return { status: "failed", summary: `store_memory failed: ${error}`, error };
    }
    return {
      status: "success",
      summary: result.memory_id ? `Stored memory ${result.memory_id}` : "Stored memory",
    };
  }
}

function queryOutcome(result: MemoryQueryResult, summary: string): ActionOutcome {
  if (!result.success) {
    const error = result.error ?? "query failed";
    return { status: "failed", summary: error, error, query: result };
  }
  return { status: "success", summary, query: result };
}
