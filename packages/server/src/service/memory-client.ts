/**
 * Memory service backed by an external MCP server
 *
 * Talks to a memory server (spawned over stdio in production) through its tools.
 * Responses are read from text content: JSON when it parses, plain text otherwise.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { describeError, isJsonObject } from "@ctxrules/sdk";
import type {
  JsonObject,
  MemoryEntry,
  MemoryQueryResult,
  MemoryService,
  MemoryStatsResult,
  MemoryStoreResult,
} from "@ctxrules/sdk";
import { logger } from "../observability/logger.js";

export interface MemoryToolNames {
  store: string;
  recall: string;
  searchByTag: string;
  stats: string;
}

export const DEFAULT_MEMORY_TOOLS: MemoryToolNames = {
  store: "store_memory",
  recall: "retrieve_memory",
  searchByTag: "search_by_tag",
  stats: "check_database_health",
};

interface ToolReply {
  isError: boolean;
  text: string;
  payload: unknown;
}

export class McpMemoryService implements MemoryService {
  #client: Client;
  #transport: Transport;
  #tools: MemoryToolNames;
  #connection: Promise<void> | null = null;

  constructor(transport: Transport, tools: Partial<MemoryToolNames> = {}) {
    this.#transport = transport;
    this.#tools = { ...DEFAULT_MEMORY_TOOLS, ...tools };
    this.#client = new Client({ name: "ctxrules-memory-client", version: "0.1.0" });
  }

  /**
   * Client for a memory server started as a child process
   */
  static spawn(command: string, args: string[], tools?: Partial<MemoryToolNames>): McpMemoryService {
    const transport = new StdioClientTransport({ command, args, stderr: "inherit" });
    return new McpMemoryService(transport, tools);
  }

  async store(content: string, tags: string[], metadata: JsonObject): Promise<MemoryStoreResult> {
    const reply = await this.#call(this.#tools.store, { content, metadata: { ...metadata, tags } });
    if (reply.isError) {
      return { success: false, error: reply.text || "store failed" };
    }
    if (isJsonObject(reply.payload)) {
      const id = reply.payload.memory_id ?? reply.payload.content_hash ?? reply.payload.id;
      const error = typeof reply.payload.error === "string" ? reply.payload.error : undefined;
      return {
        success: reply.payload.success !== false,
        ...(typeof id === "string" ? { memory_id: id } : {}),
        ...(error ? { error } : {}),
      };
    }
    return { success: true };
  }

  async recall(query: string, limit: number): Promise<MemoryQueryResult> {
    return this.#query(this.#tools.recall, { query, n_results: limit }, limit);
  }

  async searchByTag(tags: string[], limit: number): Promise<MemoryQueryResult> {
    return this.#query(this.#tools.searchByTag, { tags }, limit);
  }

  async stats(): Promise<MemoryStatsResult> {
    const reply = await this.#call(this.#tools.stats, {});
    if (reply.isError) {
      return { success: false, service_status: "error", error: reply.text || "health check failed" };
    }
    if (!isJsonObject(reply.payload)) {
      return { success: true, service_status: reply.text || "healthy" };
    }

    const stats = isJsonObject(reply.payload.statistics) ? { ...reply.payload, ...reply.payload.statistics } : reply.payload;
    const total = stats.total_memories;
    const tags = stats.tags_available ?? stats.unique_tags;
    const backend = stats.storage_backend ?? stats.backend;
    const status = stats.service_status ?? stats.status;
    return {
      success: stats.success !== false,
      ...(typeof total === "number" ? { total_memories: total } : {}),
      ...(Array.isArray(tags) ? { tags_available: tags.filter((tag): tag is string => typeof tag === "string") } : {}),
      ...(typeof backend === "string" ? { storage_backend: backend } : {}),
      service_status: typeof status === "string" ? status : "healthy",
    };
  }

  async close(): Promise<void> {
    if (this.#connection) {
      this.#connection = null;
      await this.#client.close();
    }
  }

  async #query(tool: string, args: JsonObject, limit: number): Promise<MemoryQueryResult> {
    const reply = await this.#call(tool, args);
    if (reply.isError) {
      return { success: false, results: [], error: reply.text || `${tool} failed` };
    }
    return { success: true, results: toEntries(reply).slice(0, limit) };
  }

  async #call(name: string, args: JsonObject): Promise<ToolReply> {
    await this.#connect();
    const result: unknown = await this.#client.callTool({ name, arguments: args });
    const reply = readReply(result);
    logger.debug("memory.call", { tool: name, is_error: reply.isError });
    return reply;
  }

  #connect(): Promise<void> {
    if (!this.#connection) {
      this.#connection = this.#client.connect(this.#transport).catch((err: unknown) => {
        this.#connection = null;
        throw new Error(`Memory service connection failed: ${describeError(err)}`, { cause: err });
      });
    }
    return this.#connection;
  }
}

function readReply(result: unknown): ToolReply {
  if (!isJsonObject(result)) {
    return { isError: true, text: "malformed tool result", payload: null };
  }

  const content = Array.isArray(result.content) ? result.content : [];
  const text = content
    .filter(isJsonObject)
    .flatMap((item) => (item.type === "text" && typeof item.text === "string" ? [item.text] : []))
    .join("\n")
    .trim();

  return { isError: result.isError === true, text, payload: parseJson(text) };
}

function parseJson(text: string): unknown {
  if (!text.startsWith("{") && !text.startsWith("[")) {
    return text;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function toEntries(reply: ToolReply): MemoryEntry[] {
  const { payload } = reply;
  const list = Array.isArray(payload)
    ? payload
    : isJsonObject(payload)
      ? payload.results ?? payload.memories ?? []
      : reply.text
        ? [{ content: reply.text }]
        : [];
  if (!Array.isArray(list)) {
    return [];
  }
  return list.flatMap((item): MemoryEntry[] => {
    const entry = isJsonObject(item) && isJsonObject(item.memory) ? { ...item.memory, ...item } : item;
    if (!isJsonObject(entry) || typeof entry.content !== "string") {
      return [];
    }
    const relevance = entry.relevance ?? entry.relevance_score ?? entry.similarity_score;
    const timestamp = entry.timestamp ?? entry.created_at_iso;
    return [
      {
        content: entry.content,
        ...(typeof relevance === "number" ? { relevance } : {}),
        ...(Array.isArray(entry.tags) ? { tags: entry.tags.filter((tag): tag is string => typeof tag === "string") } : {}),
        ...(typeof timestamp === "string" ? { timestamp } : {}),
      },
    ];
  });
}
