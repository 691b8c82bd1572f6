/**
 * McpMemoryService against an in-process memory server
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { McpMemoryService } from "../../service/memory-client.js";

interface Reply {
  text: string;
  isError?: boolean;
}

let server: Server;
let memory: McpMemoryService;
let replies: Map<string, Reply>;
let received: Array<{ name: string; arguments: unknown }>;

async function connectFake(
  tools?: ConstructorParameters<typeof McpMemoryService>[1]
): Promise<{ server: Server; memory: McpMemoryService }> {
  const fake = new Server({ name: "memory-fake", version: "0.0.1" }, { capabilities: { tools: {} } });
  fake.setRequestHandler(CallToolRequestSchema, async (request) => {
    received.push({ name: request.params.name, arguments: request.params.arguments });
    const reply = replies.get(request.params.name) ?? { text: "{}" };
    return { content: [{ type: "text", text: reply.text }], isError: reply.isError ?? false };
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await fake.connect(serverTransport);
  return { server: fake, memory: new McpMemoryService(clientTransport, tools) };
}

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  replies = new Map();
  received = [];

  ({ server, memory } = await connectFake());
});

afterEach(async () => {
  await memory.close();
  await server.close();
  vi.restoreAllMocks();
});

describe("McpMemoryService", () => {
  it("should store content with tags folded into metadata", async () => {
    replies.set("store_memory", { text: JSON.stringify({ success: true, content_hash: "abc123" }) });

    const result = await memory.store("prefer rebase", ["git", "workflow"], { source: "test" });

    expect(result).toEqual({ success: true, memory_id: "abc123" });
    expect(received).toEqual([
      {
        name: "store_memory",
        arguments: { content: "prefer rebase", metadata: { source: "test", tags: ["git", "workflow"] } },
      },
    ]);
  });

  it("should read nested recall results and apply the limit", async () => {
    replies.set("retrieve_memory", {
      text: JSON.stringify({
        results: [
          {
            memory: { content: "one", tags: ["git"], created_at_iso: "2026-01-01T00:00:00Z" },
            similarity_score: 0.9,
          },
          { content: "two" },
        ],
      }),
    });

    const result = await memory.recall("git", 1);

    expect(result).toEqual({
      success: true,
      results: [{ content: "one", relevance: 0.9, tags: ["git"], timestamp: "2026-01-01T00:00:00Z" }],
    });
    expect(received[0]).toEqual({ name: "retrieve_memory", arguments: { query: "git", n_results: 1 } });
  });

  it("should treat a plain-text reply as a single memory", async () => {
    replies.set("search_by_tag", { text: "remember to rebase" });

    const result = await memory.searchByTag(["git"], 10);

    expect(result).toEqual({ success: true, results: [{ content: "remember to rebase" }] });
  });

  it("should report tool errors as unsuccessful results", async () => {
    replies.set("retrieve_memory", { text: "database is locked", isError: true });

    expect(await memory.recall("git", 5)).toEqual({
      success: false,
      results: [],
      error: "database is locked",
    });
  });

  it("should flatten health statistics", async () => {
    replies.set("check_database_health", {
      text: JSON.stringify({ status: "healthy", statistics: { total_memories: 3, backend: "sqlite" } }),
    });

    expect(await memory.stats()).toEqual({
      success: true,
      total_memories: 3,
      storage_backend: "sqlite",
      service_status: "healthy",
    });
  });

  it("should use configured tool names", async () => {
    await memory.close();
    await server.close();
    ({ server, memory } = await connectFake({ recall: "memory_search" }));
    replies.set("memory_search", { text: "[]" });

    expect(await memory.recall("anything", 3)).toEqual({ success: true, results: [] });
    expect(received.map((call) => call.name)).toEqual(["memory_search"]);
  });
});
