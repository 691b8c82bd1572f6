import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { SessionInitializer, emptySessionStatus } from "./session.js";
import { logger } from "./observability/logs.js";
import type {
  ContextDocument,
  MemoryQueryResult,
  MemoryService,
  StartupAction,
} from "./types.js";

const NOW = new Date("2026-05-06T07:08:09.000Z");

function contextWith(actions: StartupAction[], enabled = true): ContextDocument {
  return {
    tool_category: "test",
    description: "test context",
    session_initialization: { enabled, actions: { on_startup: actions } },
  };
}

describe("SessionInitializer", () => {
  let entries: Array<[string, ContextDocument]>;
  let recall: Mock<MemoryService["recall"]>;
  let searchByTag: Mock<MemoryService["searchByTag"]>;
  let storeMemory: Mock<MemoryService["store"]>;
  let memory: MemoryService;

  function createInitializer(timeoutMs?: number): SessionInitializer {
    return new SessionInitializer({ entries: () => entries }, memory, { timeoutMs, now: () => NOW });
  }

  beforeEach(() => {
    logger.setEnabled(false);
    entries = [];
    recall = vi.fn<MemoryService["recall"]>(async () => ({
      success: true,
      results: [{ content: "fixed flaky test" }],
    }));
    searchByTag = vi.fn<MemoryService["searchByTag"]>(async () => ({
      success: true,
      results: [{ content: "a" }, { content: "b" }],
    }));
    storeMemory = vi.fn<MemoryService["store"]>(async () => ({ success: true, memory_id: "m-1" }));
    memory = {
      recall,
      searchByTag,
      store: storeMemory,
      stats: async () => ({ success: true }),
    };
  });

  afterEach(() => {
    logger.setEnabled(true);
  });

  it("should report an empty status before the first run", () => {
    expect(createInitializer().getStatus()).toEqual(emptySessionStatus());
    expect(emptySessionStatus()).toEqual({
      initialized: false,
      initialization_time: null,
      executed_actions: [],
      errors: [],
      memory_retrieval_results: {},
      execution_time_seconds: 0,
      initialized_contexts: [],
    });
  });

  it("should run every declared action in order", async () => {
    entries = [
      [
        "alpha",
        contextWith([
          {
            action: "recall_memory",
            parameters: { query: "recent git work", limit: 3 },
            description: "Recall git work",
          },
          { action: "search_by_tag", parameters: { tags: "git" } },
          { action: "store_memory", parameters: { content: "session started", tags: ["session"] } },
          { action: "teleport" },
        ]),
      ],
      ["beta", contextWith([{ action: "recall_memory", parameters: { query: "ignored" } }], false)],
    ];

    const status = await createInitializer().run();

    expect(status.initialized).toBe(true);
    expect(status.initialization_time).toBe("2026-05-06T07:08:09.000Z");
    expect(status.initialized_contexts).toEqual(["alpha"]);
    expect(status.errors).toEqual([]);
    expect(status.executed_actions).toEqual([
      {
        context: "alpha",
        action: "recall_memory",
        status: "success",
        summary: "Recalled 1 memories for 'recent git work'",
        description: "Recall git work",
      },
      { context: "alpha", action: "search_by_tag", status: "success", summary: "Found 2 memories tagged git" },
      { context: "alpha", action: "store_memory", status: "success", summary: "Stored memory m-1" },
      { context: "alpha", action: "teleport", status: "skipped", summary: "Unknown action 'teleport'" },
    ]);
    expect(Object.keys(status.memory_retrieval_results)).toEqual([
      "alpha_recall_memory",
      "alpha_search_by_tag",
    ]);
    expect(status.memory_retrieval_results.alpha_search_by_tag?.results).toHaveLength(2);

    expect(recall).toHaveBeenCalledWith("recent git work", 3);
    expect(recall).toHaveBeenCalledTimes(1);
    expect(searchByTag).toHaveBeenCalledWith(["git"], 10);
    expect(storeMemory).toHaveBeenCalledWith("session started", ["session"], {});
  });

  it("should apply default limits", async () => {
    entries = [["alpha", contextWith([{ action: "recall_memory", parameters: { query: "q", limit: -2 } }])]];

    await createInitializer().run();

    expect(recall).toHaveBeenCalledWith("q", 5);
  });

  it("should keep going after a failing action", async () => {
    recall.mockRejectedValueOnce(new Error("boom"));
    entries = [
      [
        "gamma",
        contextWith([
          { action: "recall_memory", parameters: { query: "q" } },
          { action: "search_by_tag", parameters: { tags: ["ops", "deploy"] } },
        ]),
      ],
      ["zeta", contextWith([{ action: "store_memory", parameters: { content: "hello" } }])],
    ];

    const status = await createInitializer().run();

    expect(status.errors).toEqual([{ context: "gamma", action: "recall_memory", error: "boom" }]);
    expect(status.executed_actions.map((a) => [a.context, a.action, a.status])).toEqual([
      ["gamma", "recall_memory", "failed"],
      ["gamma", "search_by_tag", "success"],
      ["zeta", "store_memory", "success"],
    ]);
    expect(status.executed_actions[0]?.summary).toBe("recall_memory failed: boom");
    expect(status.executed_actions[1]?.summary).toBe("Found 2 memories tagged ops, deploy");
    expect(status.initialized_contexts).toEqual(["gamma", "zeta"]);
  });

  it("should time out a hung call and continue", async () => {
    recall.mockImplementationOnce(() => new Promise<MemoryQueryResult>(() => undefined));
    entries = [
      [
        "alpha",
        contextWith([
          { action: "recall_memory", parameters: { query: "q" } },
          { action: "store_memory", parameters: { content: "after" } },
        ]),
      ],
    ];

    const status = await createInitializer(20).run();

    expect(status.errors).toEqual([
      { context: "alpha", action: "recall_memory", error: "Memory service recall timed out after 20ms" },
    ]);
    expect(status.executed_actions[1]?.status).toBe("success");
  });

  it("should record unsuccessful responses as failures", async () => {
    recall.mockResolvedValueOnce({ success: false, results: [], error: "index offline" });
    entries = [["alpha", contextWith([{ action: "recall_memory", parameters: { query: "q" } }])]];

    const status = await createInitializer().run();

    expect(status.errors).toEqual([{ context: "alpha", action: "recall_memory", error: "index offline" }]);
    expect(status.memory_retrieval_results.alpha_recall_memory).toEqual({
      success: false,
      results: [],
      error: "index offline",
    });
  });

  it("should fail actions that lack required parameters", async () => {
    entries = [
      [
        "alpha",
        contextWith([
          { action: "recall_memory", parameters: {} },
          { action: "search_by_tag" },
          { action: "store_memory", parameters: { content: "" } },
        ]),
      ],
    ];

    const status = await createInitializer().run();

    expect(status.errors.map((e) => e.error)).toEqual([
      "recall_memory requires a 'query' parameter",
      "search_by_tag requires a 'tags' parameter",
      "store_memory requires a 'content' parameter",
    ]);
    expect(recall).not.toHaveBeenCalled();
  });

  it("should replace the status on every run", async () => {
    const initializer = createInitializer();
    entries = [["alpha", contextWith([{ action: "teleport" }])]];
    await initializer.run();

    entries = [];
    const second = await initializer.run();

    expect(second.executed_actions).toEqual([]);
    expect(initializer.getStatus().initialized_contexts).toEqual([]);
    expect(initializer.getStatus().initialized).toBe(true);
  });
});
