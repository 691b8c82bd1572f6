/**
 * Integration tests for MCP tools
 * Runs the handlers against a real store over a temp directory
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { z } from "zod";
import {
  CorrectionEngine,
  MemoryServiceTimeoutError,
  SessionInitializer,
  openContextStore,
} from "@ctxrules/sdk";
import type { ContextStore } from "@ctxrules/sdk";
import {
  FakeMemoryService,
  createTempContextDir,
  removeDir,
  writeContextFile,
  muteLogs,
  createClock,
  type TestClock,
} from "@ctxrules/testkit";
import {
  createToolHandlers,
  executeTool,
  ToolTimeoutError,
  type ToolResult,
  type ToolServices,
} from "../../tools.js";
import { metrics } from "../../observability/metrics.js";

const gitContext = {
  tool_category: "git",
  description: "Git rules",
  auto_convert: true,
  syntax_rules: { commit_style: "conventional" },
  preferences: { sign_commits: true },
  auto_corrections: {
    teh: { pattern: "\\bteh\\b", replacement: "the" },
  },
  session_initialization: {
    enabled: true,
    actions: {
      on_startup: [
        { action: "recall_memory", parameters: { query: "git conventions" }, description: "Recall git notes" },
      ],
    },
  },
};

function summary(result: ToolResult): string | undefined {
  return result.content[0]?.text;
}

function payload(result: ToolResult): unknown {
  return JSON.parse(result.content[1]?.text ?? "null");
}

let dir: string;
let store: ContextStore;
let memory: FakeMemoryService;
let services: ToolServices;
let clock: TestClock;
let unmute: () => void;

beforeEach(async () => {
  unmute = muteLogs();
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  metrics.reset();

  dir = await createTempContextDir();
  await writeContextFile(dir, "git", gitContext);

  clock = createClock("2026-05-01T12:00:00.000Z");
  memory = new FakeMemoryService(clock.now);
  store = await openContextStore({ dir, memory, now: clock.now });
  services = {
    store,
    memory,
    session: new SessionInitializer(store, memory, { now: clock.now }),
    corrections: new CorrectionEngine(store),
  };
});

afterEach(async () => {
  await store.close();
  await removeDir(dir);
  vi.restoreAllMocks();
  unmute();
});

describe("read tools", () => {
  it("should resolve a tool through its category", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.get_tool_context({ tool_name: "git:commit" });

    expect(summary(result)).toBe("Context for tool 'git:commit'");
    expect(payload(result)).toMatchObject({ tool_category: "git", description: "Git rules" });
  });

  it("should return an empty object for an unknown tool", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.get_tool_context({ tool_name: "svn:log" });

    expect(summary(result)).toBe("No context for tool 'svn:log'");
    expect(payload(result)).toEqual({});
  });

  it("should return syntax rules and preferences", async () => {
    const tools = createToolHandlers(services);

    const rules = await tools.get_syntax_rules({ tool_name: "git:push" });
    const preferences = await tools.get_tool_preferences({ tool_name: "git" });

    expect(summary(rules)).toBe("1 syntax rules for 'git:push'");
    expect(payload(rules)).toEqual({ commit_style: "conventional" });
    expect(payload(preferences)).toEqual({ sign_commits: true });
  });

  it("should list loaded contexts", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.list_available_contexts({});

    expect(summary(result)).toBe("1 contexts available");
    expect(payload(result)).toEqual({
      contexts: [{ name: "git", tool_category: "git", description: "Git rules", auto_convert: true }],
      count: 1,
    });
  });

  it("should apply auto-corrections", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.apply_auto_corrections({ tool_name: "git:commit", text: "teh commit" });

    expect(summary(result)).toBe("Applied 1 corrections for 'git:commit'");
    expect(payload(result)).toEqual({
      original_text: "teh commit",
      corrected_text: "the commit",
      applied_rules: ["teh"],
      skipped_rules: [],
    });
  });

  it("should reject malformed arguments with a ZodError", async () => {
    const tools = createToolHandlers(services);

    await expect(tools.get_syntax_rules({})).rejects.toBeInstanceOf(z.ZodError);
    await expect(tools.create_context_file({ context_name: "docker" })).rejects.toBeInstanceOf(z.ZodError);
  });
});

describe("mutating tools", () => {
  it("should create a context that later lookups resolve", async () => {
    const tools = createToolHandlers(services);

    const created = await tools.create_context_file({
      context_name: "docker",
      tool_category: "docker",
      rules: { description: "Docker rules" },
    });
    const lookup = await tools.get_tool_context({ tool_name: "docker:build" });

    expect(summary(created)).toBe("Created context 'docker'");
    expect(created.isError).toBeUndefined();
    expect(payload(created)).toMatchObject({ success: true, context_name: "docker", tool_category: "docker" });
    expect(payload(lookup)).toMatchObject({ tool_category: "docker", description: "Docker rules" });
  });

  it("should report a conflict as an error result", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.create_context_file({
      context_name: "git",
      tool_category: "git",
      rules: { description: "Again" },
    });

    expect(result.isError).toBe(true);
    expect(summary(result)).toBe("Context 'git' already exists");
    expect(payload(result)).toMatchObject({ success: false, available_contexts: ["git"] });
  });

  it("should report a missing context on update", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.update_context_rules({ context_name: "missing", updates: { auto_convert: false } });

    expect(result.isError).toBe(true);
    expect(summary(result)).toBe("Context 'missing' not found");
    expect(store.listContexts()).toEqual(["git"]);
  });

  it("should add a trigger pattern", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.add_context_pattern({
      context_name: "git",
      section: "auto_store_triggers",
      pattern_name: "errors",
      pattern_config: { patterns: ["error"] },
    });

    expect(summary(result)).toBe("Added pattern 'errors' to auto_store_triggers in context 'git'");
    expect(store.getContext("git")?.auto_store_triggers).toEqual({ errors: { patterns: ["error"] } });
  });

  it("should bump the optimization count", async () => {
    const tools = createToolHandlers(services);
    clock.advance(60_000);

    const result = await tools.optimize_context({
      context_name: "git",
      updates: { preferences: { sign_commits: false } },
      reason: "unsigned in CI",
    });

    expect(summary(result)).toBe("Optimized context 'git'");
    expect(payload(result)).toMatchObject({ optimization_count: 1, updated_fields: ["preferences"] });
    expect(store.getPreferences("git")).toEqual({ sign_commits: false });
    expect(store.getContext("git")?.metadata?.last_updated).toBe("2026-05-01T12:01:00.000Z");
  });
});

describe("session and memory tools", () => {
  it("should run startup actions and expose the status", async () => {
    await memory.store("git conventions: squash before merge", ["git"], {});
    const tools = createToolHandlers(services);

    const before = await tools.get_session_status({});
    const run = await tools.execute_session_initialization({});
    const after = await tools.get_session_status(undefined);

    expect(summary(before)).toBe("Session not initialized");
    expect(summary(run)).toBe("Initialized 1 contexts with 1 actions (0 errors)");
    expect(summary(after)).toBe("Session initialized");
    expect(payload(after)).toMatchObject({
      initialized: true,
      initialized_contexts: ["git"],
      executed_actions: [
        {
          context: "git",
          action: "recall_memory",
          status: "success",
          summary: "Recalled 1 memories for 'git conventions'",
        },
      ],
    });
  });

  it("should report memory statistics", async () => {
    const tools = createToolHandlers(services);

    const result = await tools.get_memory_stats({});

    expect(summary(result)).toBe("Memory service healthy");
    expect(payload(result)).toEqual({
      success: true,
      total_memories: 0,
      tags_available: [],
      storage_backend: "in-memory",
      service_status: "healthy",
    });
  });

  it("should time out a hung memory service", async () => {
    memory.hang("stats");
    const tools = createToolHandlers(services, { memoryTimeoutMs: 20 });

    await expect(tools.get_memory_stats({})).rejects.toBeInstanceOf(MemoryServiceTimeoutError);
  });
});

describe("validate_context", () => {
  it("should report validation errors without writing", async () => {
    const tools = createToolHandlers(services);

    const invalid = await tools.validate_context({ document: { tool_category: "terraform" } });
    const valid = await tools.validate_context({
      document: { tool_category: "terraform", description: "Terraform rules" },
    });

    expect(summary(invalid)).toBe("1 validation errors");
    expect(payload(invalid)).toEqual({
      valid: false,
      errors: ["Missing required field: description"],
      warnings: [],
    });
    expect(summary(valid)).toBe("Document is valid");
    expect(store.listContexts()).toEqual(["git"]);
  });
});

describe("executeTool", () => {
  it("should time out slow handlers and record the failure", async () => {
    await expect(executeTool("slow_tool", 10, () => new Promise<never>(() => undefined))).rejects.toThrow(
      ToolTimeoutError
    );

    expect(metrics.getCounter("ctxrules.tool.calls_total", { tool: "slow_tool" })).toBe(1);
    expect(metrics.getCounter("ctxrules.tool.errors_total", { tool: "slow_tool", err_code: "ETIMEDOUT" })).toBe(1);
  });
});
