import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { applyCorrectionRules, compileRules, CorrectionEngine } from "./corrections.js";
import { openContextStore } from "./store.js";
import { logger } from "./observability/logs.js";
import type { ContextDocument } from "./types.js";

describe("applyCorrectionRules", () => {
  beforeEach(() => logger.setEnabled(false));
  afterEach(() => logger.setEnabled(true));

  it("should feed each rule's output into the next", () => {
    const rules = {
      first: { pattern: "a", replacement: "b" },
      second: { pattern: "b", replacement: "c" },
    };

    expect(applyCorrectionRules(rules, "a")).toEqual({
      text: "c",
      applied: ["first", "second"],
      skipped: [],
    });
  });

  it("should respect declaration order rather than name order", () => {
    const rules = {
      zz: { pattern: "cat", replacement: "dog" },
      aa: { pattern: "dog", replacement: "bird" },
    };

    expect(applyCorrectionRules(rules, "cat").text).toBe("bird");
  });

  it("should skip incomplete and broken rules and apply the rest", () => {
    const rules = {
      no_replacement: { pattern: "x" },
      not_a_rule: "x",
      broken: { pattern: "(", replacement: "y" },
      typo: { pattern: "\\bteh\\b", replacement: "the" },
    };

    const outcome = applyCorrectionRules(rules, "teh x");

    expect(outcome.text).toBe("the x");
    expect(outcome.applied).toEqual(["typo"]);
    expect(outcome.skipped.map((s) => s.rule)).toEqual(["no_replacement", "not_a_rule", "broken"]);
  });

  it("should match line anchors on every line", () => {
    const rules = { trailing: { pattern: "[ \\t]+$", replacement: "" } };

    expect(applyCorrectionRules(rules, "one  \ntwo\t\nthree").text).toBe("one\ntwo\nthree");
  });

  it("should return text unchanged without rules", () => {
    expect(applyCorrectionRules(undefined, "as is").text).toBe("as is");
    expect(applyCorrectionRules("nonsense", "as is").text).toBe("as is");
  });

  it("should compile only usable rules", () => {
    const { compiled, skipped } = compileRules({
      ok: { pattern: "a", replacement: "b" },
      bad: { replacement: "b" },
    });

    expect(compiled.map((rule) => rule.name)).toEqual(["ok"]);
    expect(skipped).toEqual([{ rule: "bad", reason: "missing pattern or replacement" }]);
  });
});

describe("CorrectionEngine", () => {
  it("should resolve the tool through the store", () => {
    const docs: Record<string, Partial<ContextDocument>> = {
      markdown: {
        tool_category: "markdown",
        description: "Markdown",
        auto_corrections: { bullets: { pattern: "^\\* ", replacement: "- " } },
      },
    };
    const engine = new CorrectionEngine({
      getByTool: (toolId) => docs[toolId.split(":")[0] ?? ""] ?? {},
    });

    expect(engine.applyCorrections("markdown:render", "* a\n* b")).toBe("- a\n- b");
    expect(engine.applyCorrections("wiki:save", "* a")).toBe("* a");
  });

  describe("with a store on disk", () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await mkdtemp(join(tmpdir(), "ctxrules-corrections-"));
      logger.setEnabled(false);
    });

    afterEach(async () => {
      logger.setEnabled(true);
      try {
        await rm(testDir, { recursive: true, force: true });
      } catch {
        // Ignore cleanup errors
      }
    });

    it("should correct text for a namespaced tool", async () => {
      await writeFile(
        join(testDir, "git_context.json"),
        JSON.stringify({
          tool_category: "git",
          description: "Git conventions",
          auto_corrections: { typo: { pattern: "\\bteh\\b", replacement: "the" } },
        })
      );
      const store = await openContextStore({ dir: testDir, audit: false });
      const engine = new CorrectionEngine(store);

      expect(engine.applyCorrections("git:commit", "teh commit")).toBe("the commit");
      await store.close();
    });
  });
});
