import { describe, it, expect } from "vitest";
import { StoreLogger, formatLogLine } from "./logs.js";

describe("formatLogLine", () => {
  it("should include only the fields that are set", () => {
    expect(
      formatLogLine({ timestamp: "2026-05-01T12:00:00.000Z", level: "warn", event: "backup.failed", context: "git" })
    ).toBe("[2026-05-01T12:00:00.000Z] WARN backup.failed git");
  });

  it("should append file, message and details in order", () => {
    expect(
      formatLogLine({
        timestamp: "2026-05-01T12:00:00.000Z",
        level: "info",
        event: "context.written",
        context: "git",
        file: "/tmp/git_context.json",
        message: "ok",
        details: { bytes: 12 },
      })
    ).toBe('[2026-05-01T12:00:00.000Z] INFO context.written git (/tmp/git_context.json) ok {"bytes":12}');
  });
});

describe("StoreLogger", () => {
  it("should drop debug lines unless debug is on", () => {
    const lines: string[] = [];
    let debug = false;
    const log = new StoreLogger((line) => lines.push(line), () => debug);

    log.debug("context.loaded");
    debug = true;
    log.debug("context.loaded", { context: "git" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ DEBUG context\.loaded git$/);
  });

  it("should write nothing while disabled", () => {
    const lines: string[] = [];
    const log = new StoreLogger((line) => lines.push(line));

    log.setEnabled(false);
    log.error("context.write_failed");
    log.setEnabled(true);
    log.error("context.write_failed");

    expect(lines).toHaveLength(1);
  });
});
