import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, readFile, writeFile, stat, utimes } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BackupManager, backupTimestamp } from "./backup.js";
import { logger } from "./observability/logs.js";

describe("BackupManager", () => {
  let testDir: string;
  const fixedNow = () => new Date(2026, 2, 4, 5, 6, 7);

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "ctxrules-backup-"));
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

  it("should format local timestamps as YYYYMMDD_HHMMSS", () => {
    expect(backupTimestamp(new Date(2026, 0, 9, 8, 7, 6))).toBe("20260109_080706");
  });

  it("should return null when there is nothing to back up", async () => {
    const backups = new BackupManager(testDir, fixedNow);

    expect(await backups.backup("missing")).toBeNull();
    expect(await readdir(testDir)).toEqual([]);
  });

  it("should copy the current file into backups/", async () => {
    const source = join(testDir, "git_context.json");
    await writeFile(source, '{"tool_category": "git"}\n');
    const backups = new BackupManager(testDir, fixedNow);

    const backupPath = await backups.backup("git");

    expect(backupPath).toBe(join(testDir, "backups", "git_20260304_050607.json"));
    expect(await readFile(join(testDir, "backups", "git_20260304_050607.json"), "utf-8")).toBe(
      '{"tool_category": "git"}\n'
    );
  });

  it("should preserve the modification time", async () => {
    const source = join(testDir, "git_context.json");
    await writeFile(source, "{}");
    const past = new Date("2020-05-06T07:08:09.000Z");
    await utimes(source, past, past);

    const backupPath = await new BackupManager(testDir, fixedNow).backup("git");

    expect(backupPath).not.toBeNull();
    const copied = await stat(join(testDir, "backups", "git_20260304_050607.json"));
    expect(copied.mtime.getTime()).toBe(past.getTime());
  });

  it("should prefer <name>_context.json over <name>.json", async () => {
    await writeFile(join(testDir, "git.json"), '"plain"');
    await writeFile(join(testDir, "git_context.json"), '"preferred"');

    const backups = new BackupManager(testDir, fixedNow);
    expect(await backups.locate("git")).toBe(join(testDir, "git_context.json"));
  });

  it("should never overwrite a backup taken in the same second", async () => {
    await writeFile(join(testDir, "git_context.json"), "{}");
    const backups = new BackupManager(testDir, fixedNow);

    await backups.backup("git");
    await backups.backup("git");
    await backups.backup("git");

    expect((await readdir(join(testDir, "backups"))).sort()).toEqual([
      "git_20260304_050607.json",
      "git_20260304_050607_1.json",
      "git_20260304_050607_2.json",
    ]);
  });

  it("should report null instead of throwing when the copy fails", async () => {
    await writeFile(join(testDir, "git_context.json"), "{}");
    // A regular file where the backup directory should be
    await writeFile(join(testDir, "backups"), "in the way");

    const backups = new BackupManager(testDir, fixedNow);
    expect(await backups.backup("git")).toBeNull();
  });
});
