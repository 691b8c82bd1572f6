import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  atomicWrite,
  readDocument,
  readJsonObject,
  serializeDocument,
  ensureDirectory,
  listFiles,
  fileExists,
  isJsonObject,
} from "./io.js";
import { DocumentReadError, DocumentParseError, DocumentWriteError, ListFilesError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "ctxrules-io-"));
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe("atomicWrite and readDocument", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "git_context.json");
      await atomicWrite(filePath, '{"tool_category": "git"}');

      expect(await readDocument(filePath)).toBe('{"tool_category": "git"}');
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "a.json"), "{}");

      const files = await readdir(testDir);
      expect(files).toEqual(["a.json"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "a.json");
      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readDocument(filePath)).toBe("second");
    });

    it("should create parent directories automatically", async () => {
      const filePath = join(testDir, "nested", "deeper", "a.json");
      await atomicWrite(filePath, "{}");

      expect(await readDocument(filePath)).toBe("{}");
    });

    it("should throw DocumentWriteError when the target is a directory", async () => {
      const target = join(testDir, "occupied");
      await mkdir(target);

      await expect(atomicWrite(target, "{}")).rejects.toBeInstanceOf(DocumentWriteError);
      const files = await readdir(testDir);
      expect(files).toEqual(["occupied"]);
    });

    it("should throw DocumentReadError with the path for a missing file", async () => {
      const filePath = join(testDir, "missing.json");

      await expect(readDocument(filePath)).rejects.toThrow(`Failed to read document: ${filePath}`);
      await expect(readDocument(filePath)).rejects.toBeInstanceOf(DocumentReadError);
    });
  });

  describe("readJsonObject", () => {
    it("should parse an object and strip a BOM", async () => {
      const filePath = join(testDir, "bom.json");
      await writeFile(filePath, '\uFEFF{"description": "with bom"}', "utf-8");

      expect(await readJsonObject(filePath)).toEqual({ description: "with bom" });
    });

    it("should reject malformed JSON", async () => {
      const filePath = join(testDir, "broken.json");
      await writeFile(filePath, "{ not json", "utf-8");

      await expect(readJsonObject(filePath)).rejects.toBeInstanceOf(DocumentParseError);
    });

    it("should reject a top-level array", async () => {
      const filePath = join(testDir, "list.json");
      await writeFile(filePath, "[1, 2]", "utf-8");

      await expect(readJsonObject(filePath)).rejects.toThrow(
        `Failed to parse document ${filePath}: top-level value must be a JSON object`
      );
    });
  });

  describe("serializeDocument", () => {
    it("should use two-space indent and a trailing newline", () => {
      expect(serializeDocument({ a: 1, b: { c: true } })).toBe('{\n  "a": 1,\n  "b": {\n    "c": true\n  }\n}\n');
    });

    it("should keep insertion order of keys", async () => {
      const filePath = join(testDir, "ordered.json");
      await atomicWrite(filePath, serializeDocument({ zeta: 1, alpha: 2 }));

      const raw = await readFile(filePath, "utf-8");
      expect(Object.keys(JSON.parse(raw))).toEqual(["zeta", "alpha"]);
    });
  });

  describe("listFiles", () => {
    it("should return a sorted list filtered by extension", async () => {
      await writeFile(join(testDir, "b.json"), "{}");
      await writeFile(join(testDir, "a.json"), "{}");
      await writeFile(join(testDir, "notes.txt"), "x");
      await mkdir(join(testDir, "backups"));

      expect(await listFiles(testDir, ".json")).toEqual(["a.json", "b.json"]);
      expect(await listFiles(testDir, "json")).toEqual(["a.json", "b.json"]);
    });

    it("should return empty array for non-existent directory", async () => {
      expect(await listFiles(join(testDir, "nope"))).toEqual([]);
    });

    it("should throw ListFilesError for non-directory paths", async () => {
      const filePath = join(testDir, "file.json");
      await writeFile(filePath, "{}");

      await expect(listFiles(filePath)).rejects.toBeInstanceOf(ListFilesError);
    });
  });

  describe("helpers", () => {
    it("should create directories idempotently", async () => {
      const dir = join(testDir, "x", "y");
      await ensureDirectory(dir);
      await ensureDirectory(dir);

      expect(await fileExists(dir)).toBe(true);
    });

    it("should recognise plain objects only", () => {
      expect(isJsonObject({})).toBe(true);
      expect(isJsonObject([])).toBe(false);
      expect(isJsonObject(null)).toBe(false);
      expect(isJsonObject("x")).toBe(false);
    });
  });
});
