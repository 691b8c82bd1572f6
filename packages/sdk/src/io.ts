/**
 * File I/O for context documents
 *
 * Writes never leave a partial document behind: content goes to a temp file in
 * the target's directory, is flushed, then renamed over the target. Temp files
 * are removed when any step fails. Reads are UTF-8.
 */

import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  DocumentReadError,
  DocumentParseError,
  DocumentWriteError,
  DirectoryError,
  ListFilesError,
  errnoCode,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import type { JsonObject } from "./types.js";

// Error codes meaning "this filesystem cannot do that"
const UNSUPPORTED_SYNC = new Set(["ENOTSUP", "ENOSYS", "EINVAL", "EBADF", "EISDIR"]);
const TRANSIENT_RENAME = new Set(["EPERM", "EACCES", "EBUSY"]);

/**
 * Create a directory and its parents
 * @throws DirectoryError
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(dirPath, { cause: new TypeError("Directory path must be a non-empty string") });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
}

async function writeFlushed(tmp: string, content: string): Promise<void> {
  const handle = await fs.open(tmp, "w", 0o644);
  try {
    await handle.writeFile(content, "utf-8");
    try {
      await handle.datasync();
    } catch (err) {
      if (!UNSUPPORTED_SYNC.has(errnoCode(err) ?? "")) throw err;
      await handle.sync();
    }
  } finally {
    await handle.close();
  }
}

async function renameInto(tmp: string, filePath: string): Promise<void> {
  try {
    await fs.rename(tmp, filePath);
  } catch (err) {
    // Windows scanners can hold a freshly written file for a moment
    if (process.platform !== "win32" || !TRANSIENT_RENAME.has(errnoCode(err) ?? "")) throw err;
    await new Promise((resolve) => setTimeout(resolve, 10));
    await fs.rename(tmp, filePath);
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const handle = await fs.open(dir, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (err) {
    if (!UNSUPPORTED_SYNC.has(errnoCode(err) ?? "")) {
      logger.debug("io.dir_sync_failed", { file: dir, message: err instanceof Error ? err.message : String(err) });
    }
  }
}

/**
 * Replace a file's content atomically
 * @throws DirectoryError if the parent directory cannot be created
 * @throws DocumentWriteError for any other failure; the target is left as it was
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDirectory(dir);

  const tmp = tempPathFor(filePath);
  try {
    await writeFlushed(tmp, content);
    await renameInto(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw new DocumentWriteError(filePath, { cause: err });
  }

  await syncDirectory(dir);
}

/**
 * Serialize a document the way the store writes it: two-space indent, trailing newline.
 * Key order is the document's own; auto_corrections order is significant.
 */
export function serializeDocument(doc: unknown): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

/**
 * Read a UTF-8 file
 * @throws DocumentReadError for any read failure
 */
export async function readDocument(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Read and parse a JSON object file
 * @throws DocumentReadError if the file cannot be read
 * @throws DocumentParseError if it is not valid JSON or not an object
 */
export async function readJsonObject(filePath: string): Promise<JsonObject> {
  const raw = await readDocument(filePath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.replace(/^\uFEFF/, ""));
  } catch (err) {
    throw new DocumentParseError(filePath, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new DocumentParseError(filePath, "top-level value must be a JSON object");
  }
  return parsed;
}

/**
 * Check whether a file exists (any type)
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Names of the regular files in a directory, sorted
 *
 * A missing directory lists as empty.
 * @throws ListFilesError if the directory exists but cannot be read
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw new ListFilesError(dirPath, { cause: err });
  }

  const suffix = extension === undefined || extension.startsWith(".") ? extension : `.${extension}`;
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => suffix === undefined || name.endsWith(suffix))
    .sort();
}

/**
 * Narrow an unknown value to a plain JSON object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
