/**
 * Reading command input from stdin and files
 */

import * as fs from "node:fs/promises";
import { parseJsonObject } from "./arg.js";
import type { JsonObject } from "@ctxrules/sdk";

const MAX_STDIN_BYTES = 10 * 1024 * 1024;

/**
 * Read a whole stream as UTF-8
 * @throws Error once the input passes `maxBytes`
 */
export async function readStdin(
  input: NodeJS.ReadableStream = process.stdin,
  maxBytes = MAX_STDIN_BYTES
): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of input) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read a JSON object from a file
 */
export async function readJsonObjectFromFile(filePath: string): Promise<JsonObject> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJsonObject(content, `file ${filePath}`);
}
