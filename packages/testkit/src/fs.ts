/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { logger } from "@ctxrules/sdk";

/**
 * Fresh directory under the OS temp dir; callers remove it with removeDir
 */
export async function createTempContextDir(prefix = "ctxrules-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write a context document the way a user would: pretty JSON, trailing newline
 * @returns Path of the written file
 */
export async function writeContextFile(
  dir: string,
  name: string,
  doc: unknown,
  fileName = `${name}_context.json`
): Promise<string> {
  const filePath = join(dir, fileName);
  await writeFile(filePath, JSON.stringify(doc, null, 2) + "\n", "utf-8");
  return filePath;
}

/**
 * Silence store logging for the duration of a test file
 * @returns Function restoring logging
 */
export function muteLogs(): () => void {
  logger.setEnabled(false);
  return () => logger.setEnabled(true);
}
