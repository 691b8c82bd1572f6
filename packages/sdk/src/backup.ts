/**
 * Backup-before-write for context documents
 *
 * Backups are append-only copies under <dir>/backups named <name>_<YYYYMMDD_HHMMSS>.json.
 * Two backups of one document inside the same second get a numeric suffix instead of
 * overwriting each other. Nothing here ever throws: a failed backup is logged and
 * reported as null so the caller's mutation can proceed.
 */

import * as fs from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import { ensureDirectory, fileExists } from "./io.js";
import { errnoCode, describeError } from "./errors.js";
import { logger } from "./observability/logs.js";

export const BACKUP_DIR = "backups";
export const CONTEXT_SUFFIX = "_context.json";

const MAX_SAME_SECOND_BACKUPS = 1000;

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * Format a local timestamp as YYYYMMDD_HHMMSS
 */
export function backupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class BackupManager {
  #dir: string;
  #backupDir: string;
  #now: () => Date;

  constructor(dir: string, now: () => Date = () => new Date()) {
    this.#dir = dir;
    this.#backupDir = join(dir, BACKUP_DIR);
    this.#now = now;
  }

  get backupDir(): string {
    return this.#backupDir;
  }

  /**
   * Locate the file currently holding a context, preferring <name>_context.json
   */
  async locate(name: string): Promise<string | null> {
    for (const candidate of [`${name}${CONTEXT_SUFFIX}`, `${name}.json`]) {
      const filePath = join(this.#dir, candidate);
      if (await fileExists(filePath)) {
        return filePath;
      }
    }
    return null;
  }

  /**
   * Copy the current file for `name` into the backup directory
   * @param name - Context name, used for the backup file name
   * @param sourcePath - File to copy; located by name when omitted
   * @returns Backup path, or null when there was nothing to back up or the copy failed
   */
  async backup(name: string, sourcePath?: string): Promise<string | null> {
    const source = sourcePath ?? (await this.locate(name));
    if (!source || !(await fileExists(source))) {
      return null;
    }

    try {
      await ensureDirectory(this.#backupDir);
      const stamp = backupTimestamp(this.#now());

      for (let attempt = 0; attempt < MAX_SAME_SECOND_BACKUPS; attempt++) {
        const suffix = attempt === 0 ? "" : `_${attempt}`;
        const target = join(this.#backupDir, `${name}_${stamp}${suffix}.json`);
        try {
          await fs.copyFile(source, target, constants.COPYFILE_EXCL);
        } catch (err) {
          if (errnoCode(err) === "EEXIST") continue;
          throw err;
        }

        const stats = await fs.stat(source);
        await fs.utimes(target, stats.atime, stats.mtime);

        logger.debug("backup.created", { context: name, file: target });
        return target;
      }

      throw new Error(`too many backups for ${name} within one second`);
    } catch (err) {
      logger.warn("backup.failed", {
        context: name,
        file: source,
        message: describeError(err),
      });
      return null;
    }
  }
}
