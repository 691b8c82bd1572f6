/**
 * validate command: check context files without loading them into a store
 */

import * as path from "node:path";
import { Command } from "commander";
import {
  DocumentParseError,
  contextNameFromFile,
  describeError,
  listFiles,
  readJsonObject,
  validateDocument,
} from "@ctxrules/sdk";
import { colorize, printJson, printLines } from "../lib/render.js";
import { EXIT_INVALID, EXIT_OK } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";
import type { CommandContext } from "../program.js";

export interface FileReport {
  file: string;
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validate one file on disk
 */
export async function validateFile(filePath: string): Promise<FileReport> {
  try {
    const doc = await readJsonObject(filePath);
    const report = validateDocument(doc);
    const warnings = [...report.warnings];
    if (contextNameFromFile(path.basename(filePath)) === null) {
      warnings.push("file name does not end in .json; the store will not load it");
    }
    return { file: filePath, valid: report.errors.length === 0, errors: report.errors, warnings };
  } catch (err) {
    const message = err instanceof DocumentParseError ? err.message : describeError(err);
    return { file: filePath, valid: false, errors: [message], warnings: [] };
  }
}

/**
 * Every candidate context file directly inside a directory
 */
export async function contextFilesIn(dir: string): Promise<string[]> {
  const files = await listFiles(dir, ".json");
  return files.map((name) => path.join(dir, name));
}

export function formatReport(report: FileReport, color: boolean): string[] {
  const mark = report.valid ? colorize("✓", "green", color) : colorize("✗", "red", color);
  return [
    `${mark} ${report.file}`,
    ...report.errors.map((error) => `  - ${error}`),
    ...report.warnings.map((warning) => colorize(`  ! ${warning}`, "yellow", color)),
  ];
}

export function createValidateCommand(ctx: CommandContext): Command {
  return new Command("validate")
    .description("Validate context files (default: every .json file in the context directory)")
    .argument("[files...]", "Files to validate")
    .option("--json", "Output reports as JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ ctxrules validate
  $ ctxrules validate contexts/git_context.json --json`
    )
    .action(async (files: string[], options: { json?: boolean }) => {
      await withTiming("cli.validate", ctx.timing(), async () => {
        const targets = files.length > 0 ? files.map((file) => path.resolve(file)) : await contextFilesIn(ctx.dir());
        const reports: FileReport[] = [];
        for (const target of targets) {
          reports.push(await validateFile(target));
        }

        if (options.json) {
          printJson(ctx.output, reports);
        } else if (!ctx.globals().quiet || reports.some((report) => !report.valid)) {
          printLines(ctx.output, reports.flatMap((report) => formatReport(report, ctx.output.color)));
          if (reports.length === 0) {
            printLines(ctx.output, [`No context files in ${ctx.dir()}`]);
          }
        }

        ctx.setExitCode(reports.every((report) => report.valid) ? EXIT_OK : EXIT_INVALID);
      });
    });
}
