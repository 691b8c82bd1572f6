/**
 * ctxrules command line program
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { CorrectionEngine, SessionInitializer, logger } from "@ctxrules/sdk";
import type { ContextStore } from "@ctxrules/sdk";
import { openCliStore, createMemoryFromEnv, type CliMemory } from "./lib/store.js";
import { resolveDir, isVerbose } from "./lib/env.js";
import { parseJsonObject } from "./lib/arg.js";
import { readStdin, readJsonObjectFromFile } from "./lib/io.js";
import { printJson, printLines, colorize, processOutput, type CliOutput } from "./lib/render.js";
import { CliError, EXIT_FAILURE, EXIT_OK, mapErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import { createValidateCommand } from "./commands/validate.js";

export const CLI_VERSION = "0.1.0";

export type GlobalOptions = {
  dir?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export interface CliDeps {
  output?: CliOutput;
  env?: NodeJS.ProcessEnv;
  stdin?: NodeJS.ReadableStream;
  stdinIsTTY?: boolean;
  createMemory?: (env: NodeJS.ProcessEnv) => CliMemory;
}

/**
 * What command actions need from the program
 */
export interface CommandContext {
  output: CliOutput;
  env: NodeJS.ProcessEnv;
  globals(): GlobalOptions;
  dir(): string;
  verbose(): boolean;
  timing(): { output: CliOutput; verbose: boolean };
  setExitCode(code: number): void;
}

/**
 * Open the store, run `fn`, and always close it
 */
async function withStore<T>(ctx: CommandContext, fn: (store: ContextStore) => Promise<T>): Promise<T> {
  const { store, report } = await openCliStore(ctx.dir(), { verbose: ctx.verbose() });
  try {
    if (ctx.verbose()) {
      for (const skipped of report.skipped) {
        ctx.output.err(`skipped ${skipped.file}: ${skipped.reason}\n`);
      }
    }
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * Build the program; `state.exitCode` carries a non-error exit status out of actions
 */
export function buildProgram(deps: CliDeps, state: { exitCode: number }): Command {
  const output = deps.output ?? processOutput;
  const env = deps.env ?? process.env;
  const createMemory = deps.createMemory ?? createMemoryFromEnv;

  const program = new Command();

  const ctx: CommandContext = {
    output,
    env,
    globals: () => program.opts<GlobalOptions>(),
    dir: () => resolveDir(program.opts<GlobalOptions>().dir, env),
    verbose: () => program.opts<GlobalOptions>().verbose === true || isVerbose(env),
    timing: () => ({ output, verbose: ctx.verbose() }),
    setExitCode: (code) => {
      state.exitCode = code;
    },
  };

  program
    .name("ctxrules")
    .description("Per-tool context rules: validate, inspect and apply context documents")
    .version(CLI_VERSION)
    .option("--dir <path>", "Context directory (default: CONTEXT_CONFIG_DIR or ./contexts)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .configureOutput({
      writeOut: (str) => output.out(str),
      writeErr: (str) => output.err(colorize(str, "red", output.color)),
    })
    .exitOverride();

  // addCommand does not copy settings the way .command() does
  program.addCommand(createValidateCommand(ctx).copyInheritedSettings(program));

  program
    .command("list")
    .description("List loaded contexts")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.list", ctx.timing(), async () => {
        await withStore(ctx, async (store) => {
          const contexts = store.entries().map(([name, doc]) => ({
            name,
            tool_category: doc.tool_category,
            description: doc.description,
          }));

          if (options.json) {
            printJson(output, contexts);
          } else if (!ctx.globals().quiet) {
            printLines(
              output,
              contexts.map((context) => `${context.name}\t${context.tool_category}\t${context.description}`)
            );
          }
        });
      });
    });

  program
    .command("show <tool>")
    .description("Print the context resolved for a tool ('<category>:<tool>' or a category)")
    .option("--section <name>", "Print a single top-level section")
    .option("--raw", "Compact JSON")
    .action(async (tool: string, options: { section?: string; raw?: boolean }) => {
      await withTiming("cli.show", ctx.timing(), async () => {
        await withStore(ctx, async (store) => {
          const doc = store.getByTool(tool);
          if (Object.keys(doc).length === 0) {
            throw new CliError(`No context for tool '${tool}'`);
          }

          if (options.section === undefined) {
            printJson(output, doc, { raw: options.raw });
            return;
          }
          if (!(options.section in doc)) {
            throw new CliError(`Context for '${tool}' has no section '${options.section}'`);
          }
          printJson(output, doc[options.section], { raw: options.raw });
        });
      });
    });

  program
    .command("correct <tool> [text]")
    .description("Apply a tool's auto-corrections to text (or stdin)")
    .option("--explain", "Report which rules changed the text on stderr")
    .action(async (tool: string, text: string | undefined, options: { explain?: boolean }) => {
      await withTiming("cli.correct", ctx.timing(), async () => {
        let input = text;
        if (input === undefined) {
          if (deps.stdinIsTTY ?? process.stdin.isTTY ?? false) {
            throw new InvalidArgumentError("No text provided. Pass it as an argument or pipe it to stdin");
          }
          input = (await readStdin(deps.stdin ?? process.stdin)).replace(/\r?\n$/, "");
        }
        const source = input;

        await withStore(ctx, async (store) => {
          const outcome = new CorrectionEngine(store).explain(tool, source);
          output.out(outcome.text + "\n");

          if (options.explain) {
            const applied = outcome.applied.length > 0 ? outcome.applied.join(", ") : "none";
            output.err(`applied: ${applied}\n`);
            for (const skipped of outcome.skipped) {
              output.err(`skipped ${skipped.rule}: ${skipped.reason}\n`);
            }
          }
        });
      });
    });

  program
    .command("create <name> <category>")
    .description("Create a context file")
    .option("--rules <json>", "Inline JSON object with the initial sections")
    .option("--file <path>", "Read the initial sections from a JSON file")
    .action(async (name: string, category: string, options: { rules?: string; file?: string }) => {
      await withTiming("cli.create", ctx.timing(), async () => {
        if (options.rules !== undefined && options.file !== undefined) {
          throw new InvalidArgumentError("Cannot use both --rules and --file; choose one");
        }
        const rules =
          options.file !== undefined
            ? await readJsonObjectFromFile(options.file)
            : options.rules !== undefined
              ? parseJsonObject(options.rules, "--rules")
              : {};

        await withStore(ctx, async (store) => {
          const result = await store.create(name, category, rules);
          if (!result.success) {
            const details = result.validation_errors?.map((error) => `\n  - ${error}`).join("") ?? "";
            throw new CliError(`${result.error}${details}`);
          }
          for (const warning of result.warnings ?? []) {
            output.err(colorize(`warning: ${warning}`, "yellow", output.color) + "\n");
          }
          if (!ctx.globals().quiet) {
            printLines(output, [`${result.message} at ${result.file_path}`]);
          }
        });
      });
    });

  program
    .command("session")
    .description("Run session initialization against the configured memory service")
    .option("--json", "Print the full session status as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.session", ctx.timing(), async () => {
        const memory = createMemory(env);
        try {
          await withStore(ctx, async (store) => {
            const status = await new SessionInitializer(store, memory.memory, { timeoutMs: memory.timeoutMs }).run();

            if (options.json) {
              printJson(output, status);
            } else if (!ctx.globals().quiet) {
              printLines(output, [
                ...status.executed_actions.map(
                  (action) => `[${action.status}] ${action.context}/${action.action}: ${action.summary}`
                ),
                `${status.initialized_contexts.length} contexts, ${status.executed_actions.length} actions, ${status.errors.length} errors`,
              ]);
            }

            ctx.setExitCode(status.errors.length > 0 ? EXIT_FAILURE : EXIT_OK);
          });
        } finally {
          await memory.close();
        }
      });
    });

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix) and resolve to the exit code
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const output = deps.output ?? processOutput;
  const state = { exitCode: EXIT_OK };
  const program = buildProgram(deps, state);

  try {
    await program.parseAsync(argv, { from: "user" });
    return state.exitCode;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return mapErrorToExitCode(err);
    }

    const verbose = program.opts<GlobalOptions>().verbose === true;
    output.err(colorize(`Error: ${formatCliError(err, verbose)}`, "red", output.color) + "\n");
    return mapErrorToExitCode(err);
  } finally {
    logger.setEnabled(true);
  }
}
