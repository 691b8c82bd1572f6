/**
 * Environment and configuration resolution
 */

import { resolveContextDir } from "@ctxrules/server";

/**
 * Resolve the context directory
 * Priority: --dir option > CONTEXT_CONFIG_DIR > "./contexts"
 */
export function resolveDir(cliDir?: string, env: NodeJS.ProcessEnv = process.env): string {
  return resolveContextDir(cliDir ?? env.CONTEXT_CONFIG_DIR);
}

/**
 * Verbose diagnostics (timings, core store logs)
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.CTXRULES_CLI_DEBUG === "1";
}
