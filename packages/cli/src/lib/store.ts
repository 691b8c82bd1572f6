/**
 * Store and memory-service construction for CLI commands
 */

import { openContextStore, UnavailableMemoryService, logger } from "@ctxrules/sdk";
import type { ContextStore, LoadReport, MemoryService } from "@ctxrules/sdk";
import { McpMemoryService, loadServerConfig } from "@ctxrules/server";

export interface CliStore {
  store: ContextStore;
  report: LoadReport;
}

/**
 * Open and load a context directory; the CLI never writes audit events
 */
export async function openCliStore(dir: string, options: { verbose?: boolean } = {}): Promise<CliStore> {
  logger.setEnabled(options.verbose ?? false);
  const store = await openContextStore({ dir, autoLoad: false, audit: false });
  const report = await store.loadAll();
  return { store, report };
}

export interface CliMemory {
  memory: MemoryService;
  timeoutMs: number;
  close(): Promise<void>;
}

/**
 * Memory service from MEMORY_SERVICE_COMMAND / MEMORY_SERVICE_ARGS, or the unavailable stub
 */
export function createMemoryFromEnv(env: NodeJS.ProcessEnv = process.env): CliMemory {
  const config = loadServerConfig(env);
  if (!config.memory) {
    return {
      memory: new UnavailableMemoryService(),
      timeoutMs: config.memoryTimeoutMs,
      close: async () => undefined,
    };
  }

  const client = McpMemoryService.spawn(config.memory.command, config.memory.args);
  return {
    memory: client,
    timeoutMs: config.memoryTimeoutMs,
    close: () => client.close(),
  };
}
