#!/usr/bin/env node

/**
 * stdio entry point for the context rules MCP server
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger as coreLogger } from "@ctxrules/sdk";
import { loadServerConfig } from "./config.js";
import { createServer, createServices } from "./server.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // Any stray console.log/info/debug would corrupt the protocol stream
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = loadServerConfig();
  logger.setLevel(config.logLevel);
  if (config.logLevel === "error") {
    coreLogger.setEnabled(false);
  }

  const bundle = await createServices(config);
  const server = createServer(bundle.services, {
    readOnly: config.readOnly,
    memoryTimeoutMs: config.memoryTimeoutMs,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    context_dir: config.contextDir,
  });

  let closing = false;
  const shutdown = async (): Promise<void> => {
    if (closing) return;
    closing = true;
    logger.info("server.shutdown", {});
    await bundle.close();
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown_failed", { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
