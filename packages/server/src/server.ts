/**
 * MCP server for context rules
 *
 * Protocol: Model Context Protocol (MCP); the stdio entry point lives in main.ts
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  CorrectionEngine,
  MemoryServiceTimeoutError,
  SessionInitializer,
  UnavailableMemoryService,
  errnoCode,
  openContextStore,
} from "@ctxrules/sdk";
import type { MemoryService } from "@ctxrules/sdk";
import {
  MUTATING_TOOLS,
  ToolTimeoutError,
  createToolHandlers,
  toolDefinitions,
  type ToolName,
  type ToolServices,
} from "./tools.js";
import { McpMemoryService } from "./service/memory-client.js";
import { logger } from "./observability/logger.js";
import type { ServerConfig } from "./config.js";

export const SERVER_NAME = "ctxrules-server";
export const SERVER_VERSION = "0.1.0";

export interface ServerOptions {
  readOnly?: boolean;
  memoryTimeoutMs?: number;
}

/**
 * Map thrown values to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join(", ")}`,
    };
  }

  if (error instanceof ToolTimeoutError || error instanceof MemoryServiceTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof Error) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}

function isToolName(name: string): name is ToolName {
  return toolDefinitions.some((tool) => tool.name === name);
}

/**
 * Create an MCP server over already constructed services
 */
export function createServer(services: ToolServices, options: ServerOptions = {}): Server {
  const readOnly = options.readOnly ?? false;
  const toolHandlers = createToolHandlers(services, { memoryTimeoutMs: options.memoryTimeoutMs });

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly ? toolDefinitions.filter((tool) => !MUTATING_TOOLS.has(tool.name)) : toolDefinitions;
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (readOnly && MUTATING_TOOLS.has(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return await toolHandlers[name](args ?? {});
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errnoCode(err),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}

export interface ServiceBundle {
  services: ToolServices;
  close(): Promise<void>;
}

/**
 * Construct the store, memory client, session initializer and correction engine from config
 */
export async function createServices(config: ServerConfig): Promise<ServiceBundle> {
  const memoryClient = config.memory ? McpMemoryService.spawn(config.memory.command, config.memory.args) : null;
  const memory: MemoryService = memoryClient ?? new UnavailableMemoryService();

  const store = await openContextStore({
    dir: config.contextDir,
    autoLoad: config.autoLoad,
    memory,
    audit: config.auditEnabled,
    auditQueueSize: config.auditQueueSize,
    memoryTimeoutMs: config.memoryTimeoutMs,
  });
  const session = new SessionInitializer(store, memory, { timeoutMs: config.memoryTimeoutMs });
  const corrections = new CorrectionEngine(store);

  logger.info("service.init", {
    context_dir: config.contextDir,
    contexts: store.listContexts().length,
    memory: memoryClient ? config.memory?.command : "unavailable",
    audit: config.auditEnabled,
  });

  return {
    services: { store, session, corrections, memory },
    async close() {
      await store.close();
      await memoryClient?.close();
    },
  };
}
