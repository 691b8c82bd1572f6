export { createServer, createServices, mapErrorToMcp, SERVER_NAME, SERVER_VERSION } from "./server.js";
export type { ServerOptions, ServiceBundle } from "./server.js";
export { createToolHandlers, executeTool, toolDefinitions, toolResult, MUTATING_TOOLS, ToolTimeoutError } from "./tools.js";
export type { ToolHandler, ToolName, ToolResult, ToolServices, ToolOptions } from "./tools.js";
export { McpMemoryService, DEFAULT_MEMORY_TOOLS } from "./service/memory-client.js";
export type { MemoryToolNames } from "./service/memory-client.js";
export { loadServerConfig, resolveContextDir, ServerConfigSchema, DEFAULT_CONTEXT_DIR } from "./config.js";
export type { ServerConfig, MemoryCommand } from "./config.js";
