/**
 * Server configuration, read once from the environment
 */

import { homedir } from "node:os";
import { resolve, join } from "node:path";
import { z } from "zod";
import { DEFAULT_AUDIT_QUEUE_SIZE, DEFAULT_MEMORY_TIMEOUT_MS } from "@ctxrules/sdk";
import { isLogLevel, type LogLevel } from "./observability/logger.js";

export const DEFAULT_CONTEXT_DIR = "./contexts";

/**
 * "true" in any case enables; anything else set disables; unset keeps the default
 */
const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? fallback : value.trim().toLowerCase() === "true"));

const positiveInt = (name: string, fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a positive integer, got '${value}'` });
        return z.NEVER;
      }
      return parsed;
    });

const EnvSchema = z.object({
  CONTEXT_CONFIG_DIR: z.string().optional(),
  AUTO_LOAD_CONTEXTS: flag(true),
  MEMORY_SERVICE_COMMAND: z.string().optional(),
  MEMORY_SERVICE_ARGS: z.string().optional(),
  MEMORY_SERVICE_TIMEOUT_MS: positiveInt("MEMORY_SERVICE_TIMEOUT_MS", DEFAULT_MEMORY_TIMEOUT_MS),
  AUDIT_QUEUE_SIZE: positiveInt("AUDIT_QUEUE_SIZE", DEFAULT_AUDIT_QUEUE_SIZE),
  AUDIT_ENABLED: flag(true),
  CTXRULES_READONLY: flag(false),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value, ctx): LogLevel => {
      const level = (value ?? "info").trim().toLowerCase() || "info";
      if (!isLogLevel(level)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `LOG_LEVEL must be debug, info, warn or error, got '${value}'` });
        return z.NEVER;
      }
      return level;
    }),
});

export const ServerConfigSchema = EnvSchema.transform((env) => ({
  contextDir: resolveContextDir(env.CONTEXT_CONFIG_DIR),
  autoLoad: env.AUTO_LOAD_CONTEXTS,
  memory: memoryCommand(env.MEMORY_SERVICE_COMMAND, env.MEMORY_SERVICE_ARGS),
  memoryTimeoutMs: env.MEMORY_SERVICE_TIMEOUT_MS,
  auditQueueSize: env.AUDIT_QUEUE_SIZE,
  auditEnabled: env.AUDIT_ENABLED,
  readOnly: env.CTXRULES_READONLY,
  logLevel: env.LOG_LEVEL,
}));

export type ServerConfig = z.output<typeof ServerConfigSchema>;

export interface MemoryCommand {
  command: string;
  args: string[];
}

/**
 * Expand a leading ~ and make the directory absolute
 */
export function resolveContextDir(raw: string | undefined, cwd: string = process.cwd()): string {
  const dir = raw?.trim() || DEFAULT_CONTEXT_DIR;
  if (dir === "~") return homedir();
  if (dir.startsWith("~/")) return join(homedir(), dir.slice(2));
  return resolve(cwd, dir);
}

function memoryCommand(command: string | undefined, args: string | undefined): MemoryCommand | null {
  const trimmed = command?.trim();
  if (!trimmed) return null;
  return { command: trimmed, args: (args ?? "").split(/\s+/).filter(Boolean) };
}

/**
 * Parse configuration; a bad value throws a ZodError naming the variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return ServerConfigSchema.parse(env);
}
