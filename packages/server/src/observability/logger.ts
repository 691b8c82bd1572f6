/**
 * JSON-line logging for the MCP server
 * Everything goes to stderr; stdout carries protocol frames
 */

import { errnoCode } from "@ctxrules/sdk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogFields = Record<string, string | number | boolean | string[] | undefined>;

export interface LogEvent extends LogFields {
  ts: string;
  level: LogLevel;
  event: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  #minLevel: LogLevel;
  #write: (line: string) => void;

  constructor(minLevel: LogLevel = "info", write: (line: string) => void = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data: LogFields = {}): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };
    this.#write(JSON.stringify(logEvent));
  }

  debug(event: string, data?: LogFields): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogFields): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogFields): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogFields): void {
    this.log("error", event, data);
  }

  // Tool execution outcome
  toolCall(tool: string, duration_ms: number, success: boolean, err?: Error): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errnoCode(err) ?? "UNKNOWN",
        err_message: err?.message ?? "unknown error",
      });
    }
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? "";

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");
