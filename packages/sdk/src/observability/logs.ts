/**
 * Event log for store, session and audit activity
 *
 * Lines go to stderr: the store is hosted behind a stdio protocol and stdout
 * carries protocol frames.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Context name the event is about */
  context?: string;
  file?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

export type LogSink = (line: string) => void;

/**
 * Render an entry as one line: `[ts] LEVEL event context (file) message {details}`
 */
export function formatLogLine(entry: LogEntry): string {
  let line = `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.event}`;

  if (entry.context !== undefined) line += ` ${entry.context}`;
  if (entry.file !== undefined) line += ` (${entry.file})`;
  if (entry.message !== undefined) line += ` ${entry.message}`;
  if (entry.details !== undefined) line += ` ${JSON.stringify(entry.details)}`;

  return line;
}

export class StoreLogger {
  #enabled = true;
  #sink: LogSink;
  #debug: () => boolean;

  constructor(
    sink: LogSink = (line) => console.error(line),
    debug: () => boolean = () => Boolean(process.env.CTXRULES_DEBUG)
  ) {
    this.#sink = sink;
    this.#debug = debug;
  }

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !this.#debug()) return;

    this.#sink(formatLogLine({ timestamp: new Date().toISOString(), level, event, ...fields }));
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  /** Tests and the CLI switch the log off */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new StoreLogger();
