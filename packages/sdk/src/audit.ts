/**
 * Audit hook: records successful mutations in the external memory service
 *
 * Events go into a bounded in-process queue drained by a single background worker,
 * so a slow or absent memory service never delays the mutation that produced them.
 * When the queue is full the oldest pending event is dropped.
 */

import { describeError } from "./errors.js";
import { withMemoryTimeout, DEFAULT_MEMORY_TIMEOUT_MS } from "./memory.js";
import { logger } from "./observability/logs.js";
import type { AuditChange, AuditEvent, JsonObject, MemoryService } from "./types.js";

export const DEFAULT_AUDIT_QUEUE_SIZE = 100;

export interface AuditHookOptions {
  queueSize?: number;
  timeoutMs?: number;
  now?: () => Date;
}

/**
 * Human-readable one-liner for an audit event
 */
export function summarizeChange(contextName: string, change: AuditChange): string {
  switch (change.operation) {
    case "created":
      return `Created context '${contextName}' for tool category '${change.tool_category}'`;
    case "updated":
      return `Updated context '${contextName}': ${change.updated_fields.join(", ") || "no fields"}`;
    case "pattern_added":
      return `Added pattern '${change.pattern_name}' to ${change.section} in context '${contextName}'`;
    case "optimized": {
      const base = `Optimized context '${contextName}' (optimization #${change.optimization_count})`;
      return change.reason ? `${base}: ${change.reason}` : base;
    }
  }
}

export function auditTags(event: AuditEvent): string[] {
  return ["context_change", event.change.operation, event.contextName, "automated"];
}

export function auditMetadata(event: AuditEvent): JsonObject {
  const { operation, ...details } = event.change;
  return {
    operation,
    context_name: event.contextName,
    timestamp: event.timestamp,
    details,
  };
}

export class AuditHook {
  #memory: MemoryService;
  #capacity: number;
  #now: () => Date;
  #queue: AuditEvent[] = [];
  #worker: Promise<void> | null = null;
  #closed = false;
  #dropped = 0;
  #delivered = 0;

  constructor(memory: MemoryService, options: AuditHookOptions = {}) {
    this.#memory = withMemoryTimeout(memory, options.timeoutMs ?? DEFAULT_MEMORY_TIMEOUT_MS);
    this.#capacity = Math.max(1, options.queueSize ?? DEFAULT_AUDIT_QUEUE_SIZE);
    this.#now = options.now ?? (() => new Date());
  }

  /** Events waiting for the worker */
  get pending(): number {
    return this.#queue.length;
  }

  /** Events discarded because the queue was full */
  get dropped(): number {
    return this.#dropped;
  }

  /** Events the memory service accepted */
  get delivered(): number {
    return this.#delivered;
  }

  /**
   * Queue an event; returns immediately
   */
  record(contextName: string, change: AuditChange): void {
    if (this.#closed) {
      logger.debug("audit.closed", { context: contextName, message: change.operation });
      return;
    }

    if (this.#queue.length >= this.#capacity) {
      const lost = this.#queue.shift();
      this.#dropped++;
      logger.warn("audit.dropped", {
        context: lost?.contextName,
        message: `queue full (${this.#capacity}); dropped ${lost?.change.operation ?? "event"}`,
      });
    }

    this.#queue.push({ contextName, change, timestamp: this.#now().toISOString() });
    this.#startWorker();
  }

  /**
   * Resolve once every event queued so far has been attempted
   */
  async flush(): Promise<void> {
    while (this.#worker) {
      await this.#worker;
    }
  }

  /**
   * Stop accepting events and drain what is queued
   */
  async close(): Promise<void> {
    this.#closed = true;
    await this.flush();
  }

  #startWorker(): void {
    if (this.#worker) return;
    this.#worker = this.#drain().finally(() => {
      this.#worker = null;
      // An event may have arrived after the loop saw an empty queue
      if (this.#queue.length > 0) this.#startWorker();
    });
  }

  async #drain(): Promise<void> {
    let event = this.#queue.shift();
    while (event) {
      await this.#deliver(event);
      event = this.#queue.shift();
    }
  }

  async #deliver(event: AuditEvent): Promise<void> {
    try {
      const result = await this.#memory.store(
        summarizeChange(event.contextName, event.change),
        auditTags(event),
        auditMetadata(event)
      );
      if (result.success) {
        this.#delivered++;
        logger.debug("audit.stored", { context: event.contextName, message: result.memory_id });
      } else {
        logger.warn("audit.rejected", { context: event.contextName, message: result.error });
      }
    } catch (err) {
      logger.warn("audit.failed", { context: event.contextName, message: describeError(err) });
    }
  }
}
