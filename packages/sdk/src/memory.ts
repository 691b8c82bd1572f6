/**
 * Memory-service plumbing shared by the session initializer and the audit hook
 */

import { MemoryServiceTimeoutError } from "./errors.js";
import type {
  JsonObject,
  MemoryQueryResult,
  MemoryService,
  MemoryStatsResult,
  MemoryStoreResult,
} from "./types.js";

export const DEFAULT_MEMORY_TIMEOUT_MS = 5000;

const NOT_CONFIGURED = "memory service not configured";

/**
 * Stand-in used when no memory service is configured. Every call reports failure.
 */
export class UnavailableMemoryService implements MemoryService {
  async store(): Promise<MemoryStoreResult> {
    return { success: false, error: NOT_CONFIGURED };
  }

  async recall(): Promise<MemoryQueryResult> {
    return { success: false, results: [], error: NOT_CONFIGURED };
  }

  async searchByTag(): Promise<MemoryQueryResult> {
    return { success: false, results: [], error: NOT_CONFIGURED };
  }

  async stats(): Promise<MemoryStatsResult> {
    return { success: false, service_status: "unavailable", error: NOT_CONFIGURED };
  }
}

/**
 * Race a call against a timer
 * @throws MemoryServiceTimeoutError when the timer wins
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  call: () => Promise<T>
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new MemoryServiceTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(), timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Decorator applying an explicit timeout to every call of another memory service
 */
export class TimeoutMemoryService implements MemoryService {
  #inner: MemoryService;
  #timeoutMs: number;

  constructor(inner: MemoryService, timeoutMs: number = DEFAULT_MEMORY_TIMEOUT_MS) {
    this.#inner = inner;
    this.#timeoutMs = timeoutMs;
  }

  store(content: string, tags: string[], metadata: JsonObject): Promise<MemoryStoreResult> {
    return withTimeout("store", this.#timeoutMs, () => this.#inner.store(content, tags, metadata));
  }

  recall(query: string, limit: number): Promise<MemoryQueryResult> {
    return withTimeout("recall", this.#timeoutMs, () => this.#inner.recall(query, limit));
  }

  searchByTag(tags: string[], limit: number): Promise<MemoryQueryResult> {
    return withTimeout("search_by_tag", this.#timeoutMs, () =>
      this.#inner.searchByTag(tags, limit)
    );
  }

  stats(): Promise<MemoryStatsResult> {
    return withTimeout("stats", this.#timeoutMs, () => this.#inner.stats());
  }
}

/**
 * Wrap a service with a timeout unless it already carries one
 */
export function withMemoryTimeout(service: MemoryService, timeoutMs: number): MemoryService {
  return service instanceof TimeoutMemoryService ? service : new TimeoutMemoryService(service, timeoutMs);
}
