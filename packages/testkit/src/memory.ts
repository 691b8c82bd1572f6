/**
 * In-process memory service for tests
 */

import type {
  JsonObject,
  MemoryEntry,
  MemoryQueryResult,
  MemoryService,
  MemoryStatsResult,
  MemoryStoreResult,
} from "@ctxrules/sdk";

type Operation = "store" | "recall" | "searchByTag" | "stats";

interface StoredMemory extends MemoryEntry {
  id: string;
  metadata: JsonObject;
}

/**
 * Keeps memories in an array. Recall matches any query word in the content;
 * tag search matches any tag. Failures and hangs can be scripted per operation.
 */
export class FakeMemoryService implements MemoryService {
  readonly memories: StoredMemory[] = [];
  readonly calls: Array<{ operation: Operation; args: unknown[] }> = [];

  #failures = new Map<Operation, Error[]>();
  #hanging = new Set<Operation>();
  #clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.#clock = clock;
  }

  /**
   * Make the next call of `operation` reject with `error`
   */
  failNext(operation: Operation, error: Error = new Error(`${operation} failed`)): this {
    const queue = this.#failures.get(operation) ?? [];
    queue.push(error);
    this.#failures.set(operation, queue);
    return this;
  }

  /**
   * Make later calls of `operation` never settle, until `release` is called
   */
  hang(operation: Operation): this {
    this.#hanging.add(operation);
    return this;
  }

  release(operation: Operation): this {
    this.#hanging.delete(operation);
    return this;
  }

  /**
   * Memories carrying a given tag
   */
  tagged(tag: string): StoredMemory[] {
    return this.memories.filter((memory) => memory.tags?.includes(tag));
  }

  async store(content: string, tags: string[], metadata: JsonObject): Promise<MemoryStoreResult> {
    await this.#enter("store", [content, tags, metadata]);
    const id = `mem-${this.memories.length + 1}`;
    this.memories.push({ id, content, tags, metadata, timestamp: this.#clock().toISOString() });
    return { success: true, memory_id: id };
  }

  async recall(query: string, limit: number): Promise<MemoryQueryResult> {
    await this.#enter("recall", [query, limit]);
    const words = query.toLowerCase().split(/\s+/).filter(Boolean);
    const results = this.memories
      .map((memory) => {
        const text = memory.content.toLowerCase();
        const hits = words.filter((word) => text.includes(word)).length;
        return { memory, relevance: words.length ? hits / words.length : 0 };
      })
      .filter(({ relevance }) => relevance > 0)
      .sort((a, b) => b.relevance - a.relevance)
      .slice(0, limit)
      .map(({ memory, relevance }) => toEntry(memory, relevance));
    return { success: true, results };
  }

  async searchByTag(tags: string[], limit: number): Promise<MemoryQueryResult> {
    await this.#enter("searchByTag", [tags, limit]);
    const results = this.memories
      .filter((memory) => tags.some((tag) => memory.tags?.includes(tag)))
      .slice(0, limit)
      .map((memory) => toEntry(memory, 1));
    return { success: true, results };
  }

  async stats(): Promise<MemoryStatsResult> {
    await this.#enter("stats", []);
    const tags = new Set(this.memories.flatMap((memory) => memory.tags ?? []));
    return {
      success: true,
      total_memories: this.memories.length,
      tags_available: [...tags].sort(),
      storage_backend: "in-memory",
      service_status: "healthy",
    };
  }

  async #enter(operation: Operation, args: unknown[]): Promise<void> {
    this.calls.push({ operation, args });
    const failure = this.#failures.get(operation)?.shift();
    if (failure) {
      throw failure;
    }
    if (this.#hanging.has(operation)) {
      await new Promise<never>(() => undefined);
    }
  }
}

function toEntry(memory: StoredMemory, relevance: number): MemoryEntry {
  return {
    content: memory.content,
    relevance,
    tags: memory.tags,
    timestamp: memory.timestamp,
  };
}
