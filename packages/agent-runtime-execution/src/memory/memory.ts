/**
 * Agent Memory
 *
 * Long-term memory scoped by user. Every operation takes the user id, so
 * one store can serve many users without their entries mixing. Agents reach
 * memory through the tools from `createMemoryTools`; the user id comes from
 * the run options, never from the model.
 *
 * @example
 * ```typescript
 * const memory = createInMemoryMemory();
 * await memory.add("u-1", createMemoryEntry("Prefers dark mode"));
 * await memory.retrieve("u-1", "dark mode", 5); // [{ content: "Prefers dark mode", ... }]
 * ```
 */

import { randomUUID } from "node:crypto";

// ============================================================================
// Types
// ============================================================================

export interface MemoryEntry {
  readonly id: string;
  readonly content: string;
  readonly createdAt: number;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface Memory {
  add(userId: string, entry: MemoryEntry): Promise<void>;
  /** Entries relevant to `query`, most relevant first */
  retrieve(userId: string, query: string, limit: number): Promise<MemoryEntry[]>;
  /**
   * Replace the entry stored under `id`.
   * @throws MemoryNotFoundError if the user has no entry with that id
   */
  update(userId: string, id: string, entry: MemoryEntry): Promise<void>;
  /** @returns false when the user has no entry with that id */
  delete(userId: string, id: string): Promise<boolean>;
  all(userId: string): Promise<MemoryEntry[]>;
  size(userId: string): Promise<number>;
  clear(userId: string): Promise<void>;
}

export class MemoryNotFoundError extends Error {
  constructor(
    public readonly userId: string,
    public readonly memoryId: string
  ) {
    super(`Memory with id '${memoryId}' not found for user '${userId}'`);
    this.name = "MemoryNotFoundError";
  }
}

export function createMemoryEntry(
  content: string,
  options: { id?: string; metadata?: Readonly<Record<string, unknown>> } = {}
): MemoryEntry {
  const entry: MemoryEntry = {
    id: options.id ?? `mem_${randomUUID()}`,
    content,
    createdAt: Date.now(),
  };
  return options.metadata ? { ...entry, metadata: options.metadata } : entry;
}

// ============================================================================
// In-Memory Implementation
// ============================================================================

/**
 * Keyword-scored store kept in process. Relevance: 1 for an exact match,
 * 0.8 when the entry contains the query, otherwise 0.3 plus up to 0.4 for
 * the share of query words longer than two characters found in the entry.
 */
export class InMemoryMemory implements Memory {
  private readonly users = new Map<string, Map<string, MemoryEntry>>();

  async add(userId: string, entry: MemoryEntry): Promise<void> {
    this.entriesOf(userId).set(entry.id, entry);
  }

  async retrieve(userId: string, query: string, limit: number): Promise<MemoryEntry[]> {
    if (limit <= 0) {
      return [];
    }
    const normalized = query.toLowerCase();
    return [...this.entriesOf(userId).values()]
      .map((entry) => ({ entry, score: scoreRelevance(entry.content, normalized) }))
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ entry }) => entry);
  }

  async update(userId: string, id: string, entry: MemoryEntry): Promise<void> {
    const entries = this.entriesOf(userId);
    if (!entries.delete(id)) {
      throw new MemoryNotFoundError(userId, id);
    }
    entries.set(entry.id, entry);
  }

  async delete(userId: string, id: string): Promise<boolean> {
    return this.entriesOf(userId).delete(id);
  }

  async all(userId: string): Promise<MemoryEntry[]> {
    return [...this.entriesOf(userId).values()];
  }

  async size(userId: string): Promise<number> {
    return this.entriesOf(userId).size;
  }

  async clear(userId: string): Promise<void> {
    this.users.delete(userId);
  }

  /** Drop the entries of every user */
  clearAll(): void {
    this.users.clear();
  }

  private entriesOf(userId: string): Map<string, MemoryEntry> {
    let entries = this.users.get(userId);
    if (!entries) {
      entries = new Map();
      this.users.set(userId, entries);
    }
    return entries;
  }
}

function scoreRelevance(content: string, query: string): number {
  const normalized = content.toLowerCase();
  if (normalized === query) {
    return 1;
  }
  if (normalized.includes(query)) {
    return 0.8;
  }

  const words = query.split(/\s+/).filter((word) => word.length > 0);
  const matches = words.filter((word) => word.length > 2 && normalized.includes(word)).length;
  return matches > 0 ? 0.3 + (0.4 * matches) / words.length : 0;
}

export function createInMemoryMemory(): InMemoryMemory {
  return new InMemoryMemory();
}
