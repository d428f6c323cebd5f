// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Memory KeyValueStore for Tests and Local Development
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

export class MemoryStore implements KeyValueStore {
  private data: Map<string, string> = new Map();
  private lists: Map<string, string[]> = new Map();
  private sets: Map<string, Set<string>> = new Map();

  // ═══════════════════════════════════════════════════════════════════════════════
  // STRING OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.data.has(key) || this.lists.has(key) || this.sets.has(key);
    this.data.delete(key);
    this.lists.delete(key);
    this.sets.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    return this.data.has(key) || this.lists.has(key) || this.sets.has(key);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async rpush(key: string, ...values: string[]): Promise<number> {
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    list.push(...values);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key);
    if (!list) return [];

    // Negative indices count from the tail, as in Redis
    const len = list.length;
    const startIdx = start < 0 ? Math.max(0, len + start) : start;
    const stopIdx = stop < 0 ? len + stop : stop;

    if (startIdx > stopIdx || startIdx >= len) return [];

    return list.slice(startIdx, stopIdx + 1);
  }

  async llen(key: string): Promise<number> {
    return this.lists.get(key)?.length ?? 0;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SET OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async sadd(key: string, ...members: string[]): Promise<number> {
    let set = this.sets.get(key);
    if (!set) {
      set = new Set();
      this.sets.set(key, set);
    }

    let added = 0;
    for (const member of members) {
      if (!set.has(member)) {
        set.add(member);
        added++;
      }
    }
    return added;
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    const set = this.sets.get(key);
    if (!set) return 0;

    let removed = 0;
    for (const member of members) {
      if (set.delete(member)) {
        removed++;
      }
    }
    if (set.size === 0) {
      this.sets.delete(key);
    }
    return removed;
  }

  async smembers(key: string): Promise<string[]> {
    const set = this.sets.get(key);
    return set ? Array.from(set) : [];
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UTILITY
  // ═══════════════════════════════════════════════════════════════════════════════

  isConnected(): boolean {
    return true;
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  async flushall(): Promise<void> {
    this.clear();
  }

  async disconnect(): Promise<void> {
    // nothing to release
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  clear(): void {
    this.data.clear();
    this.lists.clear();
    this.sets.clear();
  }

  size(): number {
    return this.data.size + this.lists.size + this.sets.size;
  }
}
