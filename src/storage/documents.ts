// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT STORE — JSON Documents Addressed by Slash-Separated Paths
// ═══════════════════════════════════════════════════════════════════════════════
//
// Maps logical paths such as `users/{uid}/voice_history` onto a KeyValueStore:
//
//   {prefix}doc:{path}   JSON document
//   {prefix}log:{path}   append-only list of JSON entries
//   {prefix}idx:{path}   set of direct child segments
//
// Every write registers the path with all of its ancestors, so collections
// (`users`, `users/{uid}/medicine_reminders/{date}`) can be enumerated.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type { KeyValueStore } from './types.js';

const logger = getLogger({ component: 'document-store' });

/**
 * Join path segments, rejecting empty segments and embedded separators.
 */
export function docPath(...segments: string[]): string {
  for (const segment of segments) {
    if (segment.length === 0 || segment.includes('/')) {
      throw new Error(`Invalid path segment: "${segment}"`);
    }
  }
  return segments.join('/');
}

export class DocumentStore {
  private readonly kv: KeyValueStore;
  private readonly prefix: string;

  constructor(kv: KeyValueStore, prefix: string = '') {
    this.kv = kv;
    this.prefix = prefix;
  }

  get backend(): KeyValueStore {
    return this.kv;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Documents
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Read a document. Missing or unparseable documents read as `undefined`.
   */
  async get(path: string): Promise<unknown> {
    const raw = await this.kv.get(this.docKey(path));
    if (raw === null) return undefined;
    return this.parse(raw, path);
  }

  async set(path: string, value: unknown): Promise<void> {
    await this.kv.set(this.docKey(path), JSON.stringify(value));
    await this.index(path);
  }

  async delete(path: string): Promise<boolean> {
    const deleted = await this.kv.delete(this.docKey(path));
    const { parent, name } = splitPath(path);
    if (parent) {
      await this.kv.srem(this.indexKey(parent), name);
    }
    return deleted;
  }

  async exists(path: string): Promise<boolean> {
    return this.kv.exists(this.docKey(path));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Append-only logs
  // ─────────────────────────────────────────────────────────────────────────────

  async append(path: string, entry: unknown): Promise<number> {
    const length = await this.kv.rpush(this.logKey(path), JSON.stringify(entry));
    await this.index(path);
    return length;
  }

  /**
   * Read every entry of a log in insertion order, skipping unparseable ones.
   */
  async readLog(path: string): Promise<unknown[]> {
    const raw = await this.kv.lrange(this.logKey(path), 0, -1);
    const entries: unknown[] = [];
    for (const item of raw) {
      const parsed = this.parse(item, path);
      if (parsed !== undefined) entries.push(parsed);
    }
    return entries;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Collections
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Direct child segments under `path`, sorted.
   */
  async listChildren(path: string): Promise<string[]> {
    const members = await this.kv.smembers(this.indexKey(path));
    return members.sort();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private parse(raw: string, path: string): unknown {
    try {
      return JSON.parse(raw);
    } catch (error) {
      logger.warn('Discarding unparseable stored value', {
        path,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async index(path: string): Promise<void> {
    const segments = path.split('/');
    for (let i = 1; i < segments.length; i++) {
      const parent = segments.slice(0, i).join('/');
      await this.kv.sadd(this.indexKey(parent), segments[i] ?? '');
    }
  }

  private docKey(path: string): string {
    return `${this.prefix}doc:${path}`;
  }

  private logKey(path: string): string {
    return `${this.prefix}log:${path}`;
  }

  private indexKey(path: string): string {
    return `${this.prefix}idx:${path}`;
  }
}

function splitPath(path: string): { parent: string; name: string } {
  const idx = path.lastIndexOf('/');
  if (idx < 0) return { parent: '', name: path };
  return { parent: path.slice(0, idx), name: path.slice(idx + 1) };
}
