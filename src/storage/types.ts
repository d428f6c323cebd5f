// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Key-Value Store Interface
// ═══════════════════════════════════════════════════════════════════════════════

export interface KeyValueStore {
  // String operations
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;

  // List operations
  rpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  llen(key: string): Promise<number>;

  // Set operations
  sadd(key: string, ...members: string[]): Promise<number>;
  srem(key: string, ...members: string[]): Promise<number>;
  smembers(key: string): Promise<string[]>;

  // Utility
  isConnected(): boolean;
  ping(): Promise<string>;
  flushall(): Promise<void>;
  disconnect(): Promise<void>;
}

/**
 * Owner-token leases for cross-process mutual exclusion.
 */
export interface LeaseStore {
  /** True if `key` was free and is now held by `token` for `ttlMs` */
  acquireLease(key: string, token: string, ttlMs: number): Promise<boolean>;
  /** Release only if `token` still owns the lease */
  releaseLease(key: string, token: string): Promise<boolean>;
}

export function isLeaseStore<T extends object>(store: T): store is T & LeaseStore {
  return 'acquireLease' in store && 'releaseLease' in store;
}
