// ═══════════════════════════════════════════════════════════════════════════════
// LEASE LOCK — Cross-Process Lock on an Owner-Token Lease
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each instance owns one token. A lease is taken with SET NX PX and released
// only while the token still matches, so an expired holder cannot free a
// lease that another instance has since acquired.
//
// Lock key format: {keyPrefix}{key}
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';

import { getLogger } from '../../observability/logging/index.js';
import { isLeaseStore, type KeyValueStore, type LeaseStore } from '../../storage/index.js';
import { KeyedLock, type UserLock } from './keyed-lock.js';

const logger = getLogger({ component: 'lease-lock' });

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface LeaseLockConfig {
  /** Lease lifetime; must exceed the longest task */
  readonly ttlMs: number;
  readonly retryIntervalMs: number;
  readonly waitTimeoutMs: number;
  readonly keyPrefix: string;
}

export const DEFAULT_LEASE_LOCK_CONFIG: LeaseLockConfig = {
  ttlMs: 30_000,
  retryIntervalMs: 50,
  waitTimeoutMs: 10_000,
  keyPrefix: 'lock:engagement:',
};

export class LockTimeoutError extends Error {
  readonly key: string;

  constructor(key: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for lock ${key}`);
    this.name = 'LockTimeoutError';
    this.key = key;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LEASE LOCK
// ─────────────────────────────────────────────────────────────────────────────────

export class LeaseLock implements UserLock {
  private readonly store: LeaseStore;
  private readonly config: LeaseLockConfig;
  private readonly ownerToken: string;

  constructor(store: LeaseStore, config?: Partial<LeaseLockConfig>, ownerToken: string = `lease-owner-${uuidv4()}`) {
    this.store = store;
    this.config = { ...DEFAULT_LEASE_LOCK_CONFIG, ...config };
    this.ownerToken = ownerToken;
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const leaseKey = `${this.config.keyPrefix}${key}`;
    await this.acquire(leaseKey);
    try {
      return await task();
    } finally {
      await this.release(leaseKey);
    }
  }

  private async acquire(leaseKey: string): Promise<void> {
    const start = Date.now();
    while (!(await this.store.acquireLease(leaseKey, this.ownerToken, this.config.ttlMs))) {
      const waited = Date.now() - start;
      if (waited >= this.config.waitTimeoutMs) {
        logger.warn('Lease acquisition timed out', { key: leaseKey, waitedMs: waited });
        throw new LockTimeoutError(leaseKey, waited);
      }
      await this.sleep(this.config.retryIntervalMs);
    }
  }

  private async release(leaseKey: string): Promise<void> {
    try {
      const released = await this.store.releaseLease(leaseKey, this.ownerToken);
      if (!released) {
        logger.warn('Lease expired before release', { key: leaseKey });
      }
    } catch (error) {
      logger.error('Failed to release lease', error, { key: leaseKey });
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * A lease lock when the store can hold leases, else an in-process lock.
 */
export function createUserLock(store: KeyValueStore, config?: Partial<LeaseLockConfig>): UserLock {
  if (isLeaseStore(store)) {
    return new LeaseLock(store, config);
  }
  return new KeyedLock();
}
