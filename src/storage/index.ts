// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE — Store Selection and Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import { DocumentStore } from './documents.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import type { KeyValueStore } from './types.js';

export { type KeyValueStore, type LeaseStore, isLeaseStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore } from './redis.js';
export { DocumentStore, docPath } from './documents.js';
export { USERS_ROOT, userPaths } from './paths.js';

const logger = getLogger({ component: 'storage' });

// ─────────────────────────────────────────────────────────────────────────────────
// STORE MANAGER
// ─────────────────────────────────────────────────────────────────────────────────

class StoreManager {
  private store: KeyValueStore | null = null;
  private documents: DocumentStore | null = null;

  getStore(): KeyValueStore {
    if (!this.store) {
      const { storage } = loadConfig();
      if (storage.redisUrl) {
        logger.info('Using Redis store');
        this.store = RedisStore.fromUrl(storage.redisUrl);
      } else {
        logger.warn('REDIS_URL not set, using in-memory store');
        this.store = new MemoryStore();
      }
    }
    return this.store;
  }

  getDocuments(): DocumentStore {
    if (!this.documents) {
      this.documents = new DocumentStore(this.getStore(), loadConfig().storage.keyPrefix);
    }
    return this.documents;
  }

  /**
   * Replace the active store (tests, alternative backends).
   */
  setStore(store: KeyValueStore): void {
    this.store = store;
    this.documents = null;
  }

  async disconnect(): Promise<void> {
    if (this.store) {
      await this.store.disconnect();
      this.store = null;
      this.documents = null;
    }
  }
}

export const storeManager = new StoreManager();

export function getStore(): KeyValueStore {
  return storeManager.getStore();
}

export function getDocumentStore(): DocumentStore {
  return storeManager.getDocuments();
}
