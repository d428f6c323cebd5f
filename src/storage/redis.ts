// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-Backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';

import { getLogger } from '../observability/logging/index.js';
import type { KeyValueStore, LeaseStore } from './types.js';

const logger = getLogger({ component: 'redis-store' });

// Delete the lease only while the caller's token still owns it.
const RELEASE_LEASE_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

export class RedisStore implements KeyValueStore, LeaseStore {
  private readonly redis: Redis;
  private connected = false;

  constructor(redis: Redis) {
    this.redis = redis;
    this.redis.on('ready', () => {
      this.connected = true;
      logger.info('Redis connection ready');
    });
    this.redis.on('end', () => {
      this.connected = false;
      logger.warn('Redis connection closed');
    });
    this.redis.on('error', (error: Error) => {
      logger.error('Redis connection error', error);
    });
  }

  static fromUrl(url: string): RedisStore {
    return new RedisStore(new Redis(url, { maxRetriesPerRequest: 3, lazyConnect: false }));
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return (await this.redis.del(key)) > 0;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.redis.exists(key)) > 0;
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    return this.redis.rpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.redis.lrange(key, start, stop);
  }

  async llen(key: string): Promise<number> {
    return this.redis.llen(key);
  }

  async sadd(key: string, ...members: string[]): Promise<number> {
    return this.redis.sadd(key, ...members);
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    return this.redis.srem(key, ...members);
  }

  async smembers(key: string): Promise<string[]> {
    return this.redis.smembers(key);
  }

  // ─── LEASES ───

  async acquireLease(key: string, token: string, ttlMs: number): Promise<boolean> {
    return (await this.redis.set(key, token, 'PX', ttlMs, 'NX')) === 'OK';
  }

  async releaseLease(key: string, token: string): Promise<boolean> {
    return (await this.redis.eval(RELEASE_LEASE_SCRIPT, 1, key, token)) === 1;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async ping(): Promise<string> {
    return this.redis.ping();
  }

  async flushall(): Promise<void> {
    await this.redis.flushall();
  }

  async disconnect(): Promise<void> {
    await this.redis.quit();
  }
}
