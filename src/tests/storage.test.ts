// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TESTS — Memory Store and Document Store Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { DocumentStore, MemoryStore, docPath, userPaths } from '../storage/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MEMORY STORE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should always be connected', async () => {
    expect(store.isConnected()).toBe(true);
    expect(await store.ping()).toBe('PONG');
  });

  it('should set and get values', async () => {
    await store.set('key', 'value');
    expect(await store.get('key')).toBe('value');
    expect(await store.get('missing')).toBeNull();
  });

  it('should overwrite values and report existence', async () => {
    await store.set('key', 'one');
    await store.set('key', 'two');
    expect(await store.get('key')).toBe('two');
    expect(await store.exists('key')).toBe(true);
    expect(await store.exists('missing')).toBe(false);
  });

  it('should report whether a deleted key existed', async () => {
    await store.rpush('list', 'a');
    expect(await store.delete('list')).toBe(true);
    expect(await store.delete('list')).toBe(false);
  });

  it('should read list ranges with negative indices', async () => {
    await store.rpush('list', 'a', 'b', 'c');
    expect(await store.lrange('list', 0, -1)).toEqual(['a', 'b', 'c']);
    expect(await store.lrange('list', -2, -1)).toEqual(['b', 'c']);
    expect(await store.lrange('list', 5, 10)).toEqual([]);
    expect(await store.llen('list')).toBe(3);
  });

  it('should count only new set members', async () => {
    expect(await store.sadd('set', 'a', 'b')).toBe(2);
    expect(await store.sadd('set', 'b', 'c')).toBe(1);
    expect(await store.srem('set', 'a', 'z')).toBe(1);
    expect((await store.smembers('set')).sort()).toEqual(['b', 'c']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT STORE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('docPath', () => {
  it('should join segments', () => {
    expect(docPath('users', 'u1', 'push_token')).toBe('users/u1/push_token');
  });

  it('should reject empty or nested segments', () => {
    expect(() => docPath('users', '')).toThrow('Invalid path segment: ""');
    expect(() => docPath('users', 'a/b')).toThrow('Invalid path segment: "a/b"');
  });
});

describe('DocumentStore', () => {
  let kv: MemoryStore;
  let docs: DocumentStore;

  beforeEach(() => {
    kv = new MemoryStore();
    docs = new DocumentStore(kv, 'care:');
  });

  it('should round-trip JSON documents under the prefix', async () => {
    await docs.set(userPaths.details('u1'), { name: 'Ravi' });

    expect(await docs.get(userPaths.details('u1'))).toEqual({ name: 'Ravi' });
    expect(await kv.get('care:doc:users/u1/user_details')).toBe('{"name":"Ravi"}');
    expect(await docs.get(userPaths.details('u2'))).toBeUndefined();
  });

  it('should read unparseable documents as undefined', async () => {
    await kv.set('care:doc:users/u1/user_details', '{not json');
    expect(await docs.get(userPaths.details('u1'))).toBeUndefined();
  });

  it('should index every ancestor of a written path', async () => {
    await docs.set(userPaths.reminder('u1', '2025-03-11', 'r2'), {});
    await docs.set(userPaths.reminder('u1', '2025-03-10', 'r1'), {});
    await docs.set(userPaths.pushToken('u2'), 'token-2');

    expect(await docs.listChildren('users')).toEqual(['u1', 'u2']);
    expect(await docs.listChildren(userPaths.reminderRoot('u1'))).toEqual(['2025-03-10', '2025-03-11']);
    expect(await docs.listChildren(userPaths.reminderDay('u1', '2025-03-10'))).toEqual(['r1']);
  });

  it('should drop a deleted document from its parent index', async () => {
    await docs.set(userPaths.reminder('u1', '2025-03-10', 'r1'), {});
    await docs.set(userPaths.reminder('u1', '2025-03-10', 'r2'), {});

    expect(await docs.delete(userPaths.reminder('u1', '2025-03-10', 'r1'))).toBe(true);
    expect(await docs.delete(userPaths.reminder('u1', '2025-03-10', 'r1'))).toBe(false);
    expect(await docs.listChildren(userPaths.reminderDay('u1', '2025-03-10'))).toEqual(['r2']);
    expect(await docs.exists(userPaths.reminder('u1', '2025-03-10', 'r2'))).toBe(true);
  });

  it('should append to logs in order and skip unparseable entries', async () => {
    const path = userPaths.responses('u1', 'r1');

    expect(await docs.append(path, { response: 'yes' })).toBe(1);
    await kv.rpush('care:log:users/u1/health_track/medicine_responses/r1', 'garbage{');
    expect(await docs.append(path, { response: 'no' })).toBe(3);

    expect(await docs.readLog(path)).toEqual([{ response: 'yes' }, { response: 'no' }]);
  });
});
