// ═══════════════════════════════════════════════════════════════════════════════
// KEYED LOCK — In-Process Serialization per Key
// ═══════════════════════════════════════════════════════════════════════════════
//
// Tasks for the same key run one after another in arrival order; tasks for
// different keys run concurrently. Only covers a single process.
//
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Serializes tasks that share a key.
 */
export interface UserLock {
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
}

export class KeyedLock implements UserLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with a running or queued task */
  get activeKeys(): number {
    return this.tails.size;
  }
}
