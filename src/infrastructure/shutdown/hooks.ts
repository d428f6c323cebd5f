// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HOOKS — Prioritized Cleanup Registry
// ═══════════════════════════════════════════════════════════════════════════════
//
// Hooks run in priority groups (critical → low). Hooks within a group run in
// parallel; each is bounded by its own timeout and a failing hook never stops
// the others.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';

const logger = getLogger({ component: 'shutdown' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ShutdownPriority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITY_ORDER: readonly ShutdownPriority[] = ['critical', 'high', 'normal', 'low'];

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
  readonly priority: ShutdownPriority;
  readonly timeoutMs: number;
}

export interface HookResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly timedOut: boolean;
  readonly error?: Error;
}

export interface ShutdownResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly hooks: readonly HookResult[];
  readonly failed: readonly string[];
}

class HookTimeoutError extends Error {
  constructor(name: string, timeoutMs: number) {
    super(`Shutdown hook "${name}" timed out after ${timeoutMs}ms`);
    this.name = 'HookTimeoutError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

export class ShutdownRegistry {
  private readonly hooks = new Map<string, ShutdownHook>();
  private readonly defaultTimeoutMs: number;

  constructor(defaultTimeoutMs: number = 5000) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  register(
    name: string,
    fn: ShutdownHookFn,
    options: { priority?: ShutdownPriority; timeoutMs?: number } = {}
  ): void {
    if (this.hooks.has(name)) {
      logger.warn('Overwriting existing shutdown hook', { name });
    }
    this.hooks.set(name, {
      name,
      fn,
      priority: options.priority ?? 'normal',
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
    });
  }

  unregister(name: string): boolean {
    return this.hooks.delete(name);
  }

  get size(): number {
    return this.hooks.size;
  }

  async run(): Promise<ShutdownResult> {
    const start = Date.now();
    const results: HookResult[] = [];

    for (const priority of PRIORITY_ORDER) {
      const group = Array.from(this.hooks.values()).filter(h => h.priority === priority);
      if (group.length === 0) continue;

      results.push(...await Promise.all(group.map(hook => this.execute(hook))));
    }

    const failed = results.filter(r => !r.success).map(r => r.name);
    const result: ShutdownResult = {
      success: failed.length === 0,
      totalDurationMs: Date.now() - start,
      hooks: results,
      failed,
    };

    logger.info('Shutdown hooks completed', {
      success: result.success,
      total: results.length,
      failed,
      totalDurationMs: result.totalDurationMs,
    });
    return result;
  }

  private async execute(hook: ShutdownHook): Promise<HookResult> {
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        Promise.resolve().then(hook.fn),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new HookTimeoutError(hook.name, hook.timeoutMs)), hook.timeoutMs);
        }),
      ]);
      return { name: hook.name, success: true, durationMs: Date.now() - start, timedOut: false };
    } catch (error) {
      const timedOut = error instanceof HookTimeoutError;
      logger.error('Shutdown hook failed', error, { name: hook.name, timedOut });
      return {
        name: hook.name,
        success: false,
        durationMs: Date.now() - start,
        timedOut,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Stop accepting connections and wait for in-flight requests.
 */
export function createServerCloseHook(
  server: { close: (callback?: (err?: Error) => void) => unknown }
): ShutdownHookFn {
  return () => new Promise<void>((resolve, reject) => {
    server.close(err => {
      if (err) reject(err);
      else resolve();
    });
  });
}

export function createDisconnectHook(client: { disconnect: () => Promise<void> | void }): ShutdownHookFn {
  return () => client.disconnect();
}
