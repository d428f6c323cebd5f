// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HANDLER — Signal Handling and Exit Codes
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import type { ShutdownRegistry, ShutdownResult } from './hooks.js';

const logger = getLogger({ component: 'shutdown' });

export interface ShutdownConfig {
  /** Budget for the whole shutdown */
  readonly timeoutMs: number;
  readonly signals: readonly NodeJS.Signals[];
  readonly exitCodeSuccess: number;
  readonly exitCodeFailure: number;
  readonly exitCodeTimeout: number;
  /** Called with the exit code once hooks finish; defaults to process.exit */
  readonly exit: (code: number) => void;
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  timeoutMs: 30_000,
  signals: ['SIGTERM', 'SIGINT'],
  exitCodeSuccess: 0,
  exitCodeFailure: 1,
  exitCodeTimeout: 124,
  exit: code => process.exit(code),
};

export type ShutdownOutcome = ShutdownResult | 'timeout';

/**
 * Runs the registry at most once, however many signals arrive.
 */
export class ShutdownHandler {
  private readonly registry: ShutdownRegistry;
  private readonly config: ShutdownConfig;
  private readonly listeners = new Map<NodeJS.Signals, () => void>();
  private pending: Promise<ShutdownOutcome> | null = null;

  constructor(registry: ShutdownRegistry, config?: Partial<ShutdownConfig>) {
    this.registry = registry;
    this.config = { ...DEFAULT_SHUTDOWN_CONFIG, ...config };
  }

  get isShuttingDown(): boolean {
    return this.pending !== null;
  }

  install(): void {
    for (const signal of this.config.signals) {
      if (this.listeners.has(signal)) continue;

      const listener = () => {
        logger.info('Received shutdown signal', { signal });
        this.shutdown(signal).catch(error => {
          logger.error('Shutdown failed', error, { signal });
          this.config.exit(this.config.exitCodeFailure);
        });
      };
      this.listeners.set(signal, listener);
      process.on(signal, listener);
    }
  }

  uninstall(): void {
    for (const [signal, listener] of this.listeners) {
      process.off(signal, listener);
    }
    this.listeners.clear();
  }

  shutdown(reason: string = 'manual'): Promise<ShutdownOutcome> {
    if (!this.pending) {
      this.pending = this.perform(reason);
    }
    return this.pending;
  }

  private async perform(reason: string): Promise<ShutdownOutcome> {
    logger.info('Starting graceful shutdown', { reason, timeoutMs: this.config.timeoutMs });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.config.timeoutMs);
    });

    const outcome = await Promise.race([this.registry.run(), timeout]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      logger.error('Shutdown timed out', undefined, { timeoutMs: this.config.timeoutMs });
      this.config.exit(this.config.exitCodeTimeout);
    } else if (outcome.success) {
      logger.info('Graceful shutdown completed', { totalDurationMs: outcome.totalDurationMs });
      this.config.exit(this.config.exitCodeSuccess);
    } else {
      logger.warn('Shutdown completed with failures', { failed: outcome.failed });
      this.config.exit(this.config.exitCodeFailure);
    }

    return outcome;
  }
}
