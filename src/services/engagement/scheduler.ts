// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT SCHEDULER — Periodic Proactive Engagement for Every User
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each tick walks every stored user, runs one engagement decision without a
// reply, and pushes the question to the user's device when there is one.
// A failing user is logged and counted; the tick carries on with the rest.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { SchedulerConfig } from '../../config/index.js';
import type { LocalInstant } from '../../core/time/index.js';
import { NOTIFICATION_TITLES, type Notifier } from '../../notifications/index.js';
import { getLogger } from '../../observability/logging/index.js';
import type { ProfileStore } from '../users/index.js';
import type { EngagementService } from './engagement-service.js';

const logger = getLogger({ component: 'engagement-scheduler' });

export interface TickReport {
  readonly users: number;
  readonly engaged: number;
  readonly pushed: number;
  readonly failed: number;
}

export interface EngagementSchedulerDeps {
  readonly engagement: EngagementService;
  readonly profiles: ProfileStore;
  readonly notifier: Notifier;
  readonly config: SchedulerConfig;
  /** Current instant in the configured zone */
  readonly clock: () => LocalInstant;
}

type UserOutcome = 'engaged' | 'pushed' | 'failed';

export class EngagementScheduler {
  private readonly deps: EngagementSchedulerDeps;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(deps: EngagementSchedulerDeps) {
    this.deps = deps;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.running) {
        logger.warn('Previous tick still running, skipping');
        return;
      }
      this.runTick(this.deps.clock()).catch(error => {
        logger.error('Scheduler tick failed', error);
      });
    }, this.deps.config.intervalMs);

    logger.info('Engagement scheduler started', { intervalMs: this.deps.config.intervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Engagement scheduler stopped');
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  async runTick(now: LocalInstant): Promise<TickReport> {
    this.running = true;
    try {
      const userIds = await this.deps.profiles.listUserIds();
      const outcomes = await mapWithConcurrency(userIds, this.deps.config.concurrency, id => this.engageUser(id, now));

      const report: TickReport = {
        users: userIds.length,
        engaged: outcomes.filter(o => o !== 'failed').length,
        pushed: outcomes.filter(o => o === 'pushed').length,
        failed: outcomes.filter(o => o === 'failed').length,
      };
      logger.info('Scheduler tick complete', { ...report, at: now.iso });
      return report;
    } finally {
      this.running = false;
    }
  }

  private async engageUser(userId: string, now: LocalInstant): Promise<UserOutcome> {
    try {
      const result = await this.deps.engagement.engage(userId, undefined, now);
      if (!result.ok) {
        logger.warn('Engagement failed for user', { userId, code: result.error.code, message: result.error.message });
        return 'failed';
      }

      const decision = result.value;
      if (!decision.content) return 'engaged';

      const token = await this.deps.profiles.getPushToken(userId);
      if (!token) return 'engaged';

      const sent = await this.deps.notifier.send(token, NOTIFICATION_TITLES.newQuestion, decision.content, {
        intent: decision.intent,
      });
      return sent ? 'pushed' : 'engaged';
    } catch (error) {
      logger.error('Engagement threw for user', error, { userId });
      return 'failed';
    }
  }
}

async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export function createEngagementScheduler(deps: EngagementSchedulerDeps): EngagementScheduler {
  return new EngagementScheduler(deps);
}
