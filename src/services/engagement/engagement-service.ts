// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT SERVICE — Load, Decide, Persist for One User
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each user's read-decide-write runs under a per-user lock so a scheduled tick
// and a request for the same user never interleave. With a lease-capable store
// the lock spans instances.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  decideEngagement,
  type DecisionConfig,
  type EngagementDecision,
  type TextGenerator,
  type TopicTaxonomy,
} from '../../core/engagement/index.js';
import type { LocalInstant } from '../../core/time/index.js';
import type { RandomSource } from '../../core/weighting/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { err, appError, ErrorCode, type AsyncAppResult } from '../../types/result.js';
import type { MedicationReminderService } from '../medication/index.js';
import type { ProfileStore } from '../users/index.js';
import { KeyedLock, type UserLock } from './keyed-lock.js';
import type { EngagementStateStore } from './state-store.js';

const logger = getLogger({ component: 'engagement-service' });

export interface EngagementServiceDeps {
  readonly stateStore: EngagementStateStore;
  readonly reminders: MedicationReminderService;
  readonly profiles: ProfileStore;
  readonly textGenerator: TextGenerator;
  readonly random: RandomSource;
  readonly taxonomy: TopicTaxonomy;
  readonly decisionConfig?: Partial<DecisionConfig>;
  readonly lock?: UserLock;
}

export class EngagementService {
  private readonly deps: EngagementServiceDeps;
  private readonly lock: UserLock;

  constructor(deps: EngagementServiceDeps) {
    this.deps = deps;
    this.lock = deps.lock ?? new KeyedLock();
  }

  /**
   * Decide the next message for `userId` and persist the updated state.
   * `reply` is the user's latest message, if any.
   */
  async engage(userId: string, reply: string | undefined, now: LocalInstant): AsyncAppResult<EngagementDecision> {
    try {
      return await this.lock.run(userId, () => this.decideAndPersist(userId, reply, now));
    } catch (error) {
      logger.error('Engagement failed', error, { userId });
      return err(appError(ErrorCode.STORE_ERROR, 'Failed to load or save engagement state', {
        cause: error instanceof Error ? error : undefined,
        context: { userId },
      }));
    }
  }

  private async decideAndPersist(
    userId: string,
    reply: string | undefined,
    now: LocalInstant
  ): AsyncAppResult<EngagementDecision> {
    const { stateStore, reminders, profiles } = this.deps;

    const [state, todays, profile] = await Promise.all([
      stateStore.load(userId),
      reminders.getTodaysReminders(userId, now.date),
      profiles.getProfile(userId),
    ]);

    const result = await decideEngagement(
      { state, reminders: todays, profile, reply },
      now,
      {
        textGenerator: this.deps.textGenerator,
        random: this.deps.random,
        taxonomy: this.deps.taxonomy,
        config: this.deps.decisionConfig,
      }
    );
    if (!result.ok) return result;

    const decision = result.value;
    await stateStore.save(userId, decision.state);
    if (decision.importantEntry) {
      await stateStore.appendImportant(userId, decision.importantEntry);
    }

    logger.info('Engagement decided', { userId, intent: decision.intent, reminderId: decision.reminderId });
    return result;
  }
}

export function createEngagementService(deps: EngagementServiceDeps): EngagementService {
  return new EngagementService(deps);
}
