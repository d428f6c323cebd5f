// ═══════════════════════════════════════════════════════════════════════════════
// CHAT SERVICE — Free-Form Chat Under the Engagement Lock
// ═══════════════════════════════════════════════════════════════════════════════

import {
  respondToChat,
  type ChatResult,
  type DecisionConfig,
  type TextGenerator,
} from '../../core/engagement/index.js';
import type { LocalInstant } from '../../core/time/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { err, appError, ErrorCode, type AsyncAppResult } from '../../types/result.js';
import type { MedicationReminderService } from '../medication/index.js';
import type { ProfileStore } from '../users/index.js';
import type { UserLock } from './keyed-lock.js';
import type { EngagementStateStore } from './state-store.js';

const logger = getLogger({ component: 'chat-service' });

export interface ChatServiceDeps {
  readonly stateStore: EngagementStateStore;
  readonly reminders: MedicationReminderService;
  readonly profiles: ProfileStore;
  readonly textGenerator: TextGenerator;
  /** Must be the lock the engagement service uses */
  readonly lock: UserLock;
  readonly config?: Partial<Pick<DecisionConfig, 'maxHistory' | 'maxReplyLength'>>;
}

export class ChatService {
  private readonly deps: ChatServiceDeps;

  constructor(deps: ChatServiceDeps) {
    this.deps = deps;
  }

  async chat(userId: string, message: string | undefined, now: LocalInstant): AsyncAppResult<ChatResult> {
    try {
      return await this.deps.lock.run(userId, () => this.respondAndPersist(userId, message, now));
    } catch (error) {
      logger.error('Chat failed', error, { userId });
      return err(appError(ErrorCode.STORE_ERROR, 'Failed to load or save the conversation', {
        cause: error instanceof Error ? error : undefined,
        context: { userId },
      }));
    }
  }

  private async respondAndPersist(
    userId: string,
    message: string | undefined,
    now: LocalInstant
  ): AsyncAppResult<ChatResult> {
    const { stateStore, reminders, profiles } = this.deps;

    const [state, todays, profile] = await Promise.all([
      stateStore.load(userId),
      reminders.getTodaysReminders(userId, now.date),
      profiles.getProfile(userId),
    ]);

    const result = await respondToChat(
      { state, reminders: todays, profile, message },
      now,
      { textGenerator: this.deps.textGenerator, config: this.deps.config }
    );
    if (!result.ok) return result;

    await stateStore.save(userId, result.value.state);
    if (result.value.importantEntry) {
      await stateStore.appendImportant(userId, result.value.importantEntry);
    }

    logger.info('Chat answered', { userId, greeted: result.value.greeted });
    return result;
  }
}
