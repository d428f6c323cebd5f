// ═══════════════════════════════════════════════════════════════════════════════
// DECISION STAGES — Ordered Guard/Action Pairs for the Engagement Engine
// ═══════════════════════════════════════════════════════════════════════════════
//
//   1. reply-intake     record the reply; "show my reminders" ends here
//   2. medication-due   exact-time check, or the after-the-fact check
//   3. refill-due       refill within the threshold
//   4. direct-reply     answer the reply through the text generator
//   5. category         weighted topic question
//
// A stage whose action returns null passes control to the next stage.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { formatReminderList, isListRemindersRequest, type ReminderSet } from '../reminders/index.js';
import { isAfter, refillIsNear, withinMinutes, type LocalInstant } from '../time/index.js';
import type { RandomSource } from '../weighting/index.js';
import {
  categoryQuestionPrompt,
  contextTurns,
  directReplyPrompt,
  medicationQuestion,
  postReminderQuestion,
  refillQuestion,
} from './prompts.js';
import {
  appendTurn,
  incrementUsage,
  lastAssistantQuestion,
  markAsked,
  wasAskedToday,
} from './state.js';
import { selectTopic, type TopicTaxonomy } from './topics.js';
import type {
  AskedState,
  ConversationTurn,
  ImportantQuestionEntry,
  StageOutcome,
  TextGenerator,
  UserProfile,
} from './types.js';

const logger = getLogger({ component: 'decision-stages' });

export const DIRECT_REPLY_FALLBACK = "Thank you for sharing that with me. I'm here whenever you want to talk.";
export const CATEGORY_QUESTION_FALLBACK = '';

// ─────────────────────────────────────────────────────────────────────────────────
// CONTEXT
// ─────────────────────────────────────────────────────────────────────────────────

export interface DecisionConfig {
  readonly maxHistory: number;
  readonly maxReplyLength: number;
  readonly medicationWindowMinutes: number;
  readonly exactWindowMinutes: number;
  readonly refillThresholdDays: number;
}

export const DEFAULT_DECISION_CONFIG: DecisionConfig = {
  maxHistory: 50,
  maxReplyLength: 1000,
  medicationWindowMinutes: 60,
  exactWindowMinutes: 1,
  refillThresholdDays: 3,
};

/**
 * Mutable working copy of the user's state for one decision.
 */
export interface DecisionDraft {
  history: ConversationTurn[];
  askedReminders: Record<string, AskedState>;
  categoryUsage: Record<string, number>;
  subcategoryUsage: Record<string, number>;
  importantEntry?: ImportantQuestionEntry;
}

export interface StageContext {
  readonly reminders: ReminderSet;
  readonly profile: UserProfile;
  /** Trimmed-empty replies are absent */
  readonly reply?: string;
  readonly now: LocalInstant;
  readonly config: DecisionConfig;
  readonly textGenerator: TextGenerator;
  readonly random: RandomSource;
  readonly taxonomy: TopicTaxonomy;
  readonly draft: DecisionDraft;
}

export interface DecisionStage {
  readonly name: string;
  guard(ctx: StageContext): boolean;
  action(ctx: StageContext): Promise<StageOutcome | null>;
}

async function generate(ctx: StageContext, prompt: string, fallback: string, purpose: string): Promise<string> {
  try {
    const text = await ctx.textGenerator.complete(prompt, contextTurns(ctx.draft.history));
    return text.trim();
  } catch (error) {
    logger.warn('Text generation failed, using fallback', {
      purpose,
      reason: error instanceof Error ? error.message : String(error),
    });
    return fallback;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// STAGES
// ─────────────────────────────────────────────────────────────────────────────────

export const replyIntakeStage: DecisionStage = {
  name: 'reply-intake',

  guard: ctx => ctx.reply !== undefined,

  async action(ctx) {
    const reply = ctx.reply ?? '';
    const { draft, now } = ctx;

    const previousQuestion = lastAssistantQuestion(draft.history);
    if (previousQuestion?.isCategoryQuestion) {
      draft.importantEntry = {
        question: previousQuestion.content,
        reply,
        questionTimestamp: previousQuestion.timestamp,
        replyTimestamp: now.iso,
      };
    }

    draft.history = appendTurn(draft.history, {
      role: 'user',
      content: reply,
      timestamp: now.iso,
      type: 'response',
      isCategoryQuestion: false,
      category: null,
      subcategory: null,
    }, ctx.config.maxHistory);

    if (isListRemindersRequest(reply)) {
      return {
        intent: 'reminder_list',
        content: formatReminderList(ctx.reminders.values()),
        turnType: 'response',
        isCategoryQuestion: false,
      };
    }

    return null;
  },
};

export const medicationStage: DecisionStage = {
  name: 'medication-due',

  guard: ctx => ctx.reminders.size > 0,

  async action(ctx) {
    const { draft, now, config } = ctx;

    for (const [id, reminder] of ctx.reminders) {
      if (!reminder.time) continue;

      const inWindow = withinMinutes(reminder.time, now, config.medicationWindowMinutes);
      if (inWindow && !wasAskedToday(draft.askedReminders, id, 'withinHourAsked', now.date)) {
        if (withinMinutes(reminder.time, now, config.exactWindowMinutes)) {
          markAsked(draft.askedReminders, id, 'withinHourAsked', now.date);
          return {
            intent: 'medication_check',
            content: medicationQuestion(ctx.profile, reminder),
            turnType: 'question',
            isCategoryQuestion: false,
            reminderId: id,
          };
        }
        // In the window but not yet exact: nothing for this reminder this pass.
        continue;
      }

      if (isAfter(reminder.time, now) && !wasAskedToday(draft.askedReminders, id, 'postReminderAsked', now.date)) {
        markAsked(draft.askedReminders, id, 'postReminderAsked', now.date);
        return {
          intent: 'post_reminder_check',
          content: postReminderQuestion(ctx.profile, reminder),
          turnType: 'question',
          isCategoryQuestion: false,
          reminderId: id,
        };
      }
    }

    return null;
  },
};

export const refillStage: DecisionStage = {
  name: 'refill-due',

  guard: ctx => ctx.reminders.size > 0,

  async action(ctx) {
    const { draft, now, config } = ctx;

    for (const [id, reminder] of ctx.reminders) {
      if (!reminder.refillDate) continue;

      if (
        refillIsNear(reminder.refillDate, now, config.refillThresholdDays) &&
        !wasAskedToday(draft.askedReminders, id, 'refillAsked', now.date)
      ) {
        markAsked(draft.askedReminders, id, 'refillAsked', now.date);
        return {
          intent: 'refill_check',
          content: refillQuestion(ctx.profile, reminder),
          turnType: 'question',
          isCategoryQuestion: false,
          reminderId: id,
        };
      }
    }

    return null;
  },
};

export const directReplyStage: DecisionStage = {
  name: 'direct-reply',

  guard: ctx => ctx.reply !== undefined,

  async action(ctx) {
    const prompt = directReplyPrompt(ctx.profile, ctx.reminders.values(), ctx.reply ?? '', ctx.now);
    const content = await generate(ctx, prompt, DIRECT_REPLY_FALLBACK, 'direct-reply');

    return {
      intent: 'direct_reply',
      content,
      turnType: 'response',
      isCategoryQuestion: false,
    };
  },
};

export const categoryStage: DecisionStage = {
  name: 'category',

  guard: ctx => ctx.reply === undefined,

  async action(ctx) {
    const { draft } = ctx;

    const topic = selectTopic(ctx.taxonomy, draft.categoryUsage, draft.subcategoryUsage, ctx.random);
    if (!topic) {
      logger.error('No topic could be selected from the taxonomy');
      return {
        intent: 'category_question',
        content: CATEGORY_QUESTION_FALLBACK,
        turnType: 'question',
        isCategoryQuestion: false,
      };
    }

    // Counted at decision time, before generation can fail.
    incrementUsage(draft.categoryUsage, topic.category);
    incrementUsage(draft.subcategoryUsage, topic.subcategory);

    const prompt = categoryQuestionPrompt(ctx.profile, ctx.reminders.values(), topic, ctx.now);
    const content = await generate(ctx, prompt, CATEGORY_QUESTION_FALLBACK, 'category-question');

    return {
      intent: 'category_question',
      content,
      turnType: 'question',
      isCategoryQuestion: true,
      category: topic.category,
      subcategory: topic.subcategory,
    };
  },
};

/**
 * Evaluation order; first non-null outcome wins.
 */
export const DECISION_STAGES: readonly DecisionStage[] = [
  replyIntakeStage,
  medicationStage,
  refillStage,
  directReplyStage,
  categoryStage,
];
