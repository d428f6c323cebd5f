// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT DECISION ENGINE — Next Outbound Message for One User
// ═══════════════════════════════════════════════════════════════════════════════
//
// Takes the user's state in, returns the decision and the full updated state.
// Never reads the clock and never touches the store: `now` and persistence
// belong to the caller.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, appError, ErrorCode, type AsyncAppResult } from '../../types/result.js';
import { getLogger } from '../../observability/logging/index.js';
import type { ReminderSet } from '../reminders/index.js';
import type { LocalInstant } from '../time/index.js';
import type { RandomSource } from '../weighting/index.js';
import {
  DECISION_STAGES,
  DEFAULT_DECISION_CONFIG,
  type DecisionConfig,
  type DecisionDraft,
  type DecisionStage,
  type StageContext,
} from './stages.js';
import { appendTurn } from './state.js';
import type { TopicTaxonomy } from './topics.js';
import type {
  EngagementDecision,
  EngagementState,
  StageOutcome,
  TextGenerator,
  UserProfile,
} from './types.js';

const logger = getLogger({ component: 'decision-engine' });

export interface EngagementInput {
  readonly state: EngagementState;
  readonly reminders: ReminderSet;
  readonly profile: UserProfile;
  readonly reply?: string;
}

export interface EngagementDeps {
  readonly textGenerator: TextGenerator;
  readonly random: RandomSource;
  readonly taxonomy: TopicTaxonomy;
  readonly config?: Partial<DecisionConfig>;
  /** Override the stage table (tests) */
  readonly stages?: readonly DecisionStage[];
}

function createDraft(state: EngagementState): DecisionDraft {
  const askedReminders: DecisionDraft['askedReminders'] = {};
  for (const [id, entry] of Object.entries(state.askedReminders)) {
    askedReminders[id] = { ...entry };
  }

  return {
    history: [...state.history],
    askedReminders,
    categoryUsage: { ...state.categoryUsage },
    subcategoryUsage: { ...state.subcategoryUsage },
  };
}

/**
 * Decide the next message. A reply longer than the configured limit is a
 * validation error and leaves the state untouched.
 */
export async function decideEngagement(
  input: EngagementInput,
  now: LocalInstant,
  deps: EngagementDeps
): AsyncAppResult<EngagementDecision> {
  const config: DecisionConfig = { ...DEFAULT_DECISION_CONFIG, ...deps.config };

  if (input.reply !== undefined && input.reply.length > config.maxReplyLength) {
    return err(appError(
      ErrorCode.VALIDATION_ERROR,
      `Reply exceeds maximum length of ${config.maxReplyLength} characters`,
      { context: { length: input.reply.length } }
    ));
  }

  const reply = input.reply !== undefined && input.reply.trim().length > 0 ? input.reply : undefined;
  const draft = createDraft(input.state);

  const ctx: StageContext = {
    reminders: input.reminders,
    profile: input.profile,
    reply,
    now,
    config,
    textGenerator: deps.textGenerator,
    random: deps.random,
    taxonomy: deps.taxonomy,
    draft,
  };

  let outcome: StageOutcome | null = null;
  for (const stage of deps.stages ?? DECISION_STAGES) {
    if (!stage.guard(ctx)) continue;

    outcome = await stage.action(ctx);
    if (outcome) {
      logger.debug('Stage matched', { stage: stage.name, intent: outcome.intent });
      break;
    }
  }

  if (!outcome) {
    return err(appError(ErrorCode.INTERNAL_ERROR, 'No decision stage produced a message'));
  }

  const history = appendTurn(draft.history, {
    role: 'assistant',
    content: outcome.content,
    timestamp: now.iso,
    type: outcome.turnType,
    isCategoryQuestion: outcome.isCategoryQuestion,
    category: outcome.category ?? null,
    subcategory: outcome.subcategory ?? null,
  }, config.maxHistory);

  return ok({
    ...outcome,
    timestamp: now.iso,
    importantEntry: draft.importantEntry,
    state: {
      history,
      askedReminders: draft.askedReminders,
      categoryUsage: draft.categoryUsage,
      subcategoryUsage: draft.subcategoryUsage,
    },
  });
}
