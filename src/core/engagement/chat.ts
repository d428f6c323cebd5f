// ═══════════════════════════════════════════════════════════════════════════════
// FREE-FORM CHAT — User-Initiated Messages on the Shared Conversation Log
// ═══════════════════════════════════════════════════════════════════════════════
//
// Chat turns land in the same history the engagement engine reads, so a chat
// message can answer the last category question like an engagement reply.
// Asked-reminder flags and topic counters are left untouched.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, appError, ErrorCode, type AsyncAppResult } from '../../types/result.js';
import { getLogger } from '../../observability/logging/index.js';
import type { ReminderSet } from '../reminders/index.js';
import type { LocalInstant } from '../time/index.js';
import { chatPrompt, contextTurns, greetingMessage } from './prompts.js';
import { DEFAULT_DECISION_CONFIG, DIRECT_REPLY_FALLBACK, type DecisionConfig } from './stages.js';
import { appendTurn, lastAssistantQuestion } from './state.js';
import type {
  ConversationTurn,
  EngagementState,
  ImportantQuestionEntry,
  TextGenerator,
  UserProfile,
} from './types.js';

const logger = getLogger({ component: 'chat' });

const GREETING_TRIGGER = 'hello';
const EMPTY_CHAT_RESPONSE = 'No conversation history';

export interface ChatInput {
  readonly state: EngagementState;
  readonly reminders: ReminderSet;
  readonly profile: UserProfile;
  readonly message?: string;
}

export interface ChatDeps {
  readonly textGenerator: TextGenerator;
  readonly config?: Partial<Pick<DecisionConfig, 'maxHistory' | 'maxReplyLength'>>;
}

export interface ChatResult {
  /** Message shown to the user */
  readonly response: string;
  readonly greeted: boolean;
  readonly timestamp: string;
  readonly state: EngagementState;
  readonly importantEntry?: ImportantQuestionEntry;
}

function assistantTurn(content: string, now: LocalInstant): ConversationTurn {
  return {
    role: 'assistant',
    content,
    timestamp: now.iso,
    type: 'response',
    isCategoryQuestion: false,
    category: null,
    subcategory: null,
  };
}

/**
 * Greets on an empty conversation or a plain "hello", then answers the
 * message, if any, through the text generator.
 */
export async function respondToChat(input: ChatInput, now: LocalInstant, deps: ChatDeps): AsyncAppResult<ChatResult> {
  const config = { ...DEFAULT_DECISION_CONFIG, ...deps.config };

  if (input.message !== undefined && input.message.length > config.maxReplyLength) {
    return err(appError(
      ErrorCode.VALIDATION_ERROR,
      `Message exceeds maximum length of ${config.maxReplyLength} characters`,
      { context: { length: input.message.length } }
    ));
  }

  const message = input.message?.trim() || undefined;
  let history = [...input.state.history];

  const greeted = history.length === 0 || message?.toLowerCase() === GREETING_TRIGGER;
  let response: string | undefined;
  if (greeted) {
    response = greetingMessage(input.profile, now);
    history = appendTurn(history, assistantTurn(response, now), config.maxHistory);
  }

  let importantEntry: ImportantQuestionEntry | undefined;
  if (message !== undefined) {
    const previousQuestion = lastAssistantQuestion(history);
    if (previousQuestion?.isCategoryQuestion) {
      importantEntry = {
        question: previousQuestion.content,
        reply: message,
        questionTimestamp: previousQuestion.timestamp,
        replyTimestamp: now.iso,
      };
    }

    history = appendTurn(history, {
      role: 'user',
      content: message,
      timestamp: now.iso,
      type: 'response',
      isCategoryQuestion: false,
      category: null,
      subcategory: null,
    }, config.maxHistory);

    response = await generateReply(deps.textGenerator, chatPrompt(input.profile, input.reminders.values(), message, now), history);
    history = appendTurn(history, assistantTurn(response, now), config.maxHistory);
  }

  return ok({
    response: response ?? history[history.length - 1]?.content ?? EMPTY_CHAT_RESPONSE,
    greeted,
    timestamp: now.iso,
    state: { ...input.state, history },
    importantEntry,
  });
}

async function generateReply(
  textGenerator: TextGenerator,
  prompt: string,
  history: readonly ConversationTurn[]
): Promise<string> {
  try {
    const text = (await textGenerator.complete(prompt, contextTurns(history))).trim();
    return text || DIRECT_REPLY_FALLBACK;
  } catch (error) {
    logger.warn('Chat generation failed, using fallback', {
      reason: error instanceof Error ? error.message : String(error),
    });
    return DIRECT_REPLY_FALLBACK;
  }
}
