export * from './types.js';
export {
  DEFAULT_MAX_HISTORY,
  createDefaultState,
  parseEngagementState,
  parseImportantEntries,
  wasAskedToday,
  markAsked,
  truncateHistory,
  appendTurn,
  lastAssistantQuestion,
  incrementUsage,
} from './state.js';
export {
  type TopicCategory,
  type TopicTaxonomy,
  type TopicChoice,
  parseTopicTaxonomy,
  loadTopicTaxonomy,
  selectTopic,
} from './topics.js';
export {
  CONTEXT_TURNS,
  medicationQuestion,
  postReminderQuestion,
  refillQuestion,
  greetingMessage,
  directReplyPrompt,
  chatPrompt,
  categoryQuestionPrompt,
  contextTurns,
} from './prompts.js';
export {
  DIRECT_REPLY_FALLBACK,
  CATEGORY_QUESTION_FALLBACK,
  DEFAULT_DECISION_CONFIG,
  DECISION_STAGES,
  type DecisionConfig,
  type DecisionDraft,
  type DecisionStage,
  type StageContext,
} from './stages.js';
export {
  type EngagementInput,
  type EngagementDeps,
  decideEngagement,
} from './decision-engine.js';
export {
  type ChatInput,
  type ChatDeps,
  type ChatResult,
  respondToChat,
} from './chat.js';
