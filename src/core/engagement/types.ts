// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT TYPES — Per-User Engagement State and Decisions
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERSATION
// ─────────────────────────────────────────────────────────────────────────────────

export const ConversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
  type: z.enum(['question', 'response']),
  isCategoryQuestion: z.boolean().default(false),
  category: z.string().nullable().default(null),
  subcategory: z.string().nullable().default(null),
});

export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export type TurnType = ConversationTurn['type'];

// ─────────────────────────────────────────────────────────────────────────────────
// ASKED STATE
// ─────────────────────────────────────────────────────────────────────────────────

export const AskedStateSchema = z.object({
  withinHourAsked: z.boolean().optional(),
  postReminderAsked: z.boolean().optional(),
  refillAsked: z.boolean().optional(),
  /** Calendar date the flags apply to; flags on any other date are stale */
  date: z.string().optional(),
});

export type AskedState = z.infer<typeof AskedStateSchema>;

export type AskedFlag = 'withinHourAsked' | 'postReminderAsked' | 'refillAsked';

// ─────────────────────────────────────────────────────────────────────────────────
// STATE
// ─────────────────────────────────────────────────────────────────────────────────

export interface EngagementState {
  readonly history: readonly ConversationTurn[];
  readonly askedReminders: Readonly<Record<string, AskedState>>;
  readonly categoryUsage: Readonly<Record<string, number>>;
  readonly subcategoryUsage: Readonly<Record<string, number>>;
}

export const ImportantQuestionEntrySchema = z.object({
  question: z.string(),
  reply: z.string(),
  questionTimestamp: z.string(),
  replyTimestamp: z.string(),
});

export type ImportantQuestionEntry = z.infer<typeof ImportantQuestionEntrySchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// PROFILE
// ─────────────────────────────────────────────────────────────────────────────────

export const UserProfileSchema = z.object({
  name: z.string().optional(),
  age: z.union([z.number(), z.string()]).optional(),
  hobbies: z.string().optional(),
  medicalHistory: z.string().optional(),
  medicines: z.array(z.object({
    medicineName: z.string().optional(),
    dosage: z.string().optional(),
  })).catch([]),
});

export type UserProfile = z.infer<typeof UserProfileSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// DECISIONS
// ─────────────────────────────────────────────────────────────────────────────────

export type EngagementIntent =
  | 'reminder_list'
  | 'medication_check'
  | 'post_reminder_check'
  | 'refill_check'
  | 'direct_reply'
  | 'category_question';

/**
 * What a stage produced: the next outbound message and how to log it.
 */
export interface StageOutcome {
  readonly intent: EngagementIntent;
  readonly content: string;
  readonly turnType: TurnType;
  readonly isCategoryQuestion: boolean;
  readonly category?: string;
  readonly subcategory?: string;
  /** Reminder the question is about */
  readonly reminderId?: string;
}

export interface EngagementDecision extends StageOutcome {
  /** Full state to persist in a single write */
  readonly state: EngagementState;
  /** Set when the reply answered a category question */
  readonly importantEntry?: ImportantQuestionEntry;
  readonly timestamp: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLABORATORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Turns a prompt into text. May reject or time out.
 */
export interface TextGenerator {
  complete(prompt: string, contextTurns: readonly ConversationTurn[]): Promise<string>;
}
