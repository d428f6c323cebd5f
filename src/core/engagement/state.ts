// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT STATE — Parsing, Asked-Today Bookkeeping, History Truncation
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { getLogger } from '../../observability/logging/index.js';
import {
  AskedStateSchema,
  ConversationTurnSchema,
  ImportantQuestionEntrySchema,
  type AskedFlag,
  type AskedState,
  type ConversationTurn,
  type EngagementState,
  type ImportantQuestionEntry,
} from './types.js';

const logger = getLogger({ component: 'engagement-state' });

export const DEFAULT_MAX_HISTORY = 50;

const UsageSchema = z.record(z.number().int().nonnegative());

const StoredStateSchema = z.object({
  history: z.array(ConversationTurnSchema).catch([]),
  askedReminders: z.record(AskedStateSchema).catch({}),
  categoryUsage: UsageSchema.catch({}),
  subcategoryUsage: UsageSchema.catch({}),
});

const StoredImportantSchema = z.object({
  entries: z.array(ImportantQuestionEntrySchema).catch([]),
});

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

export function createDefaultState(): EngagementState {
  return { history: [], askedReminders: {}, categoryUsage: {}, subcategoryUsage: {} };
}

/**
 * Read persisted engagement state. A missing document is the default state;
 * a malformed one (or malformed field) is replaced by defaults with a warning.
 */
export function parseEngagementState(raw: unknown): EngagementState {
  if (raw === undefined || raw === null) {
    return createDefaultState();
  }

  if (typeof raw !== 'object' || Array.isArray(raw)) {
    logger.warn('Engagement state is not an object, using defaults', { type: typeof raw });
    return createDefaultState();
  }

  const result = StoredStateSchema.safeParse(raw);
  if (!result.success) {
    logger.warn('Engagement state unreadable, using defaults', { issues: result.error.issues.length });
    return createDefaultState();
  }

  return result.data;
}

/**
 * Read the stored important-question entries, defaulting to none.
 */
export function parseImportantEntries(raw: unknown): ImportantQuestionEntry[] {
  if (raw === undefined || raw === null) return [];

  const result = StoredImportantSchema.safeParse(raw);
  if (!result.success) {
    logger.warn('Important question log unreadable, starting empty');
    return [];
  }
  return result.data.entries;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ASKED-TODAY BOOKKEEPING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * True if `flag` was set for this reminder on `today`. Flags recorded under
 * any other date are stale and read as false.
 */
export function wasAskedToday(
  asked: Readonly<Record<string, AskedState>>,
  reminderId: string,
  flag: AskedFlag,
  today: string
): boolean {
  const entry = asked[reminderId];
  return entry?.date === today && entry[flag] === true;
}

/**
 * Record that `flag` was asked today. Flags from an earlier date are dropped
 * rather than carried into the new date.
 */
export function markAsked(
  asked: Record<string, AskedState>,
  reminderId: string,
  flag: AskedFlag,
  today: string
): void {
  const existing = asked[reminderId];
  const base: AskedState = existing?.date === today ? existing : { date: today };
  asked[reminderId] = { ...base, [flag]: true, date: today };
}

// ─────────────────────────────────────────────────────────────────────────────────
// HISTORY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Keep only the newest `max` turns, in order.
 */
export function truncateHistory(history: readonly ConversationTurn[], max: number = DEFAULT_MAX_HISTORY): ConversationTurn[] {
  return history.length > max ? history.slice(history.length - max) : [...history];
}

/**
 * Append a turn and truncate.
 */
export function appendTurn(
  history: readonly ConversationTurn[],
  turn: ConversationTurn,
  max: number = DEFAULT_MAX_HISTORY
): ConversationTurn[] {
  return truncateHistory([...history, turn], max);
}

/**
 * The last turn, if it is an assistant question.
 */
export function lastAssistantQuestion(history: readonly ConversationTurn[]): ConversationTurn | undefined {
  const last = history[history.length - 1];
  if (last && last.role === 'assistant' && last.type === 'question') {
    return last;
  }
  return undefined;
}

/**
 * Increment a usage counter in place.
 */
export function incrementUsage(usage: Record<string, number>, label: string): void {
  usage[label] = (usage[label] ?? 0) + 1;
}
