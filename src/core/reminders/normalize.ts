// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER NORMALIZATION — Stored Shapes to an Ordered Id Map
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { parseClockTime } from '../time/index.js';
import { StoredReminderSchema, type MedicineReminder, type ReminderSet } from './types.js';

const logger = getLogger({ component: 'reminder-normalize' });

/**
 * Accepts a list (ids are positional indices), a plain object or a Map of
 * reminder records. Entries that are not reminder-shaped are skipped.
 */
export function normalizeReminderSet(raw: unknown): ReminderSet {
  const result = new Map<string, MedicineReminder>();

  let entries: Array<[string, unknown]>;
  if (Array.isArray(raw)) {
    entries = raw.map((value: unknown, index): [string, unknown] => [String(index), value]);
  } else if (raw instanceof Map) {
    entries = Array.from(raw.entries(), ([key, value]: [unknown, unknown]): [string, unknown] => [String(key), value]);
  } else if (raw !== null && typeof raw === 'object') {
    entries = Object.entries(raw);
  } else {
    if (raw !== undefined && raw !== null) {
      logger.warn('Reminder set is not a collection, treating as empty', { type: typeof raw });
    }
    return result;
  }

  for (const [key, value] of entries) {
    const parsed = StoredReminderSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn('Skipping malformed reminder', { key });
      continue;
    }
    result.set(key, { ...parsed.data, reminderId: parsed.data.reminderId ?? key });
  }

  return result;
}

function minuteOfDay(reminder: MedicineReminder): number {
  const parsed = reminder.time ? parseClockTime(reminder.time) : null;
  return parsed ? parsed.hour * 60 + parsed.minute : Number.POSITIVE_INFINITY;
}

/**
 * Scan order for one day: time of day, then creation time, then position in
 * the creating request, then id. Reminders without a usable time sort last.
 */
export function compareScanOrder(a: MedicineReminder, b: MedicineReminder): number {
  const byTime = minuteOfDay(a) - minuteOfDay(b);
  if (byTime !== 0 && !Number.isNaN(byTime)) return byTime;

  const byCreated = (a.createdAt ?? '').localeCompare(b.createdAt ?? '');
  if (byCreated !== 0) return byCreated;

  const bySequence = (a.sequence ?? 0) - (b.sequence ?? 0);
  if (bySequence !== 0) return bySequence;

  return a.reminderId < b.reminderId ? -1 : a.reminderId > b.reminderId ? 1 : 0;
}

/**
 * Reorder a set into scan order, keeping its keys.
 */
export function orderReminderSet(reminders: ReminderSet): ReminderSet {
  const entries = Array.from(reminders.entries());
  entries.sort(([, a], [, b]) => compareScanOrder(a, b));
  return new Map(entries);
}
