// ═══════════════════════════════════════════════════════════════════════════════
// ADHERENCE AGGREGATOR — Seven-Day Medication Adherence Summary
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { getLogger } from '../../observability/logging/index.js';
import type { MedicineReminder, ReminderSet } from '../reminders/index.js';
import { daysBetween, parseCalendarDate } from '../time/index.js';

const logger = getLogger({ component: 'adherence' });

export const ADHERENCE_WINDOW_DAYS = 7;
export const ADHERENT_RESPONSE = 'yes';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export const ResponseLogEntrySchema = z.object({
  timestamp: z.string().optional(),
  response: z.string().optional(),
  medicineName: z.string().optional(),
});

export type ResponseLogEntry = z.infer<typeof ResponseLogEntrySchema>;

/**
 * Responses per reminder id, oldest first.
 */
export type ResponseLog = Readonly<Record<string, readonly ResponseLogEntry[]>>;

export interface AdherenceSummary {
  /** Percentage of in-window responses that were "yes", two decimals */
  readonly adherenceRate: number;
  /** Reminders without a "yes" today */
  readonly missedDoses: number;
  readonly allTakenToday: boolean;
  /** "HH:MM - Name" of the earliest reminder time, or null without reminders */
  readonly nextDose: string | null;
  readonly takenCount: number;
  readonly responseCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// AGGREGATION
// ─────────────────────────────────────────────────────────────────────────────────

function isReminderList(reminders: ReminderSet | readonly MedicineReminder[]): reminders is readonly MedicineReminder[] {
  return Array.isArray(reminders);
}

function toEntries(reminders: ReminderSet | readonly MedicineReminder[]): Array<[string, MedicineReminder]> {
  if (isReminderList(reminders)) {
    return reminders.map((reminder, index): [string, MedicineReminder] => [String(index), reminder]);
  }
  return Array.from(reminders.entries());
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Summarize adherence as of `today`. List input is keyed by position.
 */
export function computeAdherence(
  reminders: ReminderSet | readonly MedicineReminder[],
  responses: ResponseLog,
  today: string
): AdherenceSummary {
  let allTakenToday = true;
  let missedDoses = 0;
  let responseCount = 0;
  let takenCount = 0;
  let nextDoseTime: string | null = null;
  let nextDose: string | null = null;

  for (const [id, reminder] of toEntries(reminders)) {
    let takenToday = false;

    for (const entry of responses[id] ?? []) {
      if (!entry.timestamp || !entry.response) continue;

      const entryDate = parseCalendarDate(entry.timestamp);
      if (!entryDate) {
        logger.warn('Skipping response with invalid timestamp', { reminderId: id, timestamp: entry.timestamp });
        continue;
      }

      const daysAgo = daysBetween(entryDate, today);
      const adherent = entry.response === ADHERENT_RESPONSE;

      if (daysAgo >= 0 && daysAgo < ADHERENCE_WINDOW_DAYS) {
        responseCount++;
        if (adherent) takenCount++;
      }
      if (daysAgo === 0 && adherent) {
        takenToday = true;
      }
    }

    if (!takenToday) {
      allTakenToday = false;
      missedDoses++;
    }

    // Plain string order, so "9:00" sorts after "10:00".
    if (reminder.time && (nextDoseTime === null || reminder.time < nextDoseTime)) {
      nextDoseTime = reminder.time;
      nextDose = `${reminder.time} - ${reminder.medicineName ?? 'Unknown'}`;
    }
  }

  return {
    adherenceRate: responseCount > 0 ? roundTo2((takenCount / responseCount) * 100) : 0,
    missedDoses,
    allTakenToday,
    nextDose,
    takenCount,
    responseCount,
  };
}
