// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER LIST — "Show My Reminders" Detection and Rendering
// ═══════════════════════════════════════════════════════════════════════════════

import { formatClockTime, parseCalendarDate, parseClockTime } from '../time/index.js';
import type { MedicineReminder } from './types.js';

const LIST_REMINDER_PHRASES: readonly string[] = [
  'list all reminders',
  'show my reminders',
  'what are my reminders',
  'medicine schedule',
  'reminder list',
  'all medicine times',
];

/**
 * True if the text asks for the user's reminders (case-insensitive substring).
 */
export function isListRemindersRequest(text: string): boolean {
  const lower = text.toLowerCase();
  return LIST_REMINDER_PHRASES.some(phrase => lower.includes(phrase));
}

function displayTime(time: string | undefined): string {
  if (!time) return 'No time set';
  if (!time.includes('T')) return time;
  const parsed = parseClockTime(time);
  return parsed ? formatClockTime(parsed) : 'Invalid time format';
}

function displayRefill(refillDate: string | undefined): string {
  if (!refillDate) return 'No refill date set';
  if (!refillDate.includes('T')) return refillDate;
  return parseCalendarDate(refillDate) ?? 'Invalid refill date';
}

/**
 * One line per reminder, in the given order.
 */
export function formatReminderList(reminders: Iterable<MedicineReminder>): string {
  const lines: string[] = [];
  for (const reminder of reminders) {
    const name = reminder.medicineName ?? 'Unknown';
    lines.push(`- ${name} at ${displayTime(reminder.time)}, Refill due: ${displayRefill(reminder.refillDate)}\n`);
  }

  if (lines.length === 0) {
    return 'You have no medicine reminders set.';
  }

  return `Here are your medicine reminders:\n${lines.join('')}`;
}
