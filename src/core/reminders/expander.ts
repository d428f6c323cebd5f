// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER EXPANDER — Recurring Specs to Dated Occurrences
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pure: no clock reads, no I/O. `today` and the id factory come from the caller,
// which persists one record per returned date.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, appError, ErrorCode, type AppResult } from '../../types/result.js';
import { addDays, parseCalendarDate, weekdayIndex } from '../time/index.js';
import type { MedicineReminder, ReminderExpansion, ReminderSpec } from './types.js';

export const DEFAULT_REMINDER_SPAN_DAYS = 28;

const WEEKDAYS: Readonly<Record<string, number>> = {
  mon: 0,
  tue: 1,
  wed: 2,
  thu: 3,
  fri: 4,
  sat: 5,
  sun: 6,
};

export type IdFactory = () => string;

/**
 * Weekday indices (Mon = 0) named by `tags`; unrecognized tags are dropped.
 */
export function parseWeekdays(tags: readonly string[]): Set<number> {
  const days = new Set<number>();
  for (const tag of tags) {
    const day = WEEKDAYS[tag.trim().slice(0, 3).toLowerCase()];
    if (day !== undefined) days.add(day);
  }
  return days;
}

function validationError(message: string, context: Record<string, unknown>) {
  return err(appError(ErrorCode.VALIDATION_ERROR, message, { context }));
}

/**
 * Compute the dates a reminder spec occurs on.
 */
export function expandReminder(
  spec: ReminderSpec,
  today: string,
  newId: IdFactory
): AppResult<ReminderExpansion> {
  let startDate: string;
  if (spec.startFromToday) {
    startDate = today;
  } else if (spec.reminderDate !== undefined) {
    const parsed = parseCalendarDate(spec.reminderDate);
    if (!parsed) {
      return validationError('Invalid reminderDate', { reminderDate: spec.reminderDate });
    }
    startDate = parsed;
  } else {
    return validationError('Either startFromToday or reminderDate is required', {});
  }

  let endDate = addDays(startDate, DEFAULT_REMINDER_SPAN_DAYS);
  if (spec.endDate !== undefined) {
    const parsed = parseCalendarDate(spec.endDate);
    if (!parsed) {
      return validationError('Invalid endDate', { endDate: spec.endDate });
    }
    if (parsed < startDate) {
      return validationError('endDate is before the start date', { startDate, endDate: parsed });
    }
    endDate = parsed;
  }

  const recurring = spec.recurring ?? [];
  if (recurring.length === 0) {
    return ok({ startDate, endDate, dates: [startDate] });
  }

  const recurringGroupId = newId();
  const weekdays = parseWeekdays(recurring);
  if (weekdays.size === 0) {
    return ok({ startDate, endDate, dates: [startDate], recurringGroupId });
  }

  const dates: string[] = [];
  for (let date = startDate; date <= endDate; date = addDays(date, 1)) {
    if (weekdays.has(weekdayIndex(date))) {
      dates.push(date);
    }
  }

  // No matching weekday in range: still schedule the start date.
  return ok({ startDate, endDate, dates: dates.length > 0 ? dates : [startDate], recurringGroupId });
}

/**
 * One stored record per expanded date, each under a fresh id. `sequence` is
 * the spec's position in its request.
 */
export function buildOccurrences(
  spec: ReminderSpec,
  expansion: ReminderExpansion,
  newId: IdFactory,
  createdAt: string,
  sequence = 0
): MedicineReminder[] {
  return expansion.dates.map(date => ({
    reminderId: newId(),
    medicineName: spec.medicineName,
    time: spec.time,
    date,
    endDate: expansion.endDate,
    refillDate: spec.refillDate,
    recurring: [...(spec.recurring ?? [])],
    recurringGroupId: expansion.recurringGroupId,
    status: 'pending',
    details: { ...spec.details },
    createdAt,
    sequence,
    updatedAt: createdAt,
  }));
}

/**
 * Key a reminder's responses are logged under. Every occurrence of a recurring
 * reminder shares its group's log.
 */
export function responseKey(reminder: Pick<MedicineReminder, 'reminderId' | 'recurringGroupId'>): string {
  return reminder.recurringGroupId ?? reminder.reminderId;
}
