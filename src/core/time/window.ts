// ═══════════════════════════════════════════════════════════════════════════════
// TIME WINDOW — Clock-Time Predicates for Reminder Evaluation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Reminder times are `HH:MM` or ISO-8601 timestamps. Only the clock value is
// compared (a timestamp's offset is ignored) on a 0–1439 minute-of-day scale.
// There is no wrap at midnight: 23:50 and 00:05 are 1425 minutes apart.
//
// Every predicate answers `false` for input it cannot parse.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { daysBetween, parseCalendarDate, type LocalInstant } from './calendar.js';

const logger = getLogger({ component: 'time-window' });

export interface ClockTime {
  readonly hour: number;
  readonly minute: number;
}

const HH_MM = /^\s*(\d{1,2}):(\d{1,2})\s*$/;
const ISO_CLOCK = /^\d{4}-\d{2}-\d{2}T(\d{2}):(\d{2})/;

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Extract hour and minute from `HH:MM` or an ISO timestamp.
 */
export function parseClockTime(value: string): ClockTime | null {
  const match = value.includes('T') ? ISO_CLOCK.exec(value.trim()) : HH_MM.exec(value);
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

function minuteOfDay(time: ClockTime): number {
  return time.hour * 60 + time.minute;
}

function parseOrWarn(value: string, check: string): ClockTime | null {
  const parsed = parseClockTime(value);
  if (!parsed) {
    logger.warn('Unparseable reminder time', { value, check });
  }
  return parsed;
}

/**
 * Render a reminder time as `HH:MM`.
 */
export function formatClockTime(time: ClockTime): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PREDICATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * True if the reminder time is at most `thresholdMinutes` away from now.
 */
export function withinMinutes(reminderTime: string, now: LocalInstant, thresholdMinutes: number): boolean {
  const parsed = parseOrWarn(reminderTime, 'withinMinutes');
  if (!parsed) return false;

  const nowMinutes = now.hour * 60 + now.minute;
  return Math.abs(minuteOfDay(parsed) - nowMinutes) <= thresholdMinutes;
}

/**
 * True if now is strictly later in the day than the reminder time.
 */
export function isAfter(reminderTime: string, now: LocalInstant): boolean {
  const parsed = parseOrWarn(reminderTime, 'isAfter');
  if (!parsed) return false;

  return now.hour * 60 + now.minute > minuteOfDay(parsed);
}

/**
 * True if the refill date falls today or within the next `thresholdDays` days.
 */
export function refillIsNear(refillDate: string, now: LocalInstant, thresholdDays: number): boolean {
  const date = parseCalendarDate(refillDate);
  if (!date) {
    logger.warn('Unparseable refill date', { value: refillDate });
    return false;
  }

  const delta = daysBetween(now.date, date);
  return delta >= 0 && delta <= thresholdDays;
}

/**
 * True if the reminder hour lies in `[startHour, endHour)`.
 */
export function inPeriod(reminderTime: string, startHour: number, endHour: number): boolean {
  const parsed = parseOrWarn(reminderTime, 'inPeriod');
  if (!parsed) return false;

  return startHour <= parsed.hour && parsed.hour < endHour;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DAY PERIODS
// ─────────────────────────────────────────────────────────────────────────────────

export type DayPeriod = 'morning' | 'evening' | 'night';

/**
 * Greeting period for a local hour: morning before 12, evening before 18.
 */
export function greetingForHour(hour: number): DayPeriod {
  if (hour < 12) return 'morning';
  if (hour < 18) return 'evening';
  return 'night';
}
