// ═══════════════════════════════════════════════════════════════════════════════
// TIME TESTS — Calendar Helpers and Clock-Time Predicates
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  addDays,
  daysBetween,
  inPeriod,
  isAfter,
  parseCalendarDate,
  parseClockTime,
  greetingForHour,
  refillIsNear,
  toLocalInstant,
  weekdayIndex,
  withinMinutes,
  type LocalInstant,
} from '../index.js';

function at(date: string, hour: number, minute: number): LocalInstant {
  const hh = String(hour).padStart(2, '0');
  const mm = String(minute).padStart(2, '0');
  return { date, hour, minute, second: 0, iso: `${date}T${hh}:${mm}:00+05:30` };
}

// ─────────────────────────────────────────────────────────────────────────────────
// CALENDAR
// ─────────────────────────────────────────────────────────────────────────────────

describe('calendar', () => {
  it('adds days across month ends', () => {
    expect(addDays('2025-02-27', 2)).toBe('2025-03-01');
    expect(addDays('2025-03-01', -1)).toBe('2025-02-28');
  });

  it('counts days between dates', () => {
    expect(daysBetween('2025-03-02', '2025-03-05')).toBe(3);
    expect(daysBetween('2025-03-05', '2025-03-02')).toBe(-3);
  });

  it('numbers weekdays from Monday', () => {
    expect(weekdayIndex('2025-03-03')).toBe(0);
    expect(weekdayIndex('2025-03-02')).toBe(6);
  });

  it('extracts the calendar date from dates and timestamps', () => {
    expect(parseCalendarDate('2025-03-02')).toBe('2025-03-02');
    expect(parseCalendarDate('2025-03-04T20:06:41.452Z')).toBe('2025-03-04');
    expect(parseCalendarDate('2025-02-30')).toBeNull();
    expect(parseCalendarDate('tomorrow')).toBeNull();
  });

  it('converts an instant to wall-clock time in a zone', () => {
    const local = toLocalInstant(new Date('2025-03-02T02:35:10Z'), 'Asia/Kolkata');
    expect(local).toEqual({
      date: '2025-03-02',
      hour: 8,
      minute: 5,
      second: 10,
      iso: '2025-03-02T08:05:10+05:30',
    });
  });

  it('rolls the local date forward when the zone is ahead of UTC', () => {
    const local = toLocalInstant(new Date('2025-03-01T20:00:00Z'), 'Asia/Kolkata');
    expect(local.date).toBe('2025-03-02');
    expect(local.hour).toBe(1);
    expect(local.minute).toBe(30);
  });

  it('formats a zero offset for UTC', () => {
    expect(toLocalInstant(new Date('2025-03-02T10:00:00Z'), 'UTC').iso).toBe('2025-03-02T10:00:00+00:00');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CLOCK TIMES
// ─────────────────────────────────────────────────────────────────────────────────

describe('parseClockTime', () => {
  it('reads HH:MM', () => {
    expect(parseClockTime('08:30')).toEqual({ hour: 8, minute: 30 });
    expect(parseClockTime('7:05')).toEqual({ hour: 7, minute: 5 });
  });

  it('reads the wall-clock part of an ISO timestamp', () => {
    expect(parseClockTime('2025-03-02T21:15:00Z')).toEqual({ hour: 21, minute: 15 });
    expect(parseClockTime('2025-03-02T06:45:00+05:30')).toEqual({ hour: 6, minute: 45 });
  });

  it('rejects garbage and out-of-range values', () => {
    expect(parseClockTime('soon')).toBeNull();
    expect(parseClockTime('25:00')).toBeNull();
    expect(parseClockTime('08:30:00')).toBeNull();
  });
});

describe('withinMinutes', () => {
  it('matches inside the threshold, inclusive', () => {
    expect(withinMinutes('08:00', at('2025-03-02', 8, 45), 60)).toBe(true);
    expect(withinMinutes('08:00', at('2025-03-02', 9, 0), 60)).toBe(true);
    expect(withinMinutes('08:00', at('2025-03-02', 9, 1), 60)).toBe(false);
  });

  it('treats one minute either side as exact', () => {
    expect(withinMinutes('08:00', at('2025-03-02', 7, 59), 1)).toBe(true);
    expect(withinMinutes('08:00', at('2025-03-02', 8, 2), 1)).toBe(false);
  });

  it('does not wrap around midnight', () => {
    expect(withinMinutes('23:50', at('2025-03-02', 0, 5), 60)).toBe(false);
  });

  it('is false for an unparseable time', () => {
    expect(withinMinutes('later', at('2025-03-02', 8, 0), 60)).toBe(false);
  });
});

describe('isAfter', () => {
  it('is strict', () => {
    expect(isAfter('08:00', at('2025-03-02', 8, 0))).toBe(false);
    expect(isAfter('08:00', at('2025-03-02', 8, 1))).toBe(true);
  });

  it('is false for an unparseable time', () => {
    expect(isAfter('', at('2025-03-02', 8, 0))).toBe(false);
  });
});

describe('refillIsNear', () => {
  const now = at('2025-03-02', 8, 0);

  it('covers today through the threshold', () => {
    expect(refillIsNear('2025-03-02', now, 3)).toBe(true);
    expect(refillIsNear('2025-03-05', now, 3)).toBe(true);
    expect(refillIsNear('2025-03-06', now, 3)).toBe(false);
  });

  it('ignores past refill dates', () => {
    expect(refillIsNear('2025-03-01', now, 3)).toBe(false);
  });

  it('accepts ISO timestamps', () => {
    expect(refillIsNear('2025-03-04T20:06:41.452Z', now, 3)).toBe(true);
  });

  it('is false for an unparseable date', () => {
    expect(refillIsNear('next week', now, 3)).toBe(false);
  });
});

describe('inPeriod', () => {
  it('includes the start hour and excludes the end hour', () => {
    expect(inPeriod('05:00', 5, 12)).toBe(true);
    expect(inPeriod('11:59', 5, 12)).toBe(true);
    expect(inPeriod('12:00', 5, 12)).toBe(false);
  });

  it('maps hours to day periods', () => {
    expect(greetingForHour(2)).toBe('morning');
    expect(greetingForHour(11)).toBe('morning');
    expect(greetingForHour(12)).toBe('evening');
    expect(greetingForHour(17)).toBe('evening');
    expect(greetingForHour(18)).toBe('night');
  });
});
