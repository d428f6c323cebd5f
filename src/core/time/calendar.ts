// ═══════════════════════════════════════════════════════════════════════════════
// CALENDAR — ISO Dates and Local Instants in a Fixed Time Zone
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A moment expressed as wall-clock fields in the configured time zone.
 * Computed once per trigger and threaded through every decision.
 */
export interface LocalInstant {
  /** YYYY-MM-DD */
  readonly date: string;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** Wall-clock ISO-8601 with UTC offset, e.g. 2025-03-02T08:05:00+05:30 */
  readonly iso: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ]|$)/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ─────────────────────────────────────────────────────────────────────────────────
// ISO DATES
// ─────────────────────────────────────────────────────────────────────────────────

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const d = new Date(`${value}T12:00:00.000Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(value);
}

/**
 * Calendar date of a `YYYY-MM-DD` string or ISO timestamp (wall-clock date as
 * written, offset ignored). Returns `null` when no valid date is present.
 */
export function parseCalendarDate(value: string): string | null {
  const match = ISO_DATE_PREFIX.exec(value.trim());
  const date = match?.[1];
  if (!date || !isIsoDate(date)) return null;
  return date;
}

export function addDays(isoDate: string, days: number): string {
  // Noon UTC keeps DST shifts from moving the date.
  const d = new Date(`${isoDate}T12:00:00.000Z`);
  if (Number.isNaN(d.getTime())) return isoDate;
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  const a = Date.parse(`${from}T12:00:00.000Z`);
  const b = Date.parse(`${to}T12:00:00.000Z`);
  return Math.round((b - a) / MS_PER_DAY);
}

/**
 * Weekday index with Monday = 0 … Sunday = 6.
 */
export function weekdayIndex(isoDate: string): number {
  const day = new Date(`${isoDate}T12:00:00.000Z`).getUTCDay();
  return (day + 6) % 7;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOCAL INSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

function pad(n: number, width: number = 2): string {
  return String(Math.abs(n)).padStart(width, '0');
}

function partsInTimeZone(date: Date, timeZone: string): Record<string, number> {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  }).formatToParts(date);

  const out: Record<string, number> = {};
  for (const p of parts) {
    if (p.type !== 'literal') out[p.type] = Number(p.value);
  }
  return out;
}

/**
 * Wall-clock view of `date` in `timeZone`. Throws RangeError for an unknown zone.
 */
export function toLocalInstant(date: Date, timeZone: string): LocalInstant {
  const parts = partsInTimeZone(date, timeZone);
  const year = parts.year ?? date.getUTCFullYear();
  const month = parts.month ?? date.getUTCMonth() + 1;
  const day = parts.day ?? date.getUTCDate();
  const hourRaw = parts.hour ?? date.getUTCHours();
  const hour = hourRaw === 24 ? 0 : hourRaw;
  const minute = parts.minute ?? date.getUTCMinutes();
  const second = parts.second ?? date.getUTCSeconds();

  const wallClockMs = Date.UTC(year, month - 1, day, hour, minute, second);
  const offsetMinutes = Math.round((wallClockMs - Math.floor(date.getTime() / 1000) * 1000) / 60000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const offset = `${sign}${pad(Math.floor(Math.abs(offsetMinutes) / 60))}:${pad(Math.abs(offsetMinutes) % 60)}`;

  const isoDate = `${pad(year, 4)}-${pad(month)}-${pad(day)}`;

  return {
    date: isoDate,
    hour,
    minute,
    second,
    iso: `${isoDate}T${pad(hour)}:${pad(minute)}:${pad(second)}${offset}`,
  };
}
