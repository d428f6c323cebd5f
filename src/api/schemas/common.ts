// ═══════════════════════════════════════════════════════════════════════════════
// COMMON SCHEMAS — Shared Field Validators
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { isIsoDate, parseCalendarDate, parseClockTime } from '../../core/time/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// IDS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Store-safe identifier: used as a document path segment.
 */
export const IdSchema = z
  .string()
  .min(1, 'ID is required')
  .max(128, 'ID must be 128 characters or less')
  .regex(/^[A-Za-z0-9_-]+$/, 'ID may only contain letters, digits, "-" and "_"');

// ─────────────────────────────────────────────────────────────────────────────────
// DATES AND TIMES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * YYYY-MM-DD calendar date.
 */
export const ISODateSchema = z
  .string()
  .refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' });

/**
 * YYYY-MM-DD date or an ISO timestamp whose date part is used.
 */
export const DateOrTimestampSchema = z
  .string()
  .trim()
  .refine(value => parseCalendarDate(value) !== null, { message: 'Expected a date or ISO timestamp' });

/**
 * HH:MM (24-hour) or an ISO timestamp whose clock part is used.
 */
export const ReminderTimeSchema = z
  .string()
  .trim()
  .refine(value => parseClockTime(value) !== null, { message: 'Expected HH:MM or an ISO timestamp' });

// ─────────────────────────────────────────────────────────────────────────────────
// TEXT
// ─────────────────────────────────────────────────────────────────────────────────

export const MedicineNameSchema = z
  .string()
  .trim()
  .min(1, 'Medicine name is required')
  .max(200, 'Medicine name must be 200 characters or less');

export const WeekdayTagsSchema = z
  .array(z.string().trim().min(1).max(16))
  .max(7, 'At most 7 weekdays');
