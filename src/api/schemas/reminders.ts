// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER SCHEMAS — Medicine Reminder Request Bodies
// ═══════════════════════════════════════════════════════════════════════════════
//
// Batch sizes are checked by the reminder service against its configured
// limit, so these schemas only bound the shape of each item.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { ReminderDetailsSchema, ReminderStatusSchema } from '../../core/reminders/index.js';
import {
  DateOrTimestampSchema,
  IdSchema,
  ISODateSchema,
  MedicineNameSchema,
  ReminderTimeSchema,
  WeekdayTagsSchema,
} from './common.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CREATE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * @example
 * {
 *   "medicineName": "Metformin",
 *   "time": "08:00",
 *   "recurring": ["mon", "wed", "fri"],
 *   "startFromToday": true,
 *   "details": { "pillDetails": "500mg, after food", "refillReminder": true }
 * }
 */
export const ReminderSpecSchema = z.object({
  medicineName: MedicineNameSchema,
  time: ReminderTimeSchema,
  recurring: WeekdayTagsSchema.optional(),
  startFromToday: z.boolean().optional(),
  reminderDate: DateOrTimestampSchema.optional(),
  endDate: DateOrTimestampSchema.optional(),
  refillDate: DateOrTimestampSchema.optional(),
  details: ReminderDetailsSchema.optional(),
});

export const CreateRemindersSchema = z.object({
  reminders: z.array(ReminderSpecSchema),
});

// ─────────────────────────────────────────────────────────────────────────────────
// UPDATE
// ─────────────────────────────────────────────────────────────────────────────────

export const ReminderUpdateSchema = z.object({
  date: ISODateSchema,
  reminderId: IdSchema,
  medicineName: MedicineNameSchema.optional(),
  time: ReminderTimeSchema.optional(),
  status: ReminderStatusSchema.optional(),
  endDate: DateOrTimestampSchema.optional(),
  refillDate: DateOrTimestampSchema.optional(),
  recurring: WeekdayTagsSchema.optional(),
  details: ReminderDetailsSchema.optional(),
  updatedAt: z.string().datetime({ offset: true }).optional(),
});

export const UpdateRemindersSchema = z.object({
  updates: z.array(ReminderUpdateSchema),
});

// ─────────────────────────────────────────────────────────────────────────────────
// PARAMS AND RESPONSES
// ─────────────────────────────────────────────────────────────────────────────────

export const ReminderOccurrenceParamsSchema = z.object({
  date: ISODateSchema,
  reminderId: IdSchema,
});

export const ReminderIdParamSchema = z.object({
  reminderId: IdSchema,
});

/**
 * A user's answer to a reminder ("yes" counts as taken).
 */
export const ReminderResponseSchema = z.object({
  medicineName: MedicineNameSchema,
  response: z.string().trim().min(1, 'Response is required').max(100),
});

export type ReminderSpecRequest = z.infer<typeof ReminderSpecSchema>;
export type CreateRemindersRequest = z.infer<typeof CreateRemindersSchema>;
export type ReminderUpdateRequest = z.infer<typeof ReminderUpdateSchema>;
export type UpdateRemindersRequest = z.infer<typeof UpdateRemindersSchema>;
export type ReminderResponseRequest = z.infer<typeof ReminderResponseSchema>;
