// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER TYPES — Medicine Reminder Specs and Stored Occurrences
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// SPEC (creation input)
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Descriptive fields carried through to every occurrence unchanged.
 */
export interface ReminderDetails {
  readonly pillDetails?: string;
  readonly amountPerBox?: number;
  readonly initialQuantity?: number;
  readonly currentQuantity?: number;
  readonly takeMedicineAlert?: boolean;
  readonly ringPhone?: boolean;
  readonly sendMessage?: boolean;
  readonly refillReminder?: boolean;
  readonly daysBeforeRefill?: number;
}

/**
 * One configured reminder as submitted by a caller.
 */
export interface ReminderSpec {
  readonly medicineName: string;

  /** HH:MM in the care time zone, or an ISO timestamp */
  readonly time: string;

  /** Weekday tags ("mon", "Wednesday", ...). Empty = one-shot. */
  readonly recurring?: readonly string[];

  /** Start today regardless of `reminderDate` */
  readonly startFromToday?: boolean;

  /** YYYY-MM-DD or ISO timestamp */
  readonly reminderDate?: string;

  /** Inclusive; defaults to start + 28 days */
  readonly endDate?: string;

  readonly refillDate?: string;

  readonly details?: ReminderDetails;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORED OCCURRENCE
// ─────────────────────────────────────────────────────────────────────────────────

export const ReminderStatusSchema = z.enum(['pending', 'completed', 'missed']);

export type ReminderStatus = z.infer<typeof ReminderStatusSchema>;

export const ReminderDetailsSchema = z.object({
  pillDetails: z.string().optional(),
  amountPerBox: z.number().int().nonnegative().optional(),
  initialQuantity: z.number().int().nonnegative().optional(),
  currentQuantity: z.number().int().nonnegative().optional(),
  takeMedicineAlert: z.boolean().optional(),
  ringPhone: z.boolean().optional(),
  sendMessage: z.boolean().optional(),
  refillReminder: z.boolean().optional(),
  daysBeforeRefill: z.number().int().nonnegative().optional(),
});

/**
 * Shape of an occurrence as read back from the store. Lenient: bad optional
 * fields degrade to defaults rather than discarding the reminder.
 */
export const StoredReminderSchema = z.object({
  reminderId: z.string().min(1).optional(),
  medicineName: z.string().optional(),
  time: z.string().optional(),
  date: z.string().optional(),
  endDate: z.string().optional(),
  refillDate: z.string().optional(),
  recurring: z.array(z.string()).catch([]),
  recurringGroupId: z.string().optional(),
  status: ReminderStatusSchema.catch('pending'),
  details: ReminderDetailsSchema.catch({}),
  createdAt: z.string().optional(),
  /** Position of the spec within its creation request */
  sequence: z.number().int().nonnegative().optional(),
  updatedAt: z.string().optional(),
});

export type MedicineReminder = Omit<z.infer<typeof StoredReminderSchema>, 'reminderId'> & {
  readonly reminderId: string;
};

/**
 * Reminders keyed by id, in store order.
 */
export type ReminderSet = ReadonlyMap<string, MedicineReminder>;

// ─────────────────────────────────────────────────────────────────────────────────
// EXPANSION
// ─────────────────────────────────────────────────────────────────────────────────

export interface ReminderExpansion {
  readonly startDate: string;
  readonly endDate: string;
  /** Occurrence dates, ascending */
  readonly dates: readonly string[];
  /** Present only for recurring specs */
  readonly recurringGroupId?: string;
}
