// ═══════════════════════════════════════════════════════════════════════════════
// MEDICATION REMINDER SERVICE — Create, List, Update and Delete Occurrences
// ═══════════════════════════════════════════════════════════════════════════════
//
// Creation expands every spec before anything is written, so one invalid spec
// rejects the whole request. Updates likewise check every target exists first.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';

import {
  buildOccurrences,
  expandReminder,
  type IdFactory,
  type MedicineReminder,
  type ReminderDetails,
  type ReminderExpansion,
  type ReminderSet,
  type ReminderSpec,
  type ReminderStatus,
} from '../../core/reminders/index.js';
import { isIsoDate, type LocalInstant } from '../../core/time/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { ok, okVoid, err, appError, ErrorCode, type AsyncAppResult } from '../../types/result.js';
import type { ReminderDay, ReminderRepository } from './reminder-repository.js';

const logger = getLogger({ component: 'medication-reminders' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Field-by-field change to one stored occurrence. Absent fields are kept.
 */
export interface ReminderUpdate {
  readonly date: string;
  readonly reminderId: string;
  readonly medicineName?: string;
  readonly time?: string;
  readonly status?: ReminderStatus;
  readonly endDate?: string;
  readonly refillDate?: string;
  readonly recurring?: readonly string[];
  readonly details?: ReminderDetails;
  readonly updatedAt?: string;
}

export interface MedicationServiceConfig {
  /** Max specs or updates per request */
  readonly maxPerRequest: number;
}

export const DEFAULT_MEDICATION_SERVICE_CONFIG: MedicationServiceConfig = {
  maxPerRequest: 7,
};

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export class MedicationReminderService {
  private readonly repository: ReminderRepository;
  private readonly config: MedicationServiceConfig;
  private readonly newId: IdFactory;

  constructor(
    repository: ReminderRepository,
    config?: Partial<MedicationServiceConfig>,
    newId: IdFactory = uuidv4
  ) {
    this.repository = repository;
    this.config = { ...DEFAULT_MEDICATION_SERVICE_CONFIG, ...config };
    this.newId = newId;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Create
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Expand and persist 1..maxPerRequest specs. Returns every stored occurrence.
   */
  async createReminders(
    userId: string,
    specs: readonly ReminderSpec[],
    now: LocalInstant
  ): AsyncAppResult<MedicineReminder[]> {
    const countError = this.checkCount(specs.length, 'reminders');
    if (countError) return countError;

    const expansions: ReminderExpansion[] = [];
    for (const [index, spec] of specs.entries()) {
      const expansion = expandReminder(spec, now.date, this.newId);
      if (!expansion.ok) {
        return err(appError(expansion.error.code, `Reminder ${index + 1}: ${expansion.error.message}`, {
          context: { ...expansion.error.context, index },
        }));
      }
      expansions.push(expansion.value);
    }

    const created: MedicineReminder[] = [];
    for (const [index, spec] of specs.entries()) {
      const expansion = expansions[index];
      if (!expansion) continue;

      for (const occurrence of buildOccurrences(spec, expansion, this.newId, now.iso, index)) {
        await this.repository.save(userId, occurrence.date ?? expansion.startDate, occurrence);
        created.push(occurrence);
      }
    }

    logger.info('Reminders created', { userId, specs: specs.length, occurrences: created.length });
    return ok(created);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────────

  async listAll(userId: string): Promise<ReminderDay[]> {
    return this.repository.listDays(userId);
  }

  /**
   * Days from `today` on.
   */
  async listUpcoming(userId: string, today: string): Promise<ReminderDay[]> {
    const days = await this.repository.listDays(userId);
    return days.filter(day => day.date >= today);
  }

  async listCompleted(userId: string): Promise<ReminderDay[]> {
    return this.filterDays(await this.repository.listDays(userId), r => r.status === 'completed');
  }

  /**
   * Occurrences on days before `today` that were never completed.
   */
  async listMissed(userId: string, today: string): Promise<ReminderDay[]> {
    const past = (await this.repository.listDays(userId)).filter(day => day.date < today);
    return this.filterDays(past, r => r.status !== 'completed');
  }

  /**
   * Find an occurrence by id, looking at `today` first.
   */
  async findReminder(userId: string, reminderId: string, today: string): Promise<MedicineReminder | undefined> {
    const todays = await this.repository.getDay(userId, today);
    const found = todays.get(reminderId);
    if (found) return found;

    for (const day of await this.repository.listDays(userId)) {
      const match = day.reminders.find(reminder => reminder.reminderId === reminderId);
      if (match) return match;
    }
    return undefined;
  }

  /**
   * Today's occurrences, the set the engagement engine and adherence read.
   */
  async getTodaysReminders(userId: string, today: string): Promise<ReminderSet> {
    return this.repository.getDay(userId, today);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Update / delete
  // ─────────────────────────────────────────────────────────────────────────────

  async updateReminders(
    userId: string,
    updates: readonly ReminderUpdate[],
    now: LocalInstant
  ): AsyncAppResult<MedicineReminder[]> {
    const countError = this.checkCount(updates.length, 'updates');
    if (countError) return countError;

    const targets: MedicineReminder[] = [];
    for (const update of updates) {
      if (!isIsoDate(update.date)) {
        return err(appError(ErrorCode.VALIDATION_ERROR, `Invalid date for reminder ${update.reminderId}, expected YYYY-MM-DD`, {
          context: { date: update.date },
        }));
      }

      const existing = await this.repository.get(userId, update.date, update.reminderId);
      if (!existing) {
        return err(appError(ErrorCode.REMINDER_NOT_FOUND, `Reminder not found for ID ${update.reminderId} on ${update.date}`, {
          context: { reminderId: update.reminderId, date: update.date },
        }));
      }
      targets.push(existing);
    }

    const updated: MedicineReminder[] = [];
    for (const [index, update] of updates.entries()) {
      const existing = targets[index];
      if (!existing) continue;

      const merged = applyUpdate(existing, update, now.iso);
      await this.repository.save(userId, update.date, merged);
      updated.push(merged);
    }

    logger.info('Reminders updated', { userId, count: updated.length });
    return ok(updated);
  }

  async deleteReminder(userId: string, date: string, reminderId: string): AsyncAppResult<void> {
    const deleted = await this.repository.delete(userId, date, reminderId);
    if (!deleted) {
      return err(appError(ErrorCode.REMINDER_NOT_FOUND, 'Reminder not found', { context: { reminderId, date } }));
    }

    logger.info('Reminder deleted', { userId, reminderId, date });
    return okVoid();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private checkCount(count: number, label: string) {
    if (count < 1 || count > this.config.maxPerRequest) {
      return err(appError(
        ErrorCode.VALIDATION_ERROR,
        `You must provide between 1 and ${this.config.maxPerRequest} ${label}.`,
        { context: { count } }
      ));
    }
    return null;
  }

  private filterDays(days: readonly ReminderDay[], keep: (reminder: MedicineReminder) => boolean): ReminderDay[] {
    const result: ReminderDay[] = [];
    for (const day of days) {
      const reminders = day.reminders.filter(keep);
      if (reminders.length > 0) result.push({ date: day.date, reminders });
    }
    return result;
  }
}

function applyUpdate(existing: MedicineReminder, update: ReminderUpdate, timestamp: string): MedicineReminder {
  return {
    ...existing,
    ...(update.medicineName !== undefined && { medicineName: update.medicineName }),
    ...(update.time !== undefined && { time: update.time }),
    ...(update.status !== undefined && { status: update.status }),
    ...(update.endDate !== undefined && { endDate: update.endDate }),
    ...(update.refillDate !== undefined && { refillDate: update.refillDate }),
    ...(update.recurring !== undefined && { recurring: [...update.recurring] }),
    details: { ...existing.details, ...update.details },
    updatedAt: update.updatedAt ?? timestamp,
  };
}

export function createMedicationReminderService(
  repository: ReminderRepository,
  config?: Partial<MedicationServiceConfig>,
  newId?: IdFactory
): MedicationReminderService {
  return new MedicationReminderService(repository, config, newId);
}
