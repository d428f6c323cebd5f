// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER REPOSITORY — Dated Occurrences in the Document Store
// ═══════════════════════════════════════════════════════════════════════════════

import {
  normalizeReminderSet,
  orderReminderSet,
  type MedicineReminder,
  type ReminderSet,
} from '../../core/reminders/index.js';
import { isIsoDate } from '../../core/time/index.js';
import { userPaths, type DocumentStore } from '../../storage/index.js';

/**
 * All occurrences stored under one calendar date.
 */
export interface ReminderDay {
  readonly date: string;
  readonly reminders: readonly MedicineReminder[];
}

export class ReminderRepository {
  private readonly docs: DocumentStore;

  constructor(docs: DocumentStore) {
    this.docs = docs;
  }

  /**
   * Dates that have stored occurrences, ascending.
   */
  async listDates(userId: string): Promise<string[]> {
    const dates = await this.docs.listChildren(userPaths.reminderRoot(userId));
    return dates.filter(isIsoDate);
  }

  /**
   * One date's occurrences keyed by id, in scan order (time of day first).
   */
  async getDay(userId: string, date: string): Promise<ReminderSet> {
    const ids = await this.docs.listChildren(userPaths.reminderDay(userId, date));
    const raw: Record<string, unknown> = {};
    for (const id of ids) {
      const value = await this.docs.get(userPaths.reminder(userId, date, id));
      if (value !== undefined) raw[id] = value;
    }
    return orderReminderSet(normalizeReminderSet(raw));
  }

  async listDays(userId: string): Promise<ReminderDay[]> {
    const days: ReminderDay[] = [];
    for (const date of await this.listDates(userId)) {
      const reminders = Array.from((await this.getDay(userId, date)).values());
      if (reminders.length > 0) days.push({ date, reminders });
    }
    return days;
  }

  async get(userId: string, date: string, reminderId: string): Promise<MedicineReminder | undefined> {
    const raw = await this.docs.get(userPaths.reminder(userId, date, reminderId));
    if (raw === undefined) return undefined;
    return normalizeReminderSet({ [reminderId]: raw }).get(reminderId);
  }

  async save(userId: string, date: string, reminder: MedicineReminder): Promise<void> {
    await this.docs.set(userPaths.reminder(userId, date, reminder.reminderId), reminder);
  }

  async delete(userId: string, date: string, reminderId: string): Promise<boolean> {
    return this.docs.delete(userPaths.reminder(userId, date, reminderId));
  }
}
