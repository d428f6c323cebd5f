// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE LOG — Reminder Responses and Caregiver Notification
// ═══════════════════════════════════════════════════════════════════════════════

import {
  ResponseLogEntrySchema,
  type ResponseLog,
  type ResponseLogEntry,
} from '../../core/adherence/index.js';
import { responseKey, type ReminderSet } from '../../core/reminders/index.js';
import type { LocalInstant } from '../../core/time/index.js';
import { NOTIFICATION_TITLES, type Notifier } from '../../notifications/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { userPaths, type DocumentStore } from '../../storage/index.js';
import type { ProfileStore } from '../users/index.js';
import type { MedicationReminderService } from './reminder-service.js';

const logger = getLogger({ component: 'response-log' });

export interface ReminderResponseInput {
  readonly reminderId: string;
  readonly medicineName: string;
  readonly response: string;
}

export interface RecordedResponse {
  readonly entry: ResponseLogEntry;
  /** Caregivers a notification was delivered to */
  readonly notified: number;
}

/**
 * Responses are logged per response key, so every dated occurrence of a
 * recurring reminder appends to one log.
 */
export class ResponseLogService {
  private readonly docs: DocumentStore;
  private readonly profiles: ProfileStore;
  private readonly notifier: Notifier;
  private readonly reminders: MedicationReminderService;

  constructor(
    docs: DocumentStore,
    profiles: ProfileStore,
    notifier: Notifier,
    reminders: MedicationReminderService
  ) {
    this.docs = docs;
    this.profiles = profiles;
    this.notifier = notifier;
    this.reminders = reminders;
  }

  /**
   * Append a response and tell every linked caregiver with a push token.
   * Notification failures are logged and never fail the write.
   */
  async record(userId: string, input: ReminderResponseInput, now: LocalInstant): Promise<RecordedResponse> {
    const entry: ResponseLogEntry = {
      medicineName: input.medicineName,
      response: input.response,
      timestamp: now.iso,
    };
    const reminder = await this.reminders.findReminder(userId, input.reminderId, now.date);
    if (!reminder) {
      logger.debug('Response for an unknown reminder id', { userId, reminderId: input.reminderId });
    }
    const key = reminder ? responseKey(reminder) : input.reminderId;

    await this.docs.append(userPaths.responses(userId, key), entry);
    logger.info('Reminder response recorded', { userId, reminderId: input.reminderId, responseKey: key });

    const notified = await this.notifyCaregivers(userId, input);
    return { entry, notified };
  }

  /**
   * Responses stored under each of `keys`, oldest first. Malformed entries are skipped.
   */
  async read(userId: string, keys: Iterable<string>): Promise<ResponseLog> {
    const log: Record<string, ResponseLogEntry[]> = {};
    for (const key of keys) {
      log[key] = await this.readEntries(userId, key);
    }
    return log;
  }

  /**
   * Responses for each reminder in `reminders`, keyed by occurrence id.
   */
  async readForReminders(userId: string, reminders: ReminderSet): Promise<ResponseLog> {
    const log: Record<string, ResponseLogEntry[]> = {};
    for (const [id, reminder] of reminders) {
      log[id] = await this.readEntries(userId, responseKey(reminder));
    }
    return log;
  }

  private async readEntries(userId: string, key: string): Promise<ResponseLogEntry[]> {
    const raw = await this.docs.readLog(userPaths.responses(userId, key));
    const entries: ResponseLogEntry[] = [];
    for (const item of raw) {
      const parsed = ResponseLogEntrySchema.safeParse(item);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        logger.warn('Skipping malformed response entry', { userId, responseKey: key });
      }
    }
    return entries;
  }

  private async notifyCaregivers(userId: string, input: ReminderResponseInput): Promise<number> {
    const caregivers = await this.profiles.getCaregivers(userId);
    if (caregivers.length === 0) return 0;

    const profile = await this.profiles.getProfile(userId);
    const name = profile.name?.trim() || 'Your family member';
    const body = `${name} responded: ${input.response} to ${input.medicineName}`;

    let notified = 0;
    for (const caregiverId of caregivers) {
      const token = await this.profiles.getPushToken(caregiverId);
      if (!token) {
        logger.debug('Caregiver has no push token', { caregiverId });
        continue;
      }
      const sent = await this.notifier.send(token, NOTIFICATION_TITLES.reminderResponse, body, {
        reminderId: input.reminderId,
      });
      if (sent) notified++;
    }
    return notified;
  }
}
