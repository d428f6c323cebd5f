// ═══════════════════════════════════════════════════════════════════════════════
// CAREGIVER VIEW — A User's Reminders With Their Latest Response
// ═══════════════════════════════════════════════════════════════════════════════

import type { ResponseLogEntry } from '../../core/adherence/index.js';
import { responseKey, type MedicineReminder } from '../../core/reminders/index.js';
import { parseCalendarDate } from '../../core/time/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { ok, err, appError, ErrorCode, type AsyncAppResult } from '../../types/result.js';
import type { ProfileStore } from '../users/index.js';
import type { MedicationReminderService } from './reminder-service.js';
import type { ResponseLogService } from './response-log.js';

const logger = getLogger({ component: 'caregiver-view' });

export const NO_RESPONSE = 'no response';

export type ReminderWithStatus = MedicineReminder & {
  readonly latestResponse: string;
};

export interface CaregiverReminderDay {
  readonly date: string;
  readonly reminders: readonly ReminderWithStatus[];
}

export interface CaregiverReminderView {
  readonly userId: string;
  readonly name: string;
  readonly days: readonly CaregiverReminderDay[];
}

export class CaregiverViewService {
  private readonly reminders: MedicationReminderService;
  private readonly responses: ResponseLogService;
  private readonly profiles: ProfileStore;

  constructor(reminders: MedicationReminderService, responses: ResponseLogService, profiles: ProfileStore) {
    this.reminders = reminders;
    this.responses = responses;
    this.profiles = profiles;
  }

  /**
   * Every stored occurrence of `userId`, each with the last response given on
   * its date. Only callers on the user's caregiver list may read it.
   */
  async getRemindersWithStatus(caregiverId: string, userId: string): AsyncAppResult<CaregiverReminderView> {
    const caregivers = await this.profiles.getCaregivers(userId);
    if (!caregivers.includes(caregiverId)) {
      logger.warn('Caregiver view denied', { caregiverId, userId });
      return err(appError(ErrorCode.FORBIDDEN, 'Not a caregiver for this user', { context: { userId } }));
    }

    const days = await this.reminders.listAll(userId);
    const keys = new Set(days.flatMap(day => day.reminders.map(responseKey)));
    const log = await this.responses.read(userId, keys);

    const withStatus = days.map((day): CaregiverReminderDay => ({
      date: day.date,
      reminders: day.reminders.map(reminder => ({
        ...reminder,
        latestResponse: latestResponseOn(log[responseKey(reminder)] ?? [], day.date),
      })),
    }));

    const profile = await this.profiles.getProfile(userId);
    return ok({ userId, name: profile.name?.trim() || 'Unknown', days: withStatus });
  }
}

function latestResponseOn(entries: readonly ResponseLogEntry[], date: string): string {
  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i];
    if (!entry?.response || !entry.timestamp) continue;
    if (parseCalendarDate(entry.timestamp) === date) return entry.response;
  }
  return NO_RESPONSE;
}
