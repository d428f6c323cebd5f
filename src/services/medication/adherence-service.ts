// ═══════════════════════════════════════════════════════════════════════════════
// ADHERENCE SERVICE — Summary Over Today's Reminders
// ═══════════════════════════════════════════════════════════════════════════════

import { computeAdherence, type AdherenceSummary } from '../../core/adherence/index.js';
import type { LocalInstant } from '../../core/time/index.js';
import type { MedicationReminderService } from './reminder-service.js';
import type { ResponseLogService } from './response-log.js';

export class AdherenceService {
  private readonly reminders: MedicationReminderService;
  private readonly responses: ResponseLogService;

  constructor(reminders: MedicationReminderService, responses: ResponseLogService) {
    this.reminders = reminders;
    this.responses = responses;
  }

  async getSummary(userId: string, now: LocalInstant): Promise<AdherenceSummary> {
    const reminders = await this.reminders.getTodaysReminders(userId, now.date);
    const responses = await this.responses.readForReminders(userId, reminders);
    return computeAdherence(reminders, responses, now.date);
  }
}
