// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE LOG AND ADHERENCE SERVICE TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import type { LocalInstant } from '../../../core/time/index.js';
import { MockNotifier } from '../../../notifications/index.js';
import { DocumentStore, MemoryStore, userPaths } from '../../../storage/index.js';
import { ProfileStore } from '../../users/index.js';
import {
  AdherenceService,
  MedicationReminderService,
  ReminderRepository,
  ResponseLogService,
} from '../index.js';

const NOW: LocalInstant = { date: '2025-03-10', hour: 9, minute: 15, second: 0, iso: '2025-03-10T09:15:00+05:30' };

function idFactory() {
  let n = 0;
  return () => `id-${++n}`;
}

describe('ResponseLogService', () => {
  let docs: DocumentStore;
  let notifier: MockNotifier;
  let reminders: MedicationReminderService;
  let service: ResponseLogService;

  beforeEach(() => {
    docs = new DocumentStore(new MemoryStore());
    notifier = new MockNotifier();
    reminders = new MedicationReminderService(new ReminderRepository(docs), undefined, idFactory());
    service = new ResponseLogService(docs, new ProfileStore(docs), notifier, reminders);
  });

  it('appends responses in order', async () => {
    await service.record('u1', { reminderId: 'r1', medicineName: 'Metformin', response: 'no' }, NOW);
    await service.record('u1', { reminderId: 'r1', medicineName: 'Metformin', response: 'yes' }, NOW);

    const log = await service.read('u1', ['r1', 'r2']);

    expect(log.r1?.map(e => e.response)).toEqual(['no', 'yes']);
    expect(log.r1?.[0]).toEqual({ medicineName: 'Metformin', response: 'no', timestamp: NOW.iso });
    expect(log.r2).toEqual([]);
  });

  it('notifies each caregiver that has a push token', async () => {
    await docs.set(userPaths.details('u1'), { name: 'Ravi' });
    await docs.set(userPaths.caregivers('u1'), ['c1', 'c2']);
    await docs.set(userPaths.pushToken('c1'), 'caregiver-token');

    const recorded = await service.record('u1', { reminderId: 'r1', medicineName: 'Metformin', response: 'yes' }, NOW);

    expect(recorded.notified).toBe(1);
    expect(notifier.sent).toEqual([
      {
        token: 'caregiver-token',
        title: 'Medicine Reminder Update',
        body: 'Ravi responded: yes to Metformin',
        data: { reminderId: 'r1' },
      },
    ]);
  });

  it('falls back to a generic name and still records when delivery fails', async () => {
    notifier = new MockNotifier(['caregiver-token']);
    service = new ResponseLogService(docs, new ProfileStore(docs), notifier, reminders);
    await docs.set(userPaths.caregivers('u1'), ['c1']);
    await docs.set(userPaths.pushToken('c1'), 'caregiver-token');

    const recorded = await service.record('u1', { reminderId: 'r1', medicineName: 'Aspirin', response: 'no' }, NOW);

    expect(recorded.notified).toBe(0);
    expect((await service.read('u1', ['r1'])).r1).toHaveLength(1);
  });

  it('logs every occurrence of a recurring reminder under its group', async () => {
    const created = await reminders.createReminders('u1', [
      { medicineName: 'Metformin', time: '08:00', recurring: ['mon', 'tue'], reminderDate: '2025-03-10', endDate: '2025-03-11' },
    ], NOW);
    if (!created.ok) throw new Error('create failed');
    const [monday, tuesday] = created.value;

    await service.record('u1', { reminderId: monday?.reminderId ?? '', medicineName: 'Metformin', response: 'yes' }, NOW);
    await service.record('u1', { reminderId: tuesday?.reminderId ?? '', medicineName: 'Metformin', response: 'no' }, NOW);

    const log = await service.read('u1', ['id-1', 'id-2', 'id-3']);
    expect(monday?.recurringGroupId).toBe('id-1');
    expect(log['id-1']?.map(e => e.response)).toEqual(['yes', 'no']);
    expect(log['id-2']).toEqual([]);
    expect(log['id-3']).toEqual([]);
  });

  it('skips malformed stored entries', async () => {
    await docs.append(userPaths.responses('u1', 'r1'), { response: 42 });
    await docs.append(userPaths.responses('u1', 'r1'), { response: 'yes', timestamp: NOW.iso });

    const log = await service.read('u1', ['r1']);

    expect(log.r1).toEqual([{ response: 'yes', timestamp: NOW.iso }]);
  });
});

describe('AdherenceService', () => {
  let docs: DocumentStore;
  let repository: ReminderRepository;
  let reminders: MedicationReminderService;
  let responses: ResponseLogService;
  let adherence: AdherenceService;

  beforeEach(() => {
    docs = new DocumentStore(new MemoryStore());
    repository = new ReminderRepository(docs);
    reminders = new MedicationReminderService(repository, undefined, idFactory());
    responses = new ResponseLogService(docs, new ProfileStore(docs), new MockNotifier(), reminders);
    adherence = new AdherenceService(reminders, responses);
  });

  it("summarizes today's reminders against their responses", async () => {
    await repository.save('u1', NOW.date, {
      reminderId: 'r1', medicineName: 'Metformin', time: '08:00', recurring: [], status: 'pending', details: {},
    });
    await repository.save('u1', NOW.date, {
      reminderId: 'r2', medicineName: 'Aspirin', time: '21:00', recurring: [], status: 'pending', details: {},
    });
    await docs.append(userPaths.responses('u1', 'r1'), { response: 'no', timestamp: '2025-03-09T08:05:00+05:30' });
    await responses.record('u1', { reminderId: 'r1', medicineName: 'Metformin', response: 'yes' }, NOW);

    const summary = await adherence.getSummary('u1', NOW);

    expect(summary).toEqual({
      adherenceRate: 50,
      missedDoses: 1,
      allTakenToday: false,
      nextDose: '08:00 - Metformin',
      takenCount: 1,
      responseCount: 2,
    });
  });

  it("counts earlier days of a recurring reminder in today's window", async () => {
    const monday: LocalInstant = { date: '2025-03-03', hour: 8, minute: 5, second: 0, iso: '2025-03-03T08:05:00+05:30' };
    const tuesday: LocalInstant = { date: '2025-03-04', hour: 9, minute: 0, second: 0, iso: '2025-03-04T09:00:00+05:30' };
    const created = await reminders.createReminders('u1', [{
      medicineName: 'Metformin',
      time: '08:00',
      recurring: ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'],
      startFromToday: true,
    }], monday);
    if (!created.ok) throw new Error('create failed');
    const mondayOccurrence = created.value.find(r => r.date === '2025-03-03');

    await responses.record('u1', {
      reminderId: mondayOccurrence?.reminderId ?? '',
      medicineName: 'Metformin',
      response: 'yes',
    }, monday);

    expect(await adherence.getSummary('u1', tuesday)).toEqual({
      adherenceRate: 100,
      missedDoses: 1,
      allTakenToday: false,
      nextDose: '08:00 - Metformin',
      takenCount: 1,
      responseCount: 1,
    });
  });
});
