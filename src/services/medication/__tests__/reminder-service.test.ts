// ═══════════════════════════════════════════════════════════════════════════════
// MEDICATION REMINDER SERVICE TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import type { ReminderSpec } from '../../../core/reminders/index.js';
import type { LocalInstant } from '../../../core/time/index.js';
import { DocumentStore, MemoryStore } from '../../../storage/index.js';
import { MedicationReminderService, ReminderRepository } from '../index.js';

// 2025-03-03 is a Monday.
const NOW: LocalInstant = { date: '2025-03-03', hour: 9, minute: 0, second: 0, iso: '2025-03-03T09:00:00+05:30' };

function idFactory() {
  let n = 0;
  return () => `id-${++n}`;
}

describe('MedicationReminderService', () => {
  let repository: ReminderRepository;
  let service: MedicationReminderService;

  beforeEach(() => {
    repository = new ReminderRepository(new DocumentStore(new MemoryStore()));
    service = new MedicationReminderService(repository, undefined, idFactory());
  });

  describe('createReminders', () => {
    it('stores one record per recurring date under its own date', async () => {
      const spec: ReminderSpec = {
        medicineName: 'Metformin',
        time: '08:00',
        recurring: ['mon', 'wed'],
        startFromToday: true,
        endDate: '2025-03-10',
      };

      const result = await service.createReminders('u1', [spec], NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map(r => [r.reminderId, r.date])).toEqual([
        ['id-2', '2025-03-03'],
        ['id-3', '2025-03-05'],
        ['id-4', '2025-03-10'],
      ]);
      expect(result.value.every(r => r.recurringGroupId === 'id-1')).toBe(true);
      expect(await repository.listDates('u1')).toEqual(['2025-03-03', '2025-03-05', '2025-03-10']);

      const stored = await repository.get('u1', '2025-03-05', 'id-3');
      expect(stored?.status).toBe('pending');
      expect(stored?.updatedAt).toBe(NOW.iso);
    });

    it('writes nothing when any spec is invalid', async () => {
      const result = await service.createReminders('u1', [
        { medicineName: 'A', time: '08:00', startFromToday: true },
        { medicineName: 'B', time: '09:00' },
      ], NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe('Reminder 2: Either startFromToday or reminderDate is required');
      expect(await repository.listDates('u1')).toEqual([]);
    });

    it('rejects an empty or oversized batch', async () => {
      const spec: ReminderSpec = { medicineName: 'A', time: '08:00', startFromToday: true };

      const empty = await service.createReminders('u1', [], NOW);
      const tooMany = await service.createReminders('u1', Array.from({ length: 8 }, () => spec), NOW);

      expect(!empty.ok && empty.error.message).toBe('You must provide between 1 and 7 reminders.');
      expect(!tooMany.ok && tooMany.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await repository.save('u1', '2025-03-01', {
        reminderId: 'a', medicineName: 'A', time: '08:00', recurring: [], status: 'completed', details: {},
      });
      await repository.save('u1', '2025-03-02', {
        reminderId: 'b', medicineName: 'B', time: '08:00', recurring: [], status: 'pending', details: {},
      });
      await repository.save('u1', '2025-03-03', {
        reminderId: 'c', medicineName: 'C', time: '20:00', recurring: [], status: 'pending', details: {},
      });
    });

    it('lists every day in date order', async () => {
      const days = await service.listAll('u1');
      expect(days.map(d => d.date)).toEqual(['2025-03-01', '2025-03-02', '2025-03-03']);
    });

    it('splits upcoming, completed and missed', async () => {
      expect((await service.listUpcoming('u1', '2025-03-03')).map(d => d.date)).toEqual(['2025-03-03']);
      expect((await service.listCompleted('u1')).map(d => d.reminders.map(r => r.reminderId))).toEqual([['a']]);
      expect((await service.listMissed('u1', '2025-03-03')).map(d => d.reminders.map(r => r.reminderId))).toEqual([['b']]);
    });

    it("returns today's reminders keyed by id", async () => {
      const today = await service.getTodaysReminders('u1', '2025-03-03');
      expect(Array.from(today.keys())).toEqual(['c']);
    });
  });

  describe('scan order', () => {
    it('orders a day by time, then by position in the creating request', async () => {
      const created = await service.createReminders('u1', [
        { medicineName: 'Aspirin', time: '21:00', startFromToday: true },
        { medicineName: 'Metformin', time: '8:00', startFromToday: true },
        { medicineName: 'Vitamin D', time: '08:00', startFromToday: true },
      ], NOW);
      expect(created.ok && created.value.map(r => [r.reminderId, r.sequence])).toEqual([
        ['id-1', 0],
        ['id-2', 1],
        ['id-3', 2],
      ]);

      const today = await service.getTodaysReminders('u1', NOW.date);

      expect(Array.from(today.values(), r => r.medicineName)).toEqual(['Metformin', 'Vitamin D', 'Aspirin']);
    });

    it('puts reminders created earlier first at the same time, and untimed ones last', async () => {
      await repository.save('u1', NOW.date, {
        reminderId: 'a-late', medicineName: 'Late', time: '08:00', recurring: [], status: 'pending', details: {},
        createdAt: '2025-03-03T09:00:00+05:30', sequence: 0,
      });
      await repository.save('u1', NOW.date, {
        reminderId: 'b-early', medicineName: 'Early', time: '08:00', recurring: [], status: 'pending', details: {},
        createdAt: '2025-03-01T09:00:00+05:30', sequence: 3,
      });
      await repository.save('u1', NOW.date, {
        reminderId: '0-untimed', medicineName: 'Untimed', recurring: [], status: 'pending', details: {},
      });

      const today = await service.getTodaysReminders('u1', NOW.date);

      expect(Array.from(today.keys())).toEqual(['b-early', 'a-late', '0-untimed']);
    });
  });

  describe('updateReminders', () => {
    beforeEach(async () => {
      await repository.save('u1', '2025-03-03', {
        reminderId: 'r1', medicineName: 'A', time: '08:00', recurring: [], status: 'pending', details: { pillDetails: 'white', ringPhone: true },
      });
    });

    it('merges the changed fields and stamps the update time', async () => {
      const result = await service.updateReminders('u1', [
        { date: '2025-03-03', reminderId: 'r1', status: 'completed', details: { ringPhone: false } },
      ], NOW);

      expect(result.ok).toBe(true);
      const stored = await repository.get('u1', '2025-03-03', 'r1');
      expect(stored?.status).toBe('completed');
      expect(stored?.medicineName).toBe('A');
      expect(stored?.details).toEqual({ pillDetails: 'white', ringPhone: false });
      expect(stored?.updatedAt).toBe(NOW.iso);
    });

    it('applies nothing if any target is missing', async () => {
      const result = await service.updateReminders('u1', [
        { date: '2025-03-03', reminderId: 'r1', status: 'completed' },
        { date: '2025-03-03', reminderId: 'ghost', status: 'completed' },
      ], NOW);

      expect(!result.ok && result.error.code).toBe('REMINDER_NOT_FOUND');
      expect((await repository.get('u1', '2025-03-03', 'r1'))?.status).toBe('pending');
    });

    it('rejects a malformed date', async () => {
      const result = await service.updateReminders('u1', [{ date: '03/03/2025', reminderId: 'r1' }], NOW);
      expect(!result.ok && result.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('deleteReminder', () => {
    it('removes a stored occurrence', async () => {
      await repository.save('u1', '2025-03-03', {
        reminderId: 'r1', medicineName: 'A', time: '08:00', recurring: [], status: 'pending', details: {},
      });

      const result = await service.deleteReminder('u1', '2025-03-03', 'r1');

      expect(result.ok).toBe(true);
      expect(await repository.get('u1', '2025-03-03', 'r1')).toBeUndefined();
      expect(await service.listAll('u1')).toEqual([]);
    });

    it('reports a missing occurrence', async () => {
      const result = await service.deleteReminder('u1', '2025-03-03', 'nope');
      expect(!result.ok && result.error.code).toBe('REMINDER_NOT_FOUND');
    });
  });
});
