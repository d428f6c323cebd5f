// ═══════════════════════════════════════════════════════════════════════════════
// ADHERENCE AGGREGATOR TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { computeAdherence, type ResponseLog } from '../index.js';
import type { MedicineReminder } from '../../reminders/index.js';

const TODAY = '2025-03-10';

function reminder(reminderId: string, medicineName: string, time?: string): MedicineReminder {
  return { reminderId, medicineName, time, recurring: [], status: 'pending', details: {} };
}

function set(...reminders: MedicineReminder[]): ReadonlyMap<string, MedicineReminder> {
  return new Map(reminders.map(r => [r.reminderId, r]));
}

describe('computeAdherence', () => {
  it('reports full adherence when every dose was taken today', () => {
    const responses: ResponseLog = {
      r1: [{ timestamp: '2025-03-10T08:05:00+05:30', response: 'yes' }],
      r2: [{ timestamp: '2025-03-10T20:02:00+05:30', response: 'yes' }],
    };

    const summary = computeAdherence(
      set(reminder('r1', 'Metformin', '08:00'), reminder('r2', 'Atorvastatin', '20:00')),
      responses,
      TODAY
    );

    expect(summary).toEqual({
      adherenceRate: 100,
      missedDoses: 0,
      allTakenToday: true,
      nextDose: '08:00 - Metformin',
      takenCount: 2,
      responseCount: 2,
    });
  });

  it('returns zero rate without responses in the window', () => {
    const summary = computeAdherence(set(reminder('r1', 'Metformin', '08:00')), {}, TODAY);

    expect(summary.adherenceRate).toBe(0);
    expect(summary.missedDoses).toBe(1);
    expect(summary.allTakenToday).toBe(false);
  });

  it('only counts responses from the last seven days', () => {
    const responses: ResponseLog = {
      r1: [
        { timestamp: '2025-03-02T08:00:00', response: 'yes' }, // 8 days ago
        { timestamp: '2025-03-04T08:00:00', response: 'yes' }, // 6 days ago
        { timestamp: '2025-03-09T08:00:00', response: 'no' },
        { timestamp: '2025-03-11T08:00:00', response: 'yes' }, // future
      ],
    };

    const summary = computeAdherence(set(reminder('r1', 'Metformin', '08:00')), responses, TODAY);

    expect(summary.responseCount).toBe(2);
    expect(summary.takenCount).toBe(1);
    expect(summary.adherenceRate).toBe(50);
    expect(summary.missedDoses).toBe(1);
  });

  it('rounds the rate to two decimals', () => {
    const responses: ResponseLog = {
      r1: [
        { timestamp: '2025-03-08T08:00:00', response: 'yes' },
        { timestamp: '2025-03-09T08:00:00', response: 'no' },
        { timestamp: '2025-03-10T08:00:00', response: 'skipped' },
      ],
    };

    const summary = computeAdherence(set(reminder('r1', 'Metformin', '08:00')), responses, TODAY);
    expect(summary.adherenceRate).toBe(33.33);
    expect(summary.allTakenToday).toBe(false);
  });

  it('keys list input by position', () => {
    const responses: ResponseLog = {
      '1': [{ timestamp: '2025-03-10T09:00:00', response: 'yes' }],
    };

    const summary = computeAdherence(
      [reminder('a', 'Metformin', '08:00'), reminder('b', 'Vitamin D', '09:00')],
      responses,
      TODAY
    );

    expect(summary.takenCount).toBe(1);
    expect(summary.missedDoses).toBe(1);
  });

  it('orders next dose by plain string comparison', () => {
    const summary = computeAdherence(
      set(reminder('r1', 'Morning pill', '9:00'), reminder('r2', 'Late pill', '10:00')),
      {},
      TODAY
    );
    expect(summary.nextDose).toBe('10:00 - Late pill');
  });

  it('skips reminders without a time when picking the next dose', () => {
    const summary = computeAdherence(
      set(reminder('r1', 'Unscheduled'), reminder('r2', 'Vitamin D', '21:00')),
      {},
      TODAY
    );
    expect(summary.nextDose).toBe('21:00 - Vitamin D');
  });

  it('skips responses with an invalid timestamp', () => {
    const responses: ResponseLog = {
      r1: [
        { timestamp: 'yesterday', response: 'yes' },
        { response: 'yes' },
        { timestamp: '2025-03-10T08:00:00', response: 'yes' },
      ],
    };

    const summary = computeAdherence(set(reminder('r1', 'Metformin', '08:00')), responses, TODAY);
    expect(summary.responseCount).toBe(1);
    expect(summary.adherenceRate).toBe(100);
  });

  it('has no next dose without reminders', () => {
    const summary = computeAdherence(new Map(), {}, TODAY);
    expect(summary).toEqual({
      adherenceRate: 0,
      missedDoses: 0,
      allTakenToday: true,
      nextDose: null,
      takenCount: 0,
      responseCount: 0,
    });
  });
});
