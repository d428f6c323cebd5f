// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT SERVICE TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { parseTopicTaxonomy, type TextGenerator } from '../../../core/engagement/index.js';
import type { MedicineReminder } from '../../../core/reminders/index.js';
import type { LocalInstant } from '../../../core/time/index.js';
import { DocumentStore, MemoryStore, userPaths } from '../../../storage/index.js';
import { MockTextGenerator } from '../../llm/index.js';
import { MedicationReminderService, ReminderRepository } from '../../medication/index.js';
import { ProfileStore } from '../../users/index.js';
import { EngagementService, EngagementStateStore, KeyedLock } from '../index.js';

const TODAY = '2025-03-10';
const QUESTION = 'Which song did you hum today?';
const REPLY = 'That sounds lovely.';

function at(hour: number, minute: number): LocalInstant {
  const hh = String(hour).padStart(2, '0');
  const mm = String(minute).padStart(2, '0');
  return { date: TODAY, hour, minute, second: 0, iso: `${TODAY}T${hh}:${mm}:00+05:30` };
}

function reminder(reminderId: string, medicineName: string, time: string): MedicineReminder {
  return { reminderId, medicineName, time, date: TODAY, recurring: [], status: 'pending', details: {} };
}

class FailingStore extends MemoryStore {
  override async get(): Promise<string | null> {
    throw new Error('connection lost');
  }
}

function createHarness(docs: DocumentStore = new DocumentStore(new MemoryStore()), textGenerator: TextGenerator = new MockTextGenerator(QUESTION, REPLY)) {
  const repository = new ReminderRepository(docs);
  const stateStore = new EngagementStateStore(docs);
  const service = new EngagementService({
    stateStore,
    reminders: new MedicationReminderService(repository),
    profiles: new ProfileStore(docs),
    textGenerator,
    random: { next: () => 0 },
    taxonomy: parseTopicTaxonomy({ Music: ['Songs'] }),
  });
  return { docs, repository, stateStore, service };
}

describe('EngagementService', () => {
  let harness: ReturnType<typeof createHarness>;

  beforeEach(async () => {
    harness = createHarness();
    await harness.docs.set(userPaths.details('u1'), { name: 'Ravi' });
  });

  it('asks about a reminder due now and persists the asked flag', async () => {
    await harness.repository.save('u1', TODAY, reminder('r1', 'Metformin', '08:00'));

    const result = await harness.service.engage('u1', undefined, at(8, 0));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.intent).toBe('medication_check');
    expect(result.value.content).toBe("Hey Ravi, it's time for your Metformin. Have you taken it yet?");

    const state = await harness.stateStore.load('u1');
    expect(state.history).toHaveLength(1);
    expect(state.askedReminders.r1).toEqual({ withinHourAsked: true, date: TODAY });
  });

  it('does not repeat the reminder question on the next call', async () => {
    await harness.repository.save('u1', TODAY, reminder('r1', 'Metformin', '08:00'));

    await harness.service.engage('u1', undefined, at(8, 0));
    const second = await harness.service.engage('u1', undefined, at(8, 0));

    expect(second.ok && second.value.intent).toBe('category_question');
    expect(second.ok && second.value.content).toBe(QUESTION);
  });

  it('records the answer to a category question as an important entry', async () => {
    await harness.service.engage('u1', undefined, at(9, 0));
    const result = await harness.service.engage('u1', 'I sang in the garden', at(9, 5));

    expect(result.ok && result.value.intent).toBe('direct_reply');
    expect(result.ok && result.value.content).toBe(REPLY);
    expect(await harness.stateStore.loadImportant('u1')).toEqual([
      {
        question: QUESTION,
        reply: 'I sang in the garden',
        questionTimestamp: at(9, 0).iso,
        replyTimestamp: at(9, 5).iso,
      },
    ]);

    const state = await harness.stateStore.load('u1');
    expect(state.history.map(t => t.role)).toEqual(['assistant', 'user', 'assistant']);
  });

  it('leaves stored state untouched when the reply is too long', async () => {
    await harness.service.engage('u1', undefined, at(9, 0));

    const result = await harness.service.engage('u1', 'x'.repeat(1001), at(9, 5));

    expect(!result.ok && result.error.code).toBe('VALIDATION_ERROR');
    expect((await harness.stateStore.load('u1')).history).toHaveLength(1);
  });

  it('serializes concurrent calls for the same user', async () => {
    await Promise.all([
      harness.service.engage('u1', undefined, at(9, 0)),
      harness.service.engage('u1', undefined, at(9, 0)),
    ]);

    const state = await harness.stateStore.load('u1');
    expect(state.history).toHaveLength(2);
    expect(state.categoryUsage).toEqual({ Music: 2 });
  });

  it('reports store failures as STORE_ERROR', async () => {
    const failing = createHarness(new DocumentStore(new FailingStore()));

    const result = await failing.service.engage('u1', undefined, at(9, 0));

    expect(!result.ok && result.error.code).toBe('STORE_ERROR');
  });
});

describe('KeyedLock', () => {
  it('runs tasks for one key in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = lock.run('a', async () => {
      await gate;
      order.push('first');
    });
    const second = lock.run('a', async () => {
      order.push('second');
    });
    const other = lock.run('b', async () => {
      order.push('other');
    });

    await other;
    expect(order).toEqual(['other']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(['other', 'first', 'second']);
    expect(lock.activeKeys).toBe(0);
  });

  it('releases the key when a task throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await lock.run('a', async () => 'next')).toBe('next');
  });
});
