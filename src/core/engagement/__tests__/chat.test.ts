// ═══════════════════════════════════════════════════════════════════════════════
// CHAT TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import type { MedicineReminder } from '../../reminders/index.js';
import type { LocalInstant } from '../../time/index.js';
import {
  DIRECT_REPLY_FALLBACK,
  createDefaultState,
  respondToChat,
  type ConversationTurn,
  type EngagementState,
  type TextGenerator,
  type UserProfile,
} from '../index.js';

const NOW: LocalInstant = { date: '2025-03-10', hour: 9, minute: 15, second: 0, iso: '2025-03-10T09:15:00+05:30' };
const profile: UserProfile = { name: 'Asha', medicines: [] };
const noReminders = new Map<string, MedicineReminder>();

function turn(content: string, overrides: Partial<ConversationTurn> = {}): ConversationTurn {
  return {
    role: 'assistant',
    content,
    timestamp: '2025-03-10T08:00:00+05:30',
    type: 'response',
    isCategoryQuestion: false,
    category: null,
    subcategory: null,
    ...overrides,
  };
}

function stateWith(...history: ConversationTurn[]): EngagementState {
  return { ...createDefaultState(), history };
}

function generator(text: string = 'Walks are good for you.'): TextGenerator {
  return { complete: vi.fn(async () => text) };
}

async function chat(state: EngagementState, message: string | undefined, textGenerator: TextGenerator = generator()) {
  const result = await respondToChat({ state, reminders: noReminders, profile, message }, NOW, { textGenerator });
  if (!result.ok) throw new Error(`chat failed: ${result.error.message}`);
  return result.value;
}

describe('respondToChat', () => {
  it('greets on an empty conversation', async () => {
    const textGenerator = generator();
    const result = await chat(createDefaultState(), undefined, textGenerator);

    expect(result.response).toBe('Good morning, Asha!');
    expect(result.greeted).toBe(true);
    expect(result.timestamp).toBe(NOW.iso);
    expect(result.state.history).toEqual([turn('Good morning, Asha!', { timestamp: NOW.iso })]);
    expect(textGenerator.complete).not.toHaveBeenCalled();
  });

  it('greets again on hello and then answers it', async () => {
    const result = await chat(stateWith(turn('Earlier reply')), 'Hello');

    expect(result.greeted).toBe(true);
    expect(result.response).toBe('Walks are good for you.');
    expect(result.state.history.map(t => [t.role, t.content])).toEqual([
      ['assistant', 'Earlier reply'],
      ['assistant', 'Good morning, Asha!'],
      ['user', 'Hello'],
      ['assistant', 'Walks are good for you.'],
    ]);
  });

  it('answers a message on an existing conversation without greeting', async () => {
    const textGenerator = generator();
    const result = await chat(stateWith(turn('Earlier reply')), '  I went for a walk  ', textGenerator);

    expect(result.greeted).toBe(false);
    expect(result.response).toBe('Walks are good for you.');
    expect(result.state.history[1]).toEqual(turn('I went for a walk', { role: 'user', timestamp: NOW.iso }));
    expect(textGenerator.complete).toHaveBeenCalledTimes(1);
  });

  it('returns the last turn when there is nothing to answer', async () => {
    const result = await chat(stateWith(turn('Earlier reply')), undefined);

    expect(result.response).toBe('Earlier reply');
    expect(result.state.history).toHaveLength(1);
  });

  it('records a reply to a category question as important', async () => {
    const question = turn('Do you enjoy old songs?', { type: 'question', isCategoryQuestion: true, category: 'Music', subcategory: 'Songs' });

    const result = await chat(stateWith(question), 'Yes, very much');

    expect(result.importantEntry).toEqual({
      question: 'Do you enjoy old songs?',
      reply: 'Yes, very much',
      questionTimestamp: question.timestamp,
      replyTimestamp: NOW.iso,
    });
  });

  it('uses the fallback when generation fails', async () => {
    const failing: TextGenerator = { complete: vi.fn(async () => { throw new Error('upstream timeout'); }) };

    const result = await chat(stateWith(turn('Earlier reply')), 'Tell me something', failing);

    expect(result.response).toBe(DIRECT_REPLY_FALLBACK);
  });

  it('rejects an overlong message without touching the state', async () => {
    const result = await respondToChat(
      { state: createDefaultState(), reminders: noReminders, profile, message: 'x'.repeat(11) },
      NOW,
      { textGenerator: generator(), config: { maxReplyLength: 10 } }
    );

    expect(!result.ok && result.error.code).toBe('VALIDATION_ERROR');
    expect(!result.ok && result.error.message).toBe('Message exceeds maximum length of 10 characters');
  });
});
