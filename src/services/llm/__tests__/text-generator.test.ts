import { describe, it, expect, vi } from 'vitest';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ConversationTurn } from '../../../core/engagement/index.js';
import {
  MockTextGenerator,
  OpenAITextGenerator,
  TextGenerationError,
  createTextGenerator,
  type ChatCompletionsClient,
} from '../index.js';

function fakeClient(
  create: (body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }) => Promise<{
    choices: Array<{ message: { content: string | null } }>;
  }>
): ChatCompletionsClient {
  return { chat: { completions: { create } } };
}

const turns: ConversationTurn[] = [
  {
    role: 'assistant',
    content: 'How did you sleep?',
    timestamp: '2025-03-10T08:00:00+05:30',
    type: 'question',
    isCategoryQuestion: true,
    category: 'Sleep',
    subcategory: 'Naps',
  },
  {
    role: 'user',
    content: 'Quite well',
    timestamp: '2025-03-10T08:01:00+05:30',
    type: 'response',
    isCategoryQuestion: false,
    category: null,
    subcategory: null,
  },
];

describe('OpenAITextGenerator', () => {
  it('sends the prompt as the system message followed by the context turns', async () => {
    const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => ({
      choices: [{ message: { content: '  Glad to hear it!  ' } }],
    }));
    const generator = new OpenAITextGenerator(fakeClient(create), { model: 'test-model', maxTokens: 50 });

    const text = await generator.complete('Be kind.', turns);

    expect(text).toBe('Glad to hear it!');
    const body = create.mock.calls[0]?.[0];
    expect(body?.model).toBe('test-model');
    expect(body?.max_tokens).toBe(50);
    expect(body?.messages).toEqual([
      { role: 'system', content: 'Be kind.' },
      { role: 'assistant', content: 'How did you sleep?' },
      { role: 'user', content: 'Quite well' },
    ]);
  });

  it('rejects an empty completion', async () => {
    const generator = new OpenAITextGenerator(fakeClient(async () => ({ choices: [{ message: { content: null } }] })));
    await expect(generator.complete('prompt', [])).rejects.toBeInstanceOf(TextGenerationError);
  });

  it('wraps request failures', async () => {
    const generator = new OpenAITextGenerator(fakeClient(async () => {
      throw new Error('401 invalid key');
    }));
    await expect(generator.complete('prompt', [])).rejects.toMatchObject({
      name: 'TextGenerationError',
      timedOut: false,
    });
  });

  it('aborts after the timeout', async () => {
    const generator = new OpenAITextGenerator(
      fakeClient((_body, options) => new Promise((_resolve, reject) => {
        options?.signal?.addEventListener('abort', () => reject(new Error('Request was aborted.')));
      })),
      { timeoutMs: 10 }
    );

    await expect(generator.complete('prompt', [])).rejects.toMatchObject({ timedOut: true });
  });
});

describe('MockTextGenerator', () => {
  it('answers question prompts with a question', async () => {
    const generator = new MockTextGenerator('Q?', 'A.');
    expect(await generator.complete('Ask something. Return only the question.')).toBe('Q?');
    expect(await generator.complete('Reply to them.')).toBe('A.');
    expect(generator.prompts).toHaveLength(2);
  });
});

describe('createTextGenerator', () => {
  it('falls back to the mock without an API key', () => {
    const generator = createTextGenerator({ model: 'gpt-4o-mini', timeoutMs: 1000, maxTokens: 10, mockProviderOnly: false });
    expect(generator).toBeInstanceOf(MockTextGenerator);
  });

  it('honours the mock-only switch', () => {
    const generator = createTextGenerator({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      timeoutMs: 1000,
      maxTokens: 10,
      mockProviderOnly: true,
    });
    expect(generator).toBeInstanceOf(MockTextGenerator);
  });
});
