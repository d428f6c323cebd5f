// ═══════════════════════════════════════════════════════════════════════════════
// TEXT GENERATOR — OpenAI Chat Completions Behind the TextGenerator Interface
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every call is bounded by an AbortController timeout. Failures are thrown;
// the decision stages catch them and substitute their fallback text.
//
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import { loadConfig, type LlmConfig } from '../../config/index.js';
import type { ConversationTurn, TextGenerator } from '../../core/engagement/index.js';
import { getLogger } from '../../observability/logging/index.js';

const logger = getLogger({ component: 'text-generator' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class TextGenerationError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TextGenerationError';
    this.timedOut = options.timedOut ?? false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// OPENAI
// ─────────────────────────────────────────────────────────────────────────────────

export interface OpenAIGeneratorConfig {
  readonly model: string;
  readonly timeoutMs: number;
  readonly maxTokens: number;
  readonly temperature: number;
}

export const DEFAULT_OPENAI_GENERATOR_CONFIG: OpenAIGeneratorConfig = {
  model: 'gpt-4o-mini',
  timeoutMs: 8000,
  maxTokens: 200,
  temperature: 0.7,
};

/**
 * The slice of the OpenAI client the generator calls.
 */
export interface ChatCompletionsClient {
  readonly chat: {
    readonly completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<{ choices: ReadonlyArray<{ message: { content: string | null } }> }>;
    };
  };
}

function toMessages(prompt: string, contextTurns: readonly ConversationTurn[]): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [{ role: 'system', content: prompt }];
  for (const turn of contextTurns) {
    messages.push(turn.role === 'user'
      ? { role: 'user', content: turn.content }
      : { role: 'assistant', content: turn.content });
  }
  return messages;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly client: ChatCompletionsClient;
  private readonly config: OpenAIGeneratorConfig;

  constructor(client: ChatCompletionsClient, config: Partial<OpenAIGeneratorConfig> = {}) {
    this.client = client;
    this.config = { ...DEFAULT_OPENAI_GENERATOR_CONFIG, ...config };
  }

  async complete(prompt: string, contextTurns: readonly ConversationTurn[]): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: toMessages(prompt, contextTurns),
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
      }, {
        signal: controller.signal,
      });

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        throw new TextGenerationError('Model returned an empty completion');
      }

      logger.debug('Completion generated', { model: this.config.model, durationMs: Date.now() - startTime });
      return content;
    } catch (error) {
      if (error instanceof TextGenerationError) throw error;

      if (controller.signal.aborted) {
        throw new TextGenerationError(`Completion timed out after ${this.config.timeoutMs}ms`, {
          cause: error,
          timedOut: true,
        });
      }
      throw new TextGenerationError('Completion request failed', { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// MOCK
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Offline generator for local runs and tests. Prompts asking for a question
 * get `question`, everything else gets `reply`.
 */
export class MockTextGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  private readonly question: string;
  private readonly reply: string;

  constructor(
    question: string = 'What was the nicest part of your day so far?',
    reply: string = 'Thank you for telling me. I am glad you shared that.'
  ) {
    this.question = question;
    this.reply = reply;
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return prompt.includes('Return only the question') ? this.question : this.reply;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

let openaiClient: OpenAI | null = null;

function getOpenAIClient(apiKey: string): OpenAI {
  if (!openaiClient) {
    openaiClient = new OpenAI({ apiKey });
  }
  return openaiClient;
}

/**
 * OpenAI-backed generator, or the mock when forced or no API key is set.
 */
export function createTextGenerator(config: LlmConfig = loadConfig().llm): TextGenerator {
  if (config.mockProviderOnly) {
    logger.info('Using mock text generator');
    return new MockTextGenerator();
  }
  if (!config.apiKey) {
    logger.warn('OPENAI_API_KEY not set, using mock text generator');
    return new MockTextGenerator();
  }

  return new OpenAITextGenerator(getOpenAIClient(config.apiKey), {
    model: config.model,
    timeoutMs: config.timeoutMs,
    maxTokens: config.maxTokens,
  });
}
