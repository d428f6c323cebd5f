export {
  TextGenerationError,
  type OpenAIGeneratorConfig,
  type ChatCompletionsClient,
  DEFAULT_OPENAI_GENERATOR_CONFIG,
  OpenAITextGenerator,
  MockTextGenerator,
  createTextGenerator,
} from './text-generator.js';
