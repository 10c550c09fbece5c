/**
 * AI Service
 *
 * The text-generation capability injected into every language-model agent, plus its
 * production implementation on OpenRouter. Agents only ever see `TextGenerator`, so the
 * pipeline and its tests can substitute a deterministic generator.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateText, type LanguageModel } from 'ai';

import { createPrefixedLogger } from '../utils/logger';
import { AI_DEFAULT_MODELS, AI_ENV_KEYS, AI_TASK_NAMES, getModel, type AITaskKey } from './config';
import { getPipelineSettings } from './pipeline/config';
import { withRetry, type RetryOptions } from './pipeline/retry';
import { PipelineError } from './pipeline/types';

// ============================================================================
// Types
// ============================================================================

export interface TextGenerationRequest {
  readonly system?: string;
  readonly prompt: string;
  readonly temperature?: number;
  /** OpenRouter model id; the generator's default model when omitted */
  readonly model?: string;
}

/**
 * Capability interface: prompt in, text out.
 */
export interface TextGenerator {
  generate(request: TextGenerationRequest): Promise<string>;
}

/**
 * The subset of the AI SDK's generateText the service relies on.
 * Injectable for tests.
 */
export type GenerateTextFn = (options: {
  model: LanguageModel;
  system?: string;
  prompt: string;
  temperature?: number;
}) => Promise<{ text: string }>;

export interface OpenRouterTextGeneratorOptions {
  /** Defaults to OPENROUTER_API_KEY */
  readonly apiKey?: string;
  /** Defaults to OPENROUTER_BASE_URL, then the public OpenRouter endpoint */
  readonly baseURL?: string;
  /** Model used when a request names none */
  readonly defaultModel?: string;
  readonly generateText?: GenerateTextFn;
  /** Overrides for the transient-failure retry policy */
  readonly retry?: RetryOptions;
}

// ============================================================================
// Configuration Status
// ============================================================================

/**
 * Check if OpenRouter API key is configured
 */
export function isAIConfigured(): boolean {
  return Boolean(process.env.OPENROUTER_API_KEY?.trim());
}

export interface AITaskStatus {
  readonly name: string;
  readonly model: string;
  readonly envVar: string;
  readonly isOverridden: boolean;
}

/**
 * Reports whether the service is configured and which model each agent will use.
 */
export function getAIStatus(): { configured: boolean; tasks: Record<AITaskKey, AITaskStatus> } {
  return {
    configured: isAIConfigured(),
    tasks: {
      TREND_IDEAS: describeTask('TREND_IDEAS'),
      INTENT_CLASSIFIER: describeTask('INTENT_CLASSIFIER'),
      KEYWORD_MINING: describeTask('KEYWORD_MINING'),
      OUTLINE_GENERATOR: describeTask('OUTLINE_GENERATOR'),
      DRAFT_WRITER: describeTask('DRAFT_WRITER'),
      TONE_CHECK: describeTask('TONE_CHECK'),
      READABILITY: describeTask('READABILITY'),
      ONPAGE_SEO: describeTask('ONPAGE_SEO'),
      QA_VALIDATION: describeTask('QA_VALIDATION'),
    },
  };
}

function describeTask(key: AITaskKey): AITaskStatus {
  return {
    name: AI_TASK_NAMES[key],
    model: getModel(key),
    envVar: AI_ENV_KEYS[key],
    isOverridden: Boolean(process.env[AI_ENV_KEYS[key]]),
  };
}

// ============================================================================
// Generators
// ============================================================================

/**
 * Production generator: the AI SDK's generateText over the OpenRouter provider,
 * with retries on transient failures.
 *
 * @throws PipelineError with 'CONFIG_ERROR' when no API key is available
 *
 * @example
 * const generator = createOpenRouterTextGenerator();
 * const text = await generator.generate({
 *   system: 'You are an SEO strategist.',
 *   prompt: 'List five angles on sourdough baking.',
 *   model: getModel('TREND_IDEAS'),
 * });
 */
export function createOpenRouterTextGenerator(options: OpenRouterTextGeneratorOptions = {}): TextGenerator {
  const settings = getPipelineSettings();
  const apiKey = options.apiKey ?? settings.openRouterApiKey;
  if (!apiKey) {
    throw new PipelineError('CONFIG_ERROR', 'OPENROUTER_API_KEY environment variable is required');
  }

  const openrouter = createOpenRouter({
    apiKey,
    baseURL: options.baseURL ?? settings.openRouterBaseUrl,
  });
  const generate: GenerateTextFn = options.generateText ?? generateText;
  const defaultModel = options.defaultModel ?? AI_DEFAULT_MODELS.DRAFT_WRITER;
  const log = createPrefixedLogger('[AI]');

  return {
    async generate(request: TextGenerationRequest): Promise<string> {
      const modelName = request.model ?? defaultModel;
      log.debug(`generateText (model: ${modelName}, prompt: ${request.prompt.length} chars)`);

      const { text } = await withRetry(
        () =>
          generate({
            model: openrouter(modelName),
            system: request.system,
            prompt: request.prompt,
            temperature: request.temperature,
          }),
        { context: `generateText (model: ${modelName})`, ...options.retry }
      );

      return text.trim();
    },
  };
}

/**
 * Deterministic generator for tests and dry runs.
 *
 * @example
 * const generator = createStaticTextGenerator((request) =>
 *   request.prompt.includes('intent') ? '{"intent":"Informational"}' : '{}'
 * );
 */
export function createStaticTextGenerator(
  responder: string | ((request: TextGenerationRequest) => string | Promise<string>)
): TextGenerator {
  return {
    async generate(request: TextGenerationRequest): Promise<string> {
      const text = typeof responder === 'string' ? responder : await responder(request);
      return text.trim();
    },
  };
}
