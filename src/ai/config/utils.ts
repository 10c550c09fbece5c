/**
 * AI Configuration Utilities
 *
 * Centralized configuration for AI models and environment variables.
 * Change default models here - no need to modify individual agents.
 */

/**
 * Environment variable names for each AI task
 * Set these env vars to override the default models
 */
export const AI_ENV_KEYS = {
  TREND_IDEAS: 'AI_MODEL_TREND_IDEAS',
  INTENT_CLASSIFIER: 'AI_MODEL_INTENT_CLASSIFIER',
  KEYWORD_MINING: 'AI_MODEL_KEYWORD_MINING',
  OUTLINE_GENERATOR: 'AI_MODEL_OUTLINE_GENERATOR',
  DRAFT_WRITER: 'AI_MODEL_DRAFT_WRITER',
  TONE_CHECK: 'AI_MODEL_TONE_CHECK',
  READABILITY: 'AI_MODEL_READABILITY',
  ONPAGE_SEO: 'AI_MODEL_ONPAGE_SEO',
  QA_VALIDATION: 'AI_MODEL_QA_VALIDATION',
} as const;

/**
 * Default models for each AI task
 *
 * Environment variables (AI_ENV_KEYS) take precedence over these defaults.
 *
 * Available models (OpenRouter):
 * - 'deepseek/deepseek-v3.2' - Fast, cost-effective, good quality
 * - 'anthropic/claude-sonnet-4' - Best quality for long-form writing
 * - 'openai/gpt-4o-mini' - Good balance of speed/cost
 */
export const AI_DEFAULT_MODELS = {
  TREND_IDEAS: 'deepseek/deepseek-v3.2',
  INTENT_CLASSIFIER: 'openai/gpt-4o-mini',
  KEYWORD_MINING: 'deepseek/deepseek-v3.2',
  OUTLINE_GENERATOR: 'deepseek/deepseek-v3.2',
  DRAFT_WRITER: 'anthropic/claude-sonnet-4',
  TONE_CHECK: 'openai/gpt-4o-mini',
  READABILITY: 'openai/gpt-4o-mini',
  ONPAGE_SEO: 'deepseek/deepseek-v3.2',
  QA_VALIDATION: 'deepseek/deepseek-v3.2',
} as const;

/**
 * Human-readable task names, used by status reporting
 */
export const AI_TASK_NAMES = {
  TREND_IDEAS: 'Trend Ideas',
  INTENT_CLASSIFIER: 'Intent Classifier',
  KEYWORD_MINING: 'Keyword Mining',
  OUTLINE_GENERATOR: 'Outline Generator',
  DRAFT_WRITER: 'Draft Writer',
  TONE_CHECK: 'Tone Check',
  READABILITY: 'Readability',
  ONPAGE_SEO: 'On-Page SEO',
  QA_VALIDATION: 'QA Validation',
} as const satisfies Record<AITaskKey, string>;

export type AITaskKey = keyof typeof AI_ENV_KEYS;
export type AIEnvKey = (typeof AI_ENV_KEYS)[keyof typeof AI_ENV_KEYS];

/**
 * Get the model for a specific AI task
 * Checks environment variable first, falls back to default model
 *
 * @example
 * const model = getModel('DRAFT_WRITER');
 * // Returns env var AI_MODEL_DRAFT_WRITER if set, otherwise 'anthropic/claude-sonnet-4'
 */
export function getModel(taskKey: AITaskKey, env: NodeJS.ProcessEnv = process.env): string {
  const envKey = AI_ENV_KEYS[taskKey];
  const defaultModel = AI_DEFAULT_MODELS[taskKey];
  return env[envKey] || defaultModel;
}
