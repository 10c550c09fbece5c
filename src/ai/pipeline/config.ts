/**
 * Pipeline Configuration
 *
 * Centralized configuration for the orchestrator, the result cache and the agents.
 * All magic numbers and tuning parameters should be defined here.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time if configuration is inconsistent.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Pipeline config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates that a MIN value is less than or equal to MAX value.
 */
function validateMinMax(minValue: number, maxValue: number, minName: string, maxName: string): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

/**
 * Validates that a value is positive.
 */
function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

/**
 * Validates temperature is in valid range (0-2).
 */
function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Pipeline Configuration
// ============================================================================

export const PIPELINE_CONFIG = {
  /** Directory for per-step snapshots when PIPELINE_CACHE_DIR is unset */
  DEFAULT_CACHE_DIR: 'cache',
  /** Directory for exported articles and run reports when PIPELINE_OUTPUT_DIR is unset */
  DEFAULT_OUTPUT_DIR: 'output',
  /** Maximum length of the topic slug embedded in file names */
  TOPIC_SLUG_MAX_LENGTH: 60,
  /** Number of run-id characters appended to cache file names */
  RUN_ID_FRAGMENT_LENGTH: 8,
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  /** Maximum number of retry attempts */
  MAX_RETRIES: 3,
  /** Initial delay in milliseconds before first retry */
  INITIAL_DELAY_MS: 1000,
  /** Maximum delay in milliseconds between retries */
  MAX_DELAY_MS: 10000,
  /** Multiplier for exponential backoff */
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Generator Configuration
// ============================================================================

export const GENERATOR_CONFIG = {
  /** Default OpenRouter base URL */
  DEFAULT_OPENROUTER_BASE_URL: 'https://openrouter.ai/api/v1',
} as const;

// ============================================================================
// Agent Configuration
// ============================================================================

/**
 * Temperatures follow the task: classification and extraction stay factual,
 * writing gets more room.
 */
export const AGENT_CONFIG = {
  TEMPERATURES: {
    TREND_IDEAS: 0.7,
    INTENT_CLASSIFIER: 0.2,
    KEYWORD_MINING: 0.3,
    OUTLINE_GENERATOR: 0.4,
    DRAFT_WRITER: 0.7,
    TONE_CHECK: 0.2,
    READABILITY: 0.3,
    ONPAGE_SEO: 0.3,
    QA_VALIDATION: 0.1,
  },
  /** Target length of the article when the caller does not set one */
  DEFAULT_TARGET_WORD_COUNT: 2000,
  MIN_TARGET_WORD_COUNT: 300,
  MAX_TARGET_WORD_COUNT: 6000,
  /** Reading speed used for the reading-time estimate */
  WORDS_PER_MINUTE: 200,
  /** Earlier outputs embedded in prompts are cut to this many characters */
  PROMPT_CONTEXT_MAX_CHARS: 2000,
  /** How many items of a list output are forwarded to later prompts */
  PROMPT_LIST_LIMIT: 10,
} as const;

// ============================================================================
// SEO Constraints
// ============================================================================

export const SEO_CONSTRAINTS = {
  TITLE_TAG_MAX_LENGTH: 60,
  META_DESCRIPTION_MIN_LENGTH: 70,
  META_DESCRIPTION_MAX_LENGTH: 160,
  MIN_TAGS: 3,
  MAX_TAGS: 8,
} as const;

// ============================================================================
// Runtime Settings
// ============================================================================

/**
 * Settings resolved from the environment at run time.
 */
export interface PipelineSettings {
  readonly openRouterApiKey: string;
  readonly openRouterBaseUrl: string;
  readonly cacheDir: string;
  readonly outputDir: string;
}

/**
 * Reads pipeline settings from environment variables, falling back to defaults.
 *
 * @example
 * const settings = getPipelineSettings();
 * const cache = new FileResultCache(settings.cacheDir);
 */
export function getPipelineSettings(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
  return {
    openRouterApiKey: env.OPENROUTER_API_KEY?.trim() ?? '',
    openRouterBaseUrl: env.OPENROUTER_BASE_URL || GENERATOR_CONFIG.DEFAULT_OPENROUTER_BASE_URL,
    cacheDir: env.PIPELINE_CACHE_DIR || PIPELINE_CONFIG.DEFAULT_CACHE_DIR,
    outputDir: env.PIPELINE_OUTPUT_DIR || PIPELINE_CONFIG.DEFAULT_OUTPUT_DIR,
  };
}

// ============================================================================
// Runtime Configuration Validation
// ============================================================================

/**
 * Validates all configuration values at module load time.
 * Throws ConfigValidationError if any values are inconsistent.
 */
function validateConfiguration(): void {
  validatePositive(PIPELINE_CONFIG.TOPIC_SLUG_MAX_LENGTH, 'PIPELINE_CONFIG.TOPIC_SLUG_MAX_LENGTH');
  validatePositive(PIPELINE_CONFIG.RUN_ID_FRAGMENT_LENGTH, 'PIPELINE_CONFIG.RUN_ID_FRAGMENT_LENGTH');

  validatePositive(RETRY_CONFIG.MAX_RETRIES, 'RETRY_CONFIG.MAX_RETRIES');
  validatePositive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  validateMinMax(
    RETRY_CONFIG.INITIAL_DELAY_MS,
    RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS',
    'RETRY_CONFIG.MAX_DELAY_MS'
  );
  validatePositive(RETRY_CONFIG.BACKOFF_MULTIPLIER, 'RETRY_CONFIG.BACKOFF_MULTIPLIER');

  for (const [agent, temperature] of Object.entries(AGENT_CONFIG.TEMPERATURES)) {
    validateTemperature(temperature, `AGENT_CONFIG.TEMPERATURES.${agent}`);
  }
  validateMinMax(
    AGENT_CONFIG.MIN_TARGET_WORD_COUNT,
    AGENT_CONFIG.DEFAULT_TARGET_WORD_COUNT,
    'AGENT_CONFIG.MIN_TARGET_WORD_COUNT',
    'AGENT_CONFIG.DEFAULT_TARGET_WORD_COUNT'
  );
  validateMinMax(
    AGENT_CONFIG.DEFAULT_TARGET_WORD_COUNT,
    AGENT_CONFIG.MAX_TARGET_WORD_COUNT,
    'AGENT_CONFIG.DEFAULT_TARGET_WORD_COUNT',
    'AGENT_CONFIG.MAX_TARGET_WORD_COUNT'
  );
  validatePositive(AGENT_CONFIG.WORDS_PER_MINUTE, 'AGENT_CONFIG.WORDS_PER_MINUTE');
  validatePositive(AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS, 'AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS');

  validateMinMax(
    SEO_CONSTRAINTS.META_DESCRIPTION_MIN_LENGTH,
    SEO_CONSTRAINTS.META_DESCRIPTION_MAX_LENGTH,
    'SEO_CONSTRAINTS.META_DESCRIPTION_MIN_LENGTH',
    'SEO_CONSTRAINTS.META_DESCRIPTION_MAX_LENGTH'
  );
  validateMinMax(SEO_CONSTRAINTS.MIN_TAGS, SEO_CONSTRAINTS.MAX_TAGS, 'SEO_CONSTRAINTS.MIN_TAGS', 'SEO_CONSTRAINTS.MAX_TAGS');
}

// Run validation at module load time
validateConfiguration();
