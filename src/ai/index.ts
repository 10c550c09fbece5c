/**
 * AI Module
 *
 * ## Structure
 *
 * - `/config/` - Model selection per agent (env overrides + defaults)
 * - `service.ts` - The TextGenerator capability and its OpenRouter implementation
 * - `/pipeline/` - Orchestrator, run state, result cache and the content agents
 *
 * ## Usage
 *
 * ```typescript
 * import { createOpenRouterTextGenerator, isAIConfigured } from './ai';
 *
 * if (isAIConfigured()) {
 *   const generator = createOpenRouterTextGenerator();
 *   const text = await generator.generate({ prompt: 'Suggest three headlines about sourdough.' });
 * }
 * ```
 */

export {
  isAIConfigured,
  getAIStatus,
  createOpenRouterTextGenerator,
  createStaticTextGenerator,
  type TextGenerator,
  type TextGenerationRequest,
  type GenerateTextFn,
  type OpenRouterTextGeneratorOptions,
  type AITaskStatus,
} from './service';

export { AI_ENV_KEYS, AI_DEFAULT_MODELS, AI_TASK_NAMES, getModel, type AITaskKey, type AIEnvKey } from './config';
