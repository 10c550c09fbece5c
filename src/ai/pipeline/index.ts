/**
 * Content Pipeline Module
 *
 * Orchestration core (step contract, run state, result cache, progress reporting)
 * plus the content agents that run on it.
 *
 * @example
 * import { Orchestrator, FileResultCache, createContentStepRegistry, DEFAULT_STEP_SEQUENCE } from './ai/pipeline';
 *
 * const orchestrator = new Orchestrator({
 *   resolver: createContentStepRegistry({ generator }),
 *   cache: new FileResultCache('cache'),
 * });
 * const state = await orchestrator.run('Sourdough baking for beginners', DEFAULT_STEP_SEQUENCE);
 */

// Orchestrator
export { Orchestrator, type OrchestratorDeps, type RunOptions } from './orchestrator';

// Types and errors
export {
  PipelineError,
  InvalidInputError,
  ConfigurationError,
  StepExecutionError,
  CacheWriteError,
  ProgressSinkError,
  RunFailedError,
  isPipelineError,
  toError,
  systemClock,
  createMockClock,
  RUN_STATUSES,
  type PipelineErrorCode,
  type JsonValue,
  type JsonObject,
  type RunState,
  type RunStateSnapshot,
  type RunStatus,
  type RunOutcome,
  type StepFailure,
  type StepContext,
  type PipelineStep,
  type StepFactory,
  type StepResolver,
  type ProgressSink,
  type ProgressCallback,
  type Clock,
} from './types';

// Run state
export {
  getRunOutcome,
  serializeRunState,
  parseRunStateDocument,
  snapshotRunState,
  RunStateDocumentSchema,
  type RunStateDocument,
} from './run-state';

// Building blocks
export { StepRegistry } from './step-registry';
export { withStepRetry, withStepTimeout } from './step-decorators';
export { ProgressReporter, createCallbackSink, createNoOpProgressReporter } from './progress-reporter';
export { StepTimer } from './step-timer';
export {
  InMemoryResultCache,
  FileResultCache,
  buildCacheFileName,
  type ResultCache,
  type CacheEntry,
  type CacheRunKey,
} from './result-cache';
export { withRetry, isRetryableError, createRetryWrapper, sleep, type RetryOptions } from './retry';

// Config
export {
  PIPELINE_CONFIG,
  RETRY_CONFIG,
  AGENT_CONFIG,
  SEO_CONSTRAINTS,
  GENERATOR_CONFIG,
  getPipelineSettings,
  type PipelineSettings,
} from './config';

// Export
export { renderArticleMarkdown, writeRunArtifacts, type RunArtifacts } from './exporters';

// Agents
export * from './agents';
