/**
 * Pipeline Orchestrator
 *
 * Drives a configured sequence of steps over a single RunState:
 * resolves each step, invokes it with a snapshot, records the outcome, persists
 * successful outputs to the result cache and reports progress.
 *
 * Failure policy: a failed step is recorded and the run continues, unless the step is
 * the terminal one (it produces the deliverable) or the caller marked it critical.
 */

import { randomUUID } from 'crypto';

import { createContextualLogger, generateCorrelationId, type ContextualLogger } from '../../utils/logger';
import { isEmptyOutput, validateJsonValue } from './json';
import { ProgressReporter } from './progress-reporter';
import type { ResultCache } from './result-cache';
import {
  createRunState,
  finalizeRunState,
  getRunOutcome,
  recordStepFailure,
  recordStepSuccess,
  snapshotRunState,
  toStepFailure,
  transitionStatus,
} from './run-state';
import { StepTimer } from './step-timer';
import {
  CacheWriteError,
  ConfigurationError,
  InvalidInputError,
  RunFailedError,
  StepExecutionError,
  systemClock,
  toError,
  type Clock,
  type JsonValue,
  type PipelineStep,
  type ProgressSink,
  type RunState,
  type StepResolver,
} from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Dependencies for the orchestrator.
 * Enables dependency injection for testing.
 */
export interface OrchestratorDeps {
  readonly resolver: StepResolver;
  /** Best-effort persistence of step outputs. Omit to skip caching. */
  readonly cache?: ResultCache;
  /** Clock for timestamps and durations (default: system clock) */
  readonly clock?: Clock;
  /** Run id generator (default: crypto.randomUUID) */
  readonly generateRunId?: () => string;
}

export interface RunOptions {
  /** Ties all log lines of the run together; generated when omitted */
  readonly correlationId?: string;
  /**
   * Steps whose failure aborts the run (status `failed`) even though they are not
   * terminal. Every id must appear in the sequence.
   */
  readonly criticalSteps?: readonly string[];
  /** Resolve every step before the first one runs and fail fast on unknown ids */
  readonly strictResolution?: boolean;
  /** Reject with RunFailedError when the run ends `failed` */
  readonly throwOnFailure?: boolean;
}

type StepOutcome =
  | { readonly ok: true; readonly output: JsonValue }
  | { readonly ok: false; readonly error: ConfigurationError | StepExecutionError };

// ============================================================================
// Input Validation
// ============================================================================

/**
 * @returns The trimmed topic
 * @throws InvalidInputError for a missing, empty or whitespace-only topic
 */
function validateTopic(topic: unknown): string {
  if (typeof topic !== 'string' || topic.trim().length === 0) {
    throw new InvalidInputError('Topic must be a non-empty string');
  }
  return topic.trim();
}

/**
 * @throws ConfigurationError for an empty sequence, blank or duplicate ids, or
 *   critical steps that are not part of the sequence
 */
function validateSequence(sequence: readonly string[], criticalSteps: readonly string[]): void {
  if (sequence.length === 0) {
    throw new ConfigurationError(null, 'Step sequence must contain at least one step');
  }

  const seen = new Set<string>();
  for (const stepId of sequence) {
    if (typeof stepId !== 'string' || stepId.trim().length === 0) {
      throw new ConfigurationError(null, 'Step ids must be non-empty strings');
    }
    if (seen.has(stepId)) {
      throw new ConfigurationError(stepId, `Step "${stepId}" appears more than once in the sequence`);
    }
    seen.add(stepId);
  }

  for (const stepId of criticalSteps) {
    if (!seen.has(stepId)) {
      throw new ConfigurationError(stepId, `Critical step "${stepId}" is not part of the sequence`);
    }
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * @example
 * const orchestrator = new Orchestrator({
 *   resolver: createContentStepRegistry({ generator }),
 *   cache: new FileResultCache('cache'),
 * });
 *
 * const state = await orchestrator.run('Sourdough baking for beginners', DEFAULT_STEP_SEQUENCE, sink);
 * getRunOutcome(state); // 'succeeded' | 'degraded' | 'failed'
 */
export class Orchestrator {
  private readonly resolver: StepResolver;
  private readonly cache: ResultCache | undefined;
  private readonly clock: Clock;
  private readonly generateRunId: () => string;

  constructor(deps: OrchestratorDeps) {
    this.resolver = deps.resolver;
    this.cache = deps.cache;
    this.clock = deps.clock ?? systemClock;
    this.generateRunId = deps.generateRunId ?? randomUUID;
  }

  /**
   * Executes `sequence` for `topic` and returns the final, frozen RunState.
   *
   * @throws InvalidInputError for an empty topic (before any step runs)
   * @throws ConfigurationError for an unusable sequence (before any step runs)
   * @throws RunFailedError when the run failed and `throwOnFailure` is set
   */
  async run(
    topic: string,
    sequence: readonly string[],
    progressSink?: ProgressSink,
    options: RunOptions = {}
  ): Promise<RunState> {
    const normalizedTopic = validateTopic(topic);
    const criticalSteps = new Set(options.criticalSteps ?? []);
    validateSequence(sequence, [...criticalSteps]);
    const preResolved = options.strictResolution ? this.resolveAll(sequence) : undefined;

    const correlationId = options.correlationId ?? generateCorrelationId();
    const runId = this.generateRunId();
    const log = createContextualLogger('[Orchestrator]', { correlationId, runId });
    const reporter = new ProgressReporter(progressSink, log);
    const timer = new StepTimer(this.clock);

    const state = createRunState({
      runId,
      correlationId,
      topic: normalizedTopic,
      sequence,
      startedAt: this.clock.now(),
    });
    transitionStatus(state, 'running');

    log.info(`Starting run for "${normalizedTopic}" (${sequence.length} steps)`);
    log.structured('info', { event: 'run_started', topic: normalizedTopic, steps: [...sequence] });

    const total = sequence.length;
    for (const [index, stepId] of sequence.entries()) {
      const isTerminal = index === total - 1;
      state.currentStep = stepId;
      reporter.report(index / total, state, `Running: ${stepId} (${index + 1}/${total})`);
      log.debug(`Step ${index + 1}/${total}: ${stepId}`);

      timer.start(stepId);
      const outcome = await this.executeStep(stepId, state, log, isTerminal, preResolved);
      const durationMs = timer.end(stepId);

      if (outcome.ok) {
        recordStepSuccess(state, stepId, outcome.output, durationMs);
        log.info(`${stepId} complete in ${durationMs}ms`);
        await this.persist(state, stepId, outcome.output, log);
        reporter.report((index + 1) / total, state, `Completed: ${stepId}`);
        continue;
      }

      const { error } = outcome;
      recordStepFailure(state, toStepFailure(stepId, error, this.clock.now()), durationMs);
      log.structured('warn', {
        event: 'step_failed',
        message: error.message,
        stepId,
        code: error.code,
        durationMs,
      });
      reporter.report((index + 1) / total, state, `Failed: ${stepId}: ${error.message}`);

      if (isTerminal) {
        log.error(`Terminal step ${stepId} failed; the run has no deliverable`);
        break;
      }
      if (criticalSteps.has(stepId)) {
        log.error(`Critical step ${stepId} failed; aborting the run`);
        break;
      }
    }

    this.releaseCache(state.runId, log);
    const finalState = finalizeRunState(state, this.clock.now());
    const outcome = getRunOutcome(finalState);
    const failedCount = Object.keys(finalState.failedSteps).length;
    log.structured(outcome === 'failed' ? 'error' : 'info', {
      event: 'run_finished',
      status: finalState.status,
      outcome,
      completedSteps: finalState.completedSteps.length,
      failedSteps: failedCount,
      durationMs: timer.getTotalDuration(),
    });
    reporter.report(1, finalState, this.describeFinish(outcome, failedCount));

    if (finalState.status === 'failed' && options.throwOnFailure) {
      throw new RunFailedError(finalState);
    }
    return finalState;
  }

  // ==========================================================================
  // Step Execution
  // ==========================================================================

  /**
   * Resolves and invokes one step. Never throws: every failure becomes a StepOutcome.
   */
  private async executeStep(
    stepId: string,
    state: RunState,
    log: ContextualLogger,
    isTerminal: boolean,
    preResolved: ReadonlyMap<string, PipelineStep> | undefined
  ): Promise<StepOutcome> {
    let step: PipelineStep;
    try {
      step = preResolved?.get(stepId) ?? this.resolver.resolve(stepId);
    } catch (error) {
      return { ok: false, error: this.toConfigurationError(stepId, error) };
    }

    let returned: unknown;
    try {
      returned = await step.run(snapshotRunState(state), {
        runId: state.runId,
        correlationId: state.correlationId,
        logger: log.child({ stepId }),
      });
    } catch (error) {
      if (error instanceof StepExecutionError && error.stepId === stepId) {
        return { ok: false, error };
      }
      const cause = toError(error);
      return { ok: false, error: new StepExecutionError(stepId, `Step "${stepId}" failed: ${cause.message}`, cause) };
    }

    // zod hands back a fresh copy, so the step keeps no reference into the state.
    // Cycles and throwing getters come back as a reason, never as an exception.
    const validated = validateJsonValue(returned);
    if (!validated.ok) {
      return {
        ok: false,
        error: new StepExecutionError(stepId, `Step "${stepId}" returned a value that is not JSON-compatible: ${validated.reason}`),
      };
    }
    if (isTerminal && isEmptyOutput(validated.value)) {
      return {
        ok: false,
        error: new StepExecutionError(stepId, `Terminal step "${stepId}" produced no output`),
      };
    }
    return { ok: true, output: validated.value };
  }

  private resolveAll(sequence: readonly string[]): Map<string, PipelineStep> {
    const resolved = new Map<string, PipelineStep>();
    const failures: ConfigurationError[] = [];

    for (const stepId of sequence) {
      try {
        resolved.set(stepId, this.resolver.resolve(stepId));
      } catch (error) {
        failures.push(this.toConfigurationError(stepId, error));
      }
    }

    const [first] = failures;
    if (first) {
      const names = failures.map((failure) => failure.stepId ?? '(unknown)').join(', ');
      throw new ConfigurationError(
        failures.length === 1 ? first.stepId : null,
        `Cannot resolve step(s): ${names}`,
        first
      );
    }
    return resolved;
  }

  private toConfigurationError(stepId: string, error: unknown): ConfigurationError {
    if (error instanceof ConfigurationError) {
      return error;
    }
    const cause = toError(error);
    return new ConfigurationError(stepId, `Failed to resolve step "${stepId}": ${cause.message}`, cause);
  }

  // ==========================================================================
  // Persistence and Reporting
  // ==========================================================================

  private async persist(state: RunState, stepId: string, output: JsonValue, log: ContextualLogger): Promise<void> {
    if (!this.cache) return;
    try {
      const entry = await this.cache.put({ runId: state.runId, topic: state.topic }, stepId, output);
      if (!entry) {
        log.debug(`No cache entry written for ${stepId}`);
      }
    } catch (error) {
      // ResultCache implementations should not throw; a custom one still must not fail the run
      const cause = toError(error);
      const cacheError = new CacheWriteError(state.runId, stepId, `Cache write failed: ${cause.message}`, cause);
      log.warn(`${cacheError.name} [${cacheError.code}] for ${stepId}: ${cacheError.message}`);
    }
  }

  private releaseCache(runId: string, log: ContextualLogger): void {
    if (!this.cache) return;
    try {
      this.cache.endRun(runId);
    } catch (error) {
      log.warn(`Cache could not release run ${runId}: ${toError(error).message}`);
    }
  }

  private describeFinish(outcome: ReturnType<typeof getRunOutcome>, failedCount: number): string {
    switch (outcome) {
      case 'succeeded':
        return 'Run completed';
      case 'degraded':
        return `Run completed with ${failedCount} failed step(s)`;
      default:
        return `Run failed (${failedCount} failed step(s))`;
    }
  }
}
