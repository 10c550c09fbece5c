/**
 * Pipeline Types
 *
 * Shared types for the content-generation pipeline: the run state threaded through
 * every step, the step contract, the progress sink contract and the error taxonomy.
 */

import type { ContextualLogger } from '../../utils/logger';

// ============================================================================
// JSON Values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

/**
 * Any value that survives a JSON round trip unchanged.
 * Step outputs, cache payloads and serialized run state are restricted to this.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for pipeline failures.
 */
export type PipelineErrorCode =
  | 'INVALID_INPUT'
  | 'CONFIG_ERROR'
  | 'STEP_FAILED'
  | 'CACHE_WRITE_FAILED'
  | 'PROGRESS_SINK_FAILED'
  | 'RUN_FAILED'
  | 'INVALID_STATE';

/**
 * Base error for everything the pipeline raises or records.
 * Provides structured error information for programmatic handling.
 *
 * @example
 * try {
 *   await orchestrator.run(topic, sequence, undefined, { throwOnFailure: true });
 * } catch (error) {
 *   if (isPipelineError(error)) {
 *     switch (error.code) {
 *       case 'INVALID_INPUT':
 *         // Ask the user for a topic
 *         break;
 *       case 'RUN_FAILED':
 *         // Inspect error.state.failedSteps
 *         break;
 *     }
 *   }
 * }
 */
export class PipelineError extends Error {
  readonly name: string = 'PipelineError';

  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    readonly cause?: Error
  ) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Malformed run input (e.g. an empty topic). Raised before any step executes.
 */
export class InvalidInputError extends PipelineError {
  readonly name: string = 'InvalidInputError';

  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

/**
 * A step sequence that cannot be executed as configured: unknown or duplicate step ids,
 * an empty sequence, or a factory that fails to build its step.
 */
export class ConfigurationError extends PipelineError {
  readonly name: string = 'ConfigurationError';

  constructor(
    readonly stepId: string | null,
    message: string,
    cause?: Error
  ) {
    super('CONFIG_ERROR', message, cause);
  }
}

/**
 * A resolved step failed while running.
 */
export class StepExecutionError extends PipelineError {
  readonly name: string = 'StepExecutionError';

  constructor(
    readonly stepId: string,
    message: string,
    cause?: Error
  ) {
    super('STEP_FAILED', message, cause);
  }
}

/**
 * Best-effort persistence failed. Logged, never propagated out of a run.
 */
export class CacheWriteError extends PipelineError {
  readonly name: string = 'CacheWriteError';

  constructor(
    readonly runId: string,
    readonly stepId: string,
    message: string,
    cause?: Error
  ) {
    super('CACHE_WRITE_FAILED', message, cause);
  }
}

/**
 * A progress sink threw. Logged and discarded.
 */
export class ProgressSinkError extends PipelineError {
  readonly name: string = 'ProgressSinkError';

  constructor(message: string, cause?: Error) {
    super('PROGRESS_SINK_FAILED', message, cause);
  }
}

/**
 * Raised after a failed run when the caller asked for it (`throwOnFailure`).
 * Carries the final state so nothing recorded during the run is lost.
 */
export class RunFailedError extends PipelineError {
  readonly name: string = 'RunFailedError';

  constructor(readonly state: RunState) {
    super('RUN_FAILED', summarizeFailures(state));
  }
}

function summarizeFailures(state: RunState): string {
  const failures = Object.values(state.failedSteps);
  const details = failures.map((failure) => `${failure.stepId}: ${failure.message}`).join('; ');
  return `Run ${state.runId} for "${state.topic}" failed (${failures.length} failed step(s))${details ? `: ${details}` : ''}`;
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

// ============================================================================
// Run State
// ============================================================================

export const RUN_STATUSES = ['initialized', 'running', 'completed', 'failed'] as const;

/** Lifecycle status of a run, derived from RUN_STATUSES */
export type RunStatus = (typeof RUN_STATUSES)[number];

/**
 * How a run ended, from the reader's point of view.
 * - succeeded: every step completed
 * - degraded: the terminal step produced output but earlier steps failed
 * - failed: no deliverable
 */
export type RunOutcome = 'succeeded' | 'degraded' | 'failed' | 'in_progress';

/**
 * Failure detail recorded for one step.
 */
export interface StepFailure {
  readonly stepId: string;
  readonly code: PipelineErrorCode;
  readonly message: string;
  /** Stack trace of the underlying error, when one exists */
  readonly trace: string | null;
  /** Epoch milliseconds */
  readonly failedAt: number;
}

/**
 * The record threaded through a single pipeline execution.
 * Owned exclusively by the orchestrator; steps only ever see snapshots.
 */
export interface RunState {
  readonly runId: string;
  readonly correlationId: string;
  readonly topic: string;
  /** The configured step ids, in execution order */
  readonly sequence: readonly string[];
  currentStep: string | null;
  readonly completedSteps: string[];
  readonly failedSteps: Record<string, StepFailure>;
  readonly outputs: Record<string, JsonValue>;
  status: RunStatus;
  /** Epoch milliseconds */
  readonly startedAt: number;
  /** Epoch milliseconds; set exactly once, when the status becomes terminal */
  endedAt: number | null;
  /** Output of the terminal step; null when the run failed before producing it */
  finalOutput: JsonValue | null;
  readonly stepDurations: Record<string, number>;
}

/**
 * Read-only, deep-frozen copy of a RunState handed to steps and progress sinks.
 */
export interface RunStateSnapshot {
  readonly runId: string;
  readonly correlationId: string;
  readonly topic: string;
  readonly sequence: readonly string[];
  readonly currentStep: string | null;
  readonly completedSteps: readonly string[];
  readonly failedSteps: Readonly<Record<string, StepFailure>>;
  readonly outputs: Readonly<Record<string, JsonValue>>;
  readonly status: RunStatus;
  readonly startedAt: number;
  readonly endedAt: number | null;
  readonly finalOutput: JsonValue | null;
  readonly stepDurations: Readonly<Record<string, number>>;
}

// ============================================================================
// Step Contract
// ============================================================================

/**
 * Per-invocation context handed to a step alongside the state snapshot.
 */
export interface StepContext {
  readonly runId: string;
  readonly correlationId: string;
  /** Logger bound to the run's correlation ID and the step id */
  readonly logger: ContextualLogger;
}

/**
 * One unit of the pipeline.
 *
 * Receives the state as it exists immediately before it runs and resolves with the
 * artifact it produced; the orchestrator stores that under `outputs[id]`. A step
 * rejects only for real failures: an expected "no result" is a valid (possibly
 * empty) output. Each step is invoked at most once per run.
 *
 * @example
 * const wordCountStep: PipelineStep = {
 *   id: 'word-count',
 *   async run(state) {
 *     return { words: state.topic.split(/\s+/).length };
 *   },
 * };
 */
export interface PipelineStep {
  readonly id: string;
  run(state: RunStateSnapshot, context: StepContext): Promise<JsonValue>;
}

/**
 * Builds a step instance. Called once per resolution.
 */
export type StepFactory = () => PipelineStep;

/**
 * Turns step identifiers into invocable steps.
 * Implementations throw ConfigurationError for identifiers they cannot resolve.
 */
export interface StepResolver {
  resolve(stepId: string): PipelineStep;
}

// ============================================================================
// Progress Sink Contract
// ============================================================================

/**
 * Receives normalized progress events. Called synchronously, in event order.
 *
 * @param fraction - Overall progress in [0, 1], non-decreasing within a run
 * @param snapshot - Read-only view of the run state at the time of the event
 * @param message - Human-readable status line
 */
export interface ProgressSink {
  notify(fraction: number, snapshot: RunStateSnapshot, message: string): void;
}

export type ProgressCallback = (fraction: number, snapshot: RunStateSnapshot, message: string) => void;

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

/**
 * Clock interface for time-related operations.
 * Enables deterministic testing by allowing time to be mocked.
 *
 * @example
 * // Test usage
 * const mockClock: Clock = { now: () => 1234567890000 };
 */
export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

/**
 * Default clock implementation using system time.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a mock clock for testing with a fixed or advancing time.
 *
 * @param initialTime - Starting timestamp in milliseconds
 * @param autoAdvance - If provided, advances time by this many ms on each call
 *
 * @example
 * // Auto-advancing time (100ms per call)
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}
