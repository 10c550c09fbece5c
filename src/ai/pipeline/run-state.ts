/**
 * Run State
 *
 * Creation, mutation and serialization of the RunState threaded through a pipeline run.
 * Only the orchestrator calls the mutating helpers; everything else works on snapshots
 * or serialized documents.
 */

import { z } from 'zod';

import { JsonValueSchema, isEmptyOutput } from './json';
import {
  PipelineError,
  RUN_STATUSES,
  type JsonValue,
  type RunOutcome,
  type RunState,
  type RunStateSnapshot,
  type RunStatus,
  type StepFailure,
} from './types';

// ============================================================================
// Creation
// ============================================================================

export interface CreateRunStateParams {
  readonly runId: string;
  readonly correlationId: string;
  readonly topic: string;
  readonly sequence: readonly string[];
  readonly startedAt: number;
}

/**
 * Creates a fresh RunState with status `initialized` and empty collections.
 */
export function createRunState(params: CreateRunStateParams): RunState {
  return {
    runId: params.runId,
    correlationId: params.correlationId,
    topic: params.topic,
    sequence: Object.freeze([...params.sequence]),
    currentStep: null,
    completedSteps: [],
    failedSteps: {},
    outputs: {},
    status: 'initialized',
    startedAt: params.startedAt,
    endedAt: null,
    finalOutput: null,
    stepDurations: {},
  };
}

// ============================================================================
// Status Transitions
// ============================================================================

const ALLOWED_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  initialized: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * Moves the run to `next`, enforcing initialized → running → completed | failed.
 *
 * @throws PipelineError with 'INVALID_STATE' for any other transition
 */
export function transitionStatus(state: RunState, next: RunStatus): void {
  if (!ALLOWED_TRANSITIONS[state.status].includes(next)) {
    throw new PipelineError('INVALID_STATE', `Cannot move run ${state.runId} from "${state.status}" to "${next}"`);
  }
  state.status = next;
}

// ============================================================================
// Step Outcomes
// ============================================================================

function assertRecordable(state: RunState, stepId: string): void {
  if (state.status !== 'running') {
    throw new PipelineError('INVALID_STATE', `Cannot record step "${stepId}" while run is "${state.status}"`);
  }
  if (state.completedSteps.includes(stepId) || stepId in state.failedSteps) {
    throw new PipelineError('INVALID_STATE', `Step "${stepId}" already has a recorded outcome`);
  }
}

/**
 * Records a successful step: stores its (frozen) output and appends it to completedSteps.
 */
export function recordStepSuccess(state: RunState, stepId: string, output: JsonValue, durationMs: number): void {
  assertRecordable(state, stepId);
  state.outputs[stepId] = deepFreeze(output);
  state.completedSteps.push(stepId);
  state.stepDurations[stepId] = durationMs;
}

/**
 * Records a failed step. At most one failure per step id.
 */
export function recordStepFailure(state: RunState, failure: StepFailure, durationMs: number): void {
  assertRecordable(state, failure.stepId);
  state.failedSteps[failure.stepId] = Object.freeze({ ...failure });
  state.stepDurations[failure.stepId] = durationMs;
}

/**
 * Builds the failure record stored in failedSteps.
 */
export function toStepFailure(stepId: string, error: PipelineError, failedAt: number): StepFailure {
  const underlying = error.cause ?? error;
  return {
    stepId,
    code: error.code,
    message: error.message,
    trace: underlying.stack ?? null,
    failedAt,
  };
}

// ============================================================================
// Finalization
// ============================================================================

/**
 * Ends the run: `completed` with the terminal step's output as finalOutput when the
 * terminal step succeeded with a non-empty output, `failed` otherwise. Sets endedAt and deep-freezes the state.
 */
export function finalizeRunState(state: RunState, endedAt: number): RunState {
  const terminalStep = state.sequence[state.sequence.length - 1];
  const terminalOutput = terminalStep !== undefined ? state.outputs[terminalStep] : undefined;
  if (
    terminalStep !== undefined &&
    terminalOutput !== undefined &&
    !isEmptyOutput(terminalOutput) &&
    state.completedSteps.includes(terminalStep)
  ) {
    state.finalOutput = terminalOutput;
    transitionStatus(state, 'completed');
  } else {
    state.finalOutput = null;
    transitionStatus(state, 'failed');
  }
  state.endedAt = Math.max(endedAt, state.startedAt);
  return deepFreeze(state);
}

/**
 * Classifies a run for display: succeeded, degraded, failed or still in progress.
 */
export function getRunOutcome(state: RunStateSnapshot): RunOutcome {
  switch (state.status) {
    case 'completed':
      return Object.keys(state.failedSteps).length > 0 ? 'degraded' : 'succeeded';
    case 'failed':
      return 'failed';
    default:
      return 'in_progress';
  }
}

// ============================================================================
// Snapshots
// ============================================================================

/**
 * Recursively freezes a plain value. Returns the same reference.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Deep copy of the state that neither the caller nor the receiver can mutate.
 */
export function snapshotRunState(state: RunState): RunStateSnapshot {
  return deepFreeze(structuredClone(state));
}

// ============================================================================
// Serialization
// ============================================================================

const StepFailureSchema = z.object({
  stepId: z.string(),
  code: z.enum([
    'INVALID_INPUT',
    'CONFIG_ERROR',
    'STEP_FAILED',
    'CACHE_WRITE_FAILED',
    'PROGRESS_SINK_FAILED',
    'RUN_FAILED',
    'INVALID_STATE',
  ]),
  message: z.string(),
  trace: z.string().nullable(),
  failedAt: z.string(),
});

/**
 * Shape of a serialized RunState. Timestamps are ISO-8601 strings.
 */
export const RunStateDocumentSchema = z.object({
  runId: z.string().min(1),
  correlationId: z.string(),
  topic: z.string().min(1),
  sequence: z.array(z.string()),
  currentStep: z.string().nullable(),
  completedSteps: z.array(z.string()),
  failedSteps: z.record(StepFailureSchema),
  outputs: z.record(JsonValueSchema),
  status: z.enum(RUN_STATUSES),
  outcome: z.enum(['succeeded', 'degraded', 'failed', 'in_progress']),
  startedAt: z.string(),
  endedAt: z.string().nullable(),
  durationMs: z.number().nullable(),
  finalOutput: JsonValueSchema,
  stepDurations: z.record(z.number()),
});

export type RunStateDocument = z.infer<typeof RunStateDocumentSchema>;

const toIso = (epochMs: number): string => new Date(epochMs).toISOString();

/**
 * Converts a RunState (or snapshot) into a JSON document with every field present.
 */
export function serializeRunState(state: RunStateSnapshot): RunStateDocument {
  const failedSteps: RunStateDocument['failedSteps'] = {};
  for (const [stepId, failure] of Object.entries(state.failedSteps)) {
    failedSteps[stepId] = { ...failure, failedAt: toIso(failure.failedAt) };
  }

  return {
    runId: state.runId,
    correlationId: state.correlationId,
    topic: state.topic,
    sequence: [...state.sequence],
    currentStep: state.currentStep,
    completedSteps: [...state.completedSteps],
    failedSteps,
    outputs: structuredClone({ ...state.outputs }),
    status: state.status,
    outcome: getRunOutcome(state),
    startedAt: toIso(state.startedAt),
    endedAt: state.endedAt === null ? null : toIso(state.endedAt),
    durationMs: state.endedAt === null ? null : state.endedAt - state.startedAt,
    finalOutput: structuredClone(state.finalOutput),
    stepDurations: { ...state.stepDurations },
  };
}

/**
 * Validates an unknown value (e.g. a parsed report file) as a RunState document.
 *
 * @throws ZodError when the value does not match
 */
export function parseRunStateDocument(value: unknown): RunStateDocument {
  return RunStateDocumentSchema.parse(value);
}
