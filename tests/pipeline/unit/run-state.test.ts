import { describe, it, expect } from 'vitest';

import {
  createRunState,
  deepFreeze,
  finalizeRunState,
  getRunOutcome,
  parseRunStateDocument,
  recordStepFailure,
  recordStepSuccess,
  serializeRunState,
  snapshotRunState,
  toStepFailure,
  transitionStatus,
} from '../../../src/ai/pipeline/run-state';
import { PipelineError, StepExecutionError, type JsonValue, type RunState } from '../../../src/ai/pipeline/types';

function runningState(sequence: readonly string[] = ['a', 'b']): RunState {
  const state = createRunState({
    runId: 'run-1',
    correlationId: 'corr-1',
    topic: 'Sourdough',
    sequence,
    startedAt: Date.UTC(2025, 0, 31, 9, 0, 0),
  });
  transitionStatus(state, 'running');
  return state;
}

describe('createRunState', () => {
  it('starts initialized with empty collections', () => {
    const state = createRunState({ runId: 'r', correlationId: 'c', topic: 't', sequence: ['a'], startedAt: 5 });

    expect(state).toEqual({
      runId: 'r',
      correlationId: 'c',
      topic: 't',
      sequence: ['a'],
      currentStep: null,
      completedSteps: [],
      failedSteps: {},
      outputs: {},
      status: 'initialized',
      startedAt: 5,
      endedAt: null,
      finalOutput: null,
      stepDurations: {},
    });
  });

  it('copies the sequence', () => {
    const sequence = ['a', 'b'];
    const state = createRunState({ runId: 'r', correlationId: 'c', topic: 't', sequence, startedAt: 0 });
    sequence.push('c');

    expect(state.sequence).toEqual(['a', 'b']);
  });
});

describe('transitionStatus', () => {
  it('allows initialized → running → completed', () => {
    const state = runningState();
    transitionStatus(state, 'completed');
    expect(state.status).toBe('completed');
  });

  it('rejects skipping running', () => {
    const state = createRunState({ runId: 'r', correlationId: 'c', topic: 't', sequence: ['a'], startedAt: 0 });
    expect(() => transitionStatus(state, 'completed')).toThrow('Cannot move run r from "initialized" to "completed"');
  });

  it('rejects leaving a terminal status', () => {
    const state = runningState();
    transitionStatus(state, 'failed');
    expect(() => transitionStatus(state, 'running')).toThrow(PipelineError);
  });
});

describe('recordStepSuccess / recordStepFailure', () => {
  it('stores a frozen output and the duration', () => {
    const state = runningState();
    recordStepSuccess(state, 'a', { words: ['x'] }, 25);

    expect(state.completedSteps).toEqual(['a']);
    expect(state.outputs.a).toEqual({ words: ['x'] });
    expect(Object.isFrozen(state.outputs.a)).toBe(true);
    expect(state.stepDurations.a).toBe(25);
  });

  it('records at most one outcome per step', () => {
    const state = runningState();
    recordStepSuccess(state, 'a', 1, 0);

    expect(() => recordStepSuccess(state, 'a', 2, 0)).toThrow('Step "a" already has a recorded outcome');
    expect(() =>
      recordStepFailure(state, { stepId: 'a', code: 'STEP_FAILED', message: 'x', trace: null, failedAt: 0 }, 0)
    ).toThrow('Step "a" already has a recorded outcome');
  });

  it('refuses to record before the run is running', () => {
    const state = createRunState({ runId: 'r', correlationId: 'c', topic: 't', sequence: ['a'], startedAt: 0 });
    expect(() => recordStepSuccess(state, 'a', 1, 0)).toThrow('Cannot record step "a" while run is "initialized"');
  });

  it('builds failure records from pipeline errors', () => {
    const cause = new Error('socket hang up');
    const failure = toStepFailure('b', new StepExecutionError('b', 'Step "b" failed: socket hang up', cause), 42);

    expect(failure).toEqual({
      stepId: 'b',
      code: 'STEP_FAILED',
      message: 'Step "b" failed: socket hang up',
      trace: cause.stack,
      failedAt: 42,
    });
  });
});

describe('finalizeRunState', () => {
  it('completes with the terminal output', () => {
    const state = runningState();
    recordStepSuccess(state, 'a', 'x', 0);
    recordStepSuccess(state, 'b', { article: true }, 0);

    const final = finalizeRunState(state, state.startedAt + 500);

    expect(final.status).toBe('completed');
    expect(final.finalOutput).toEqual({ article: true });
    expect(final.endedAt).toBe(state.startedAt + 500);
    expect(Object.isFrozen(final)).toBe(true);
  });

  it('fails when the terminal step has no output', () => {
    const state = runningState();
    recordStepSuccess(state, 'a', 'x', 0);

    const final = finalizeRunState(state, state.startedAt + 1);

    expect(final.status).toBe('failed');
    expect(final.finalOutput).toBeNull();
  });

  it.each<[string, JsonValue]>([
    ['an empty string', ''],
    ['an empty array', []],
    ['an empty object', {}],
  ])('fails when the terminal output is %s', (_label, output) => {
    const state = runningState(['a']);
    recordStepSuccess(state, 'a', output, 0);

    const final = finalizeRunState(state, state.startedAt + 1);

    expect(final.status).toBe('failed');
    expect(final.finalOutput).toBeNull();
  });

  it('never sets endedAt before startedAt', () => {
    const state = runningState(['a']);
    recordStepSuccess(state, 'a', 'x', 0);

    const final = finalizeRunState(state, state.startedAt - 1000);

    expect(final.endedAt).toBe(final.startedAt);
  });
});

describe('getRunOutcome', () => {
  it('classifies every status', () => {
    const running = runningState(['a', 'b']);
    expect(getRunOutcome(running)).toBe('in_progress');

    recordStepFailure(running, { stepId: 'a', code: 'STEP_FAILED', message: 'x', trace: null, failedAt: 0 }, 0);
    recordStepSuccess(running, 'b', 'ok', 0);
    expect(getRunOutcome(finalizeRunState(running, running.startedAt))).toBe('degraded');

    const clean = runningState(['a']);
    recordStepSuccess(clean, 'a', 'ok', 0);
    expect(getRunOutcome(finalizeRunState(clean, clean.startedAt))).toBe('succeeded');

    const failed = runningState(['a']);
    expect(getRunOutcome(finalizeRunState(failed, failed.startedAt))).toBe('failed');
  });
});

describe('snapshotRunState / deepFreeze', () => {
  it('returns a frozen copy the live state does not share', () => {
    const state = runningState();
    recordStepSuccess(state, 'a', 'x', 0);

    const snapshot = snapshotRunState(state);
    recordStepSuccess(state, 'b', 'y', 0);

    expect(snapshot.completedSteps).toEqual(['a']);
    expect(Object.isFrozen(snapshot.completedSteps)).toBe(true);
    expect(Object.isFrozen(state.completedSteps)).toBe(false);
  });

  it('freezes nested values in place', () => {
    const value = { list: [{ n: 1 }] };
    expect(deepFreeze(value)).toBe(value);
    expect(Object.isFrozen(value.list[0])).toBe(true);
  });
});

describe('serializeRunState / parseRunStateDocument', () => {
  it('writes ISO timestamps, outcome and duration', () => {
    const state = runningState();
    recordStepFailure(
      state,
      { stepId: 'a', code: 'CONFIG_ERROR', message: 'Unknown step "a"', trace: null, failedAt: state.startedAt + 10 },
      0
    );
    recordStepSuccess(state, 'b', { title: 'Done' }, 30);
    const final = finalizeRunState(state, state.startedAt + 1500);

    const document = serializeRunState(final);

    expect(document).toEqual({
      runId: 'run-1',
      correlationId: 'corr-1',
      topic: 'Sourdough',
      sequence: ['a', 'b'],
      currentStep: null,
      completedSteps: ['b'],
      failedSteps: {
        a: {
          stepId: 'a',
          code: 'CONFIG_ERROR',
          message: 'Unknown step "a"',
          trace: null,
          failedAt: '2025-01-31T09:00:00.010Z',
        },
      },
      outputs: { b: { title: 'Done' } },
      status: 'completed',
      outcome: 'degraded',
      startedAt: '2025-01-31T09:00:00.000Z',
      endedAt: '2025-01-31T09:00:01.500Z',
      durationMs: 1500,
      finalOutput: { title: 'Done' },
      stepDurations: { a: 0, b: 30 },
    });
  });

  it('leaves endedAt and durationMs null for an unfinished run', () => {
    const document = serializeRunState(runningState());
    expect(document.endedAt).toBeNull();
    expect(document.durationMs).toBeNull();
    expect(document.outcome).toBe('in_progress');
  });

  it('parses what it serialized', () => {
    const document = serializeRunState(runningState());
    expect(parseRunStateDocument(JSON.parse(JSON.stringify(document)))).toEqual(document);
  });

  it('rejects documents with a missing field', () => {
    const { runId: _runId, ...withoutRunId } = serializeRunState(runningState());
    expect(() => parseRunStateDocument(withoutRunId)).toThrow();
  });
});
