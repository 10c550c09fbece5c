/**
 * Progress Reporter
 *
 * Sits between the orchestrator and an optional ProgressSink. Normalizes fractions,
 * hands the sink a read-only snapshot, and makes sure a misbehaving sink can never
 * abort content generation.
 */

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { snapshotRunState } from './run-state';
import {
  ProgressSinkError,
  toError,
  type ProgressCallback,
  type ProgressSink,
  type RunState,
} from './types';

// ============================================================================
// ProgressReporter Class
// ============================================================================

/**
 * Reports run progress to a sink.
 *
 * - Fractions are clamped to [0, 1] and never decrease within one reporter.
 * - The sink receives a deep-frozen snapshot, not the live state.
 * - Anything the sink throws (or an async sink rejects with) is logged as a
 *   ProgressSinkError and discarded.
 *
 * @example
 * const reporter = new ProgressReporter(createCallbackSink((fraction, snapshot, message) => {
 *   console.log(`${Math.round(fraction * 100)}% ${message}`);
 * }));
 *
 * reporter.report(0, state, 'Running: user-input (1/11)');
 */
export class ProgressReporter {
  private lastFraction = 0;
  private readonly log: Logger;

  constructor(
    private readonly sink?: ProgressSink,
    log?: Logger
  ) {
    this.log = log ?? createPrefixedLogger('[Progress]');
  }

  /**
   * Emits one progress event.
   *
   * @returns The fraction actually reported (after clamping)
   */
  report(fraction: number, state: RunState, message: string): number {
    const normalized = this.normalize(fraction);
    this.lastFraction = normalized;

    if (!this.sink) {
      return normalized;
    }

    try {
      const returned: unknown = this.sink.notify(normalized, snapshotRunState(state), message);
      if (returned instanceof Promise) {
        returned.catch((error: unknown) => this.discard(error, message));
      }
    } catch (error) {
      this.discard(error, message);
    }
    return normalized;
  }

  /**
   * Returns whether a sink is registered.
   */
  get hasSink(): boolean {
    return this.sink !== undefined;
  }

  /**
   * The last fraction reported (0 before the first event).
   */
  get currentFraction(): number {
    return this.lastFraction;
  }

  private normalize(fraction: number): number {
    const clamped = Number.isFinite(fraction) ? Math.min(1, Math.max(0, fraction)) : this.lastFraction;
    return Math.max(clamped, this.lastFraction);
  }

  private discard(error: unknown, message: string): void {
    const sinkError = new ProgressSinkError(`Progress sink failed on "${message}"`, toError(error));
    this.log.warn(`${sinkError.message}: ${sinkError.cause?.message ?? 'unknown error'}`);
  }
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Adapts a plain callback to the ProgressSink contract.
 */
export function createCallbackSink(callback: ProgressCallback): ProgressSink {
  return {
    notify: (fraction, snapshot, message) => callback(fraction, snapshot, message),
  };
}

/**
 * Creates a no-op progress reporter for when no sink is needed.
 * All methods are safe to call but do nothing.
 */
export function createNoOpProgressReporter(): ProgressReporter {
  return new ProgressReporter(undefined);
}
