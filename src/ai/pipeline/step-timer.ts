/**
 * Step Timer
 *
 * Tracks wall-clock durations of pipeline steps.
 * Encapsulates timing logic and provides a clean API for starting and ending steps.
 */

import { systemClock, type Clock } from './types';

// ============================================================================
// StepTimer Class
// ============================================================================

/**
 * Tracks timing for pipeline steps, keyed by step id.
 *
 * @example
 * const timer = new StepTimer(clock);
 *
 * timer.start('keyword-mining');
 * // ... run the step ...
 * timer.end('keyword-mining'); // → 1500
 *
 * timer.getDurations(); // { 'keyword-mining': 1500 }
 */
export class StepTimer {
  private readonly clock: Clock;
  private readonly startTimes = new Map<string, number>();
  private readonly durations = new Map<string, number>();

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Starts timing for a step.
   * If the step was already started, this restarts the timer.
   */
  start(stepId: string): void {
    this.startTimes.set(stepId, this.clock.now());
  }

  /**
   * Ends timing for a step and records the duration.
   * If the step was never started, duration will be 0.
   *
   * @returns The duration in milliseconds
   */
  end(stepId: string): number {
    const startTime = this.startTimes.get(stepId);
    // startTime of 0 is valid
    const duration = startTime !== undefined ? Math.max(0, this.clock.now() - startTime) : 0;
    this.durations.set(stepId, duration);
    this.startTimes.delete(stepId);
    return duration;
  }

  /**
   * Returns 0 if the step hasn't been timed yet.
   */
  getDuration(stepId: string): number {
    return this.durations.get(stepId) ?? 0;
  }

  /**
   * All recorded durations, in the order the steps ended.
   */
  getDurations(): Record<string, number> {
    return Object.fromEntries(this.durations);
  }

  getTotalDuration(): number {
    let total = 0;
    for (const duration of this.durations.values()) {
      total += duration;
    }
    return total;
  }

  isRunning(stepId: string): boolean {
    return this.startTimes.has(stepId);
  }

  isCompleted(stepId: string): boolean {
    return this.durations.has(stepId);
  }
}
