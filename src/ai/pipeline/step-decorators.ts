/**
 * Step Decorators
 *
 * Retry and timeout policies applied around a PipelineStep. The orchestrator itself
 * never retries or times out a step; callers opt in per step by wrapping it.
 */

import { withRetry, type RetryOptions } from './retry';
import { StepExecutionError, type PipelineStep } from './types';

/**
 * Retries the whole step invocation on retryable errors.
 * The wrapped step keeps the original id, so the orchestrator still sees one attempt.
 *
 * @example
 * registry.register('draft-writer', () =>
 *   withStepRetry(createDraftWriterStep({ generator }), { maxRetries: 2 })
 * );
 */
export function withStepRetry(step: PipelineStep, options: RetryOptions = {}): PipelineStep {
  return {
    id: step.id,
    run: (state, context) =>
      withRetry(() => step.run(state, context), {
        ...options,
        context: options.context ?? `step ${step.id}`,
      }),
  };
}

/**
 * Rejects with a StepExecutionError when the step has not settled after `timeoutMs`.
 * The underlying work is not preempted; its eventual result is ignored.
 *
 * A `timeoutMs` of 0 or less disables the timeout.
 */
export function withStepTimeout(step: PipelineStep, timeoutMs: number): PipelineStep {
  if (timeoutMs <= 0) {
    return step;
  }

  return {
    id: step.id,
    async run(state, context) {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          const cause = new Error(`Timed out after ${timeoutMs}ms`);
          cause.name = 'TimeoutError';
          reject(new StepExecutionError(step.id, `Step "${step.id}" timed out after ${timeoutMs}ms`, cause));
        }, timeoutMs);
      });

      try {
        return await Promise.race([step.run(state, context), timeoutPromise]);
      } finally {
        if (timeoutId) clearTimeout(timeoutId);
      }
    },
  };
}
