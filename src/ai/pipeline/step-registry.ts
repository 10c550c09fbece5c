/**
 * Step Registry
 *
 * Explicit identifier → factory table used by the orchestrator to resolve the
 * configured step sequence. Steps are data-configured: a sequence is just a list
 * of ids, and only ids registered here can run.
 */

import { ConfigurationError, toError, type PipelineStep, type StepFactory, type StepResolver } from './types';

/**
 * @example
 * const registry = new StepRegistry()
 *   .register('user-input', () => createUserInputStep())
 *   .register('draft-writer', () => createDraftWriterStep({ generator }));
 *
 * const step = registry.resolve('draft-writer');
 */
export class StepRegistry implements StepResolver {
  private readonly factories = new Map<string, StepFactory>();

  /**
   * Registers a factory under `stepId`.
   *
   * @throws ConfigurationError when the id is empty or already registered
   */
  register(stepId: string, factory: StepFactory): this {
    if (stepId.trim().length === 0) {
      throw new ConfigurationError(null, 'Step id must be a non-empty string');
    }
    if (this.factories.has(stepId)) {
      throw new ConfigurationError(stepId, `Step "${stepId}" is already registered`);
    }
    this.factories.set(stepId, factory);
    return this;
  }

  has(stepId: string): boolean {
    return this.factories.has(stepId);
  }

  /**
   * Registered ids, in registration order.
   */
  ids(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Builds a fresh step instance for `stepId`.
   *
   * @throws ConfigurationError when the id is unknown, the factory throws,
   *   or the built step reports a different id
   */
  resolve(stepId: string): PipelineStep {
    const factory = this.factories.get(stepId);
    if (!factory) {
      throw new ConfigurationError(stepId, `Unknown step "${stepId}"`);
    }

    let step: PipelineStep;
    try {
      step = factory();
    } catch (error) {
      const cause = toError(error);
      throw new ConfigurationError(stepId, `Failed to build step "${stepId}": ${cause.message}`, cause);
    }

    if (step.id !== stepId) {
      throw new ConfigurationError(stepId, `Factory for "${stepId}" produced a step with id "${step.id}"`);
    }
    return step;
  }
}
