/**
 * Prompt Agent
 *
 * Shared machinery of every language-model step: build the prompts from the run state,
 * call the injected TextGenerator, pull the JSON payload out of the reply and validate
 * it. Individual agents only supply prompts and a schema.
 */

import type { z } from 'zod';

import { getModel, type AITaskKey } from '../../config';
import type { TextGenerator } from '../../service';
import { extractJsonPayload, formatZodIssues } from '../json';
import { StepExecutionError, toError, type JsonValue, type PipelineStep, type RunStateSnapshot } from '../types';

// ============================================================================
// Types
// ============================================================================

/**
 * Dependencies of a language-model agent.
 */
export interface AgentDeps {
  readonly generator: TextGenerator;
  /** Model override (default: getModel(taskKey)) */
  readonly model?: string;
  /** Temperature override (default: AGENT_CONFIG.TEMPERATURES) */
  readonly temperature?: number;
}

/**
 * What an agent contributes: its identity, its prompts and the shape of its output.
 */
export interface PromptAgentDefinition<T extends JsonValue> {
  readonly id: string;
  readonly taskKey: AITaskKey;
  readonly temperature: number;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  buildSystemPrompt(): string;
  buildUserPrompt(state: RunStateSnapshot): string;
  /** One-line description of the output for the log */
  summarize?(output: T): string;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Builds a PipelineStep from an agent definition.
 *
 * @example
 * const step = createPromptAgent(
 *   { id: 'tone-check', taskKey: 'TONE_CHECK', temperature: 0.2, schema, buildSystemPrompt, buildUserPrompt },
 *   { generator }
 * );
 */
export function createPromptAgent<T extends JsonValue>(
  definition: PromptAgentDefinition<T>,
  deps: AgentDeps
): PipelineStep {
  const { id, schema } = definition;

  return {
    id,
    async run(state, context) {
      const log = context.logger;
      const model = deps.model ?? getModel(definition.taskKey);
      const temperature = deps.temperature ?? definition.temperature;
      const system = definition.buildSystemPrompt();
      const prompt = definition.buildUserPrompt(state);

      log.info(`Calling ${model} (system: ${system.length} chars, prompt: ${prompt.length} chars)`);

      let reply: string;
      try {
        reply = await deps.generator.generate({ system, prompt, temperature, model });
      } catch (error) {
        const cause = toError(error);
        throw new StepExecutionError(id, `Language model call failed: ${cause.message}`, cause);
      }

      const payload = extractJsonPayload(reply);
      if (payload === undefined) {
        throw new StepExecutionError(id, `Model reply contained no JSON payload (${reply.length} chars)`);
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        throw new StepExecutionError(id, `Model reply did not match the expected shape: ${formatZodIssues(parsed.error)}`);
      }

      if (definition.summarize) {
        log.info(definition.summarize(parsed.data));
      }
      return parsed.data;
    },
  };
}

// ============================================================================
// Reading Earlier Outputs
// ============================================================================

/**
 * Reads another step's output through its schema.
 *
 * @returns The parsed output, or undefined when the step has no output or it does not
 *   match (e.g. the step failed, or was left out of the sequence)
 */
export function readStepOutput<T>(
  state: RunStateSnapshot,
  stepId: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  const raw = state.outputs[stepId];
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Formats a list for a prompt: bullet per item, capped at `limit`, or a placeholder.
 */
export function formatList(items: readonly string[] | undefined, limit: number, empty = '(none)'): string {
  if (!items || items.length === 0) return empty;
  return items
    .slice(0, limit)
    .map((item) => `- ${item}`)
    .join('\n');
}
