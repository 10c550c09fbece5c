/**
 * Content Step Registry
 *
 * Wires the eleven content agents into a StepRegistry with their shared dependencies.
 */

import type { AITaskKey } from '../../config';
import type { TextGenerator } from '../../service';
import { withStepTimeout } from '../step-decorators';
import { StepRegistry } from '../step-registry';
import type { PipelineStep } from '../types';
import { createDraftWriterStep } from './draft-writer';
import { createFinalAssemblyStep } from './final-assembly';
import { createIntentClassifierStep } from './intent-classifier';
import { createKeywordMiningStep } from './keyword-mining';
import { createOnPageSeoStep } from './onpage-seo';
import { createOutlineGeneratorStep } from './outline-generator';
import type { AgentDeps } from './prompt-agent';
import { createQaValidationStep } from './qa-validation';
import { createReadabilityStep } from './readability';
import { STEP_IDS } from './step-ids';
import { createToneCheckStep } from './tone-check';
import { createTrendIdeasStep } from './trend-ideas';
import { createUserInputStep, type ContentBriefOverrides } from './user-input';

export interface ContentAgentDeps {
  readonly generator: TextGenerator;
  /** Overrides for the deterministic content brief */
  readonly brief?: ContentBriefOverrides;
  /** Per-agent model overrides (default: getModel) */
  readonly models?: Partial<Record<AITaskKey, string>>;
  /** Per-agent temperature overrides (default: AGENT_CONFIG.TEMPERATURES) */
  readonly temperatures?: Partial<Record<AITaskKey, number>>;
  /** Per-invocation timeout for language-model agents; 0 or omitted disables it */
  readonly stepTimeoutMs?: number;
}

/**
 * Builds the registry for DEFAULT_STEP_SEQUENCE.
 *
 * @example
 * const registry = createContentStepRegistry({ generator: createOpenRouterTextGenerator() });
 * const orchestrator = new Orchestrator({ resolver: registry });
 */
export function createContentStepRegistry(deps: ContentAgentDeps): StepRegistry {
  const agentDeps = (taskKey: AITaskKey): AgentDeps => ({
    generator: deps.generator,
    model: deps.models?.[taskKey],
    temperature: deps.temperatures?.[taskKey],
  });
  const timed = (step: PipelineStep): PipelineStep => withStepTimeout(step, deps.stepTimeoutMs ?? 0);

  return new StepRegistry()
    .register(STEP_IDS.USER_INPUT, () => createUserInputStep(deps.brief))
    .register(STEP_IDS.TREND_IDEAS, () => timed(createTrendIdeasStep(agentDeps('TREND_IDEAS'))))
    .register(STEP_IDS.INTENT_CLASSIFIER, () => timed(createIntentClassifierStep(agentDeps('INTENT_CLASSIFIER'))))
    .register(STEP_IDS.KEYWORD_MINING, () => timed(createKeywordMiningStep(agentDeps('KEYWORD_MINING'))))
    .register(STEP_IDS.OUTLINE_GENERATOR, () => timed(createOutlineGeneratorStep(agentDeps('OUTLINE_GENERATOR'))))
    .register(STEP_IDS.DRAFT_WRITER, () => timed(createDraftWriterStep(agentDeps('DRAFT_WRITER'))))
    .register(STEP_IDS.TONE_CHECK, () => timed(createToneCheckStep(agentDeps('TONE_CHECK'))))
    .register(STEP_IDS.READABILITY, () => timed(createReadabilityStep(agentDeps('READABILITY'))))
    .register(STEP_IDS.ONPAGE_SEO, () => timed(createOnPageSeoStep(agentDeps('ONPAGE_SEO'))))
    .register(STEP_IDS.QA_VALIDATION, () => timed(createQaValidationStep(agentDeps('QA_VALIDATION'))))
    .register(STEP_IDS.FINAL_ASSEMBLY, () => createFinalAssemblyStep());
}
