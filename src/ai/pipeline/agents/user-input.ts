/**
 * User Input Agent
 *
 * Deterministic first step: turns the topic and caller-supplied preferences into the
 * content brief every later agent reads. Makes no language-model call.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import type { PipelineStep } from '../types';
import { STEP_IDS } from './step-ids';

export const ContentBriefSchema = z.object({
  topic: z.string().min(1),
  targetWordCount: z.number().int().positive(),
  tone: z.string().min(1),
  targetAudience: z.string().min(1),
  contentType: z.string().min(1),
  callToAction: z.string(),
  brandVoice: z.string().min(1),
});

export type ContentBrief = z.infer<typeof ContentBriefSchema>;

/**
 * Brief fields the caller may override. The topic always comes from the run.
 */
export type ContentBriefOverrides = Partial<Omit<ContentBrief, 'topic'>>;

function clampWordCount(value: number): number {
  return Math.min(
    AGENT_CONFIG.MAX_TARGET_WORD_COUNT,
    Math.max(AGENT_CONFIG.MIN_TARGET_WORD_COUNT, Math.round(value))
  );
}

/**
 * Builds the brief for `topic`, applying overrides on top of the defaults.
 * Blank string overrides are ignored; the word count is clamped to the configured range.
 *
 * @example
 * buildContentBrief('Sourdough baking', { tone: 'friendly' }).targetAudience
 * // → "general audience interested in Sourdough baking"
 */
export function buildContentBrief(topic: string, overrides: ContentBriefOverrides = {}): ContentBrief {
  const pick = (value: string | undefined, fallback: string): string =>
    value !== undefined && value.trim().length > 0 ? value.trim() : fallback;

  return {
    topic,
    targetWordCount: clampWordCount(overrides.targetWordCount ?? AGENT_CONFIG.DEFAULT_TARGET_WORD_COUNT),
    tone: pick(overrides.tone, 'professional'),
    targetAudience: pick(overrides.targetAudience, `general audience interested in ${topic}`),
    contentType: pick(overrides.contentType, 'informational blog post'),
    callToAction: overrides.callToAction?.trim() ?? 'Subscribe for more content',
    brandVoice: pick(overrides.brandVoice, 'informative and engaging'),
  };
}

export function createUserInputStep(overrides: ContentBriefOverrides = {}): PipelineStep {
  return {
    id: STEP_IDS.USER_INPUT,
    async run(state, context) {
      const brief = buildContentBrief(state.topic, overrides);
      context.logger.info(`Brief: ${brief.contentType}, ${brief.targetWordCount} words, ${brief.tone} tone`);
      return brief;
    },
  };
}
