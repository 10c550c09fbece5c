/**
 * Outline Generator Agent
 *
 * Plans the article structure: a working title and the H2 sections, each with the
 * points to cover and the keywords it should carry.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { IntentClassificationSchema } from './intent-classifier';
import { KeywordSetSchema } from './keyword-mining';
import { createPromptAgent, formatList, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';
import { ContentBriefSchema } from './user-input';

const OutlineSectionSchema = z.object({
  heading: z.string().min(1),
  subPoints: z.array(z.string().min(1)).default([]),
  keywords: z.array(z.string().min(1)).default([]),
});

export const OutlineSchema = z.object({
  title: z.string().min(1),
  sections: z.array(OutlineSectionSchema).min(1),
  estimatedWordCount: z.number().int().positive().nullable().default(null),
});

export type Outline = z.infer<typeof OutlineSchema>;

function buildSystemPrompt(): string {
  return `You are an editor planning a long-form article.

Produce an outline that answers the reader's intent in a logical order. Every section needs a
clear H2 heading, the points it covers and the keywords it should use naturally.
Do not include an introduction or conclusion section; those are written separately.

Respond with JSON only:
{
  "title": "working title",
  "sections": [{ "heading": "", "subPoints": [], "keywords": [] }],
  "estimatedWordCount": 2000
}`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const brief = readStepOutput(state, STEP_IDS.USER_INPUT, ContentBriefSchema);
  const intent = readStepOutput(state, STEP_IDS.INTENT_CLASSIFIER, IntentClassificationSchema);
  const keywords = readStepOutput(state, STEP_IDS.KEYWORD_MINING, KeywordSetSchema);
  const wordCount = brief?.targetWordCount ?? AGENT_CONFIG.DEFAULT_TARGET_WORD_COUNT;

  return `Topic: "${state.topic}"
Search intent: ${intent?.intent ?? 'unknown'}
Target length: ~${wordCount} words
Audience: ${brief?.targetAudience ?? 'general audience'}

Primary keywords:
${formatList(keywords?.primaryKeywords, AGENT_CONFIG.PROMPT_LIST_LIMIT)}

Questions to answer:
${formatList(keywords?.questionKeywords, AGENT_CONFIG.PROMPT_LIST_LIMIT)}`;
}

export function createOutlineGeneratorStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.OUTLINE_GENERATOR,
      taskKey: 'OUTLINE_GENERATOR',
      temperature: AGENT_CONFIG.TEMPERATURES.OUTLINE_GENERATOR,
      schema: OutlineSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) => `Outline "${output.title}" with ${output.sections.length} sections`,
    },
    deps
  );
}
