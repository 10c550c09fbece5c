/**
 * Keyword Mining Agent
 *
 * Expands the topic into the keyword set the outline and draft are written against:
 * primary keywords, long-tail variations and the questions readers type into search.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { IntentClassificationSchema } from './intent-classifier';
import { createPromptAgent, formatList, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';
import { TrendIdeasSchema } from './trend-ideas';

export const KeywordSetSchema = z.object({
  primaryKeywords: z.array(z.string().min(1)).min(1),
  longTailKeywords: z.array(z.string().min(1)).default([]),
  questionKeywords: z.array(z.string().min(1)).default([]),
});

export type KeywordSet = z.infer<typeof KeywordSetSchema>;

function buildSystemPrompt(): string {
  return `You are a keyword researcher. Build the keyword set an article should target.

- primaryKeywords: 3-5 head terms, most important first
- longTailKeywords: specific multi-word variations with clear intent
- questionKeywords: questions readers actually search for

Respond with JSON only:
{ "primaryKeywords": [], "longTailKeywords": [], "questionKeywords": [] }`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const trends = readStepOutput(state, STEP_IDS.TREND_IDEAS, TrendIdeasSchema);
  const intent = readStepOutput(state, STEP_IDS.INTENT_CLASSIFIER, IntentClassificationSchema);

  return `Topic: "${state.topic}"
Search intent: ${intent?.intent ?? 'unknown'}

Seed keywords from trend research:
${formatList(trends?.targetKeywords, AGENT_CONFIG.PROMPT_LIST_LIMIT)}`;
}

export function createKeywordMiningStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.KEYWORD_MINING,
      taskKey: 'KEYWORD_MINING',
      temperature: AGENT_CONFIG.TEMPERATURES.KEYWORD_MINING,
      schema: KeywordSetSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) =>
        `${output.primaryKeywords.length} primary, ${output.longTailKeywords.length} long-tail, ` +
        `${output.questionKeywords.length} question keywords`,
    },
    deps
  );
}
