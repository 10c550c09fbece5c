/**
 * Trend Ideas Agent
 *
 * Finds content opportunities for the topic: angles people are searching for right
 * now, keywords worth targeting and the format most likely to rank.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { createPromptAgent, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';
import { ContentBriefSchema } from './user-input';

export const TrendIdeasSchema = z.object({
  contentOpportunities: z.array(z.string().min(1)).min(1),
  trendingAngles: z.array(z.string().min(1)).default([]),
  targetKeywords: z.array(z.string().min(1)).default([]),
  recommendedFormat: z.string().min(1).default('blog post'),
});

export type TrendIdeas = z.infer<typeof TrendIdeasSchema>;

function buildSystemPrompt(): string {
  return `You are a content strategist who spots search trends before they peak.

Given a topic and a content brief, identify what readers are actively looking for and where
existing coverage leaves gaps.

Respond with JSON only:
{
  "contentOpportunities": ["specific article ideas that fill a gap"],
  "trendingAngles": ["angles gaining search interest"],
  "targetKeywords": ["keywords worth targeting"],
  "recommendedFormat": "the format most likely to rank (e.g. how-to guide, listicle)"
}`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const brief = readStepOutput(state, STEP_IDS.USER_INPUT, ContentBriefSchema);

  return `Topic: "${state.topic}"
Audience: ${brief?.targetAudience ?? 'general audience'}
Content type: ${brief?.contentType ?? 'blog post'}

List up to ${AGENT_CONFIG.PROMPT_LIST_LIMIT} items per field.`;
}

export function createTrendIdeasStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.TREND_IDEAS,
      taskKey: 'TREND_IDEAS',
      temperature: AGENT_CONFIG.TEMPERATURES.TREND_IDEAS,
      schema: TrendIdeasSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) =>
        `${output.contentOpportunities.length} opportunities, ${output.trendingAngles.length} trending angles`,
    },
    deps
  );
}
