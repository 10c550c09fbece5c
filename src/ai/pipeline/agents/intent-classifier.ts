/**
 * Intent Classifier Agent
 *
 * Classifies the primary search intent behind the topic. Later agents shape the
 * outline, the draft and the metadata around it.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { createPromptAgent, formatList, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';
import { TrendIdeasSchema } from './trend-ideas';

export const SEARCH_INTENTS = [
  'Informational',
  'Commercial Investigation',
  'Transactional',
  'Navigational',
  'How-To',
] as const;

export type SearchIntent = (typeof SEARCH_INTENTS)[number];

/**
 * Maps loose model spellings onto the canonical labels.
 *
 * @example
 * normalizeIntent('how-to / instructional') // → "How-To"
 * normalizeIntent('commercial_investigation') // → "Commercial Investigation"
 */
export function normalizeIntent(value: string): string {
  const compact = value.toLowerCase().replace(/[^a-z]/g, '');
  const match = SEARCH_INTENTS.find((intent) => compact.startsWith(intent.toLowerCase().replace(/[^a-z]/g, '')));
  return match ?? value;
}

export const IntentClassificationSchema = z.object({
  intent: z.string().transform(normalizeIntent).pipe(z.enum(SEARCH_INTENTS)),
  justification: z.string().default(''),
});

export type IntentClassification = z.infer<typeof IntentClassificationSchema>;

function buildSystemPrompt(): string {
  return `You are an SEO analyst. Classify the primary search intent for a topic.

Pick exactly ONE of:
- "Informational": the reader wants to know something ("what is photosynthesis")
- "Commercial Investigation": the reader compares products or services ("best running shoes")
- "Transactional": the reader wants to buy now ("buy trail running shoes")
- "Navigational": the reader wants a specific site ("nasa website")
- "How-To": the reader wants to learn a task ("how to tie a tie")

Respond with JSON only: { "intent": "<one label>", "justification": "<one or two sentences>" }`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const trends = readStepOutput(state, STEP_IDS.TREND_IDEAS, TrendIdeasSchema);

  return `Topic: "${state.topic}"

Trending angles:
${formatList(trends?.trendingAngles, AGENT_CONFIG.PROMPT_LIST_LIMIT)}`;
}

export function createIntentClassifierStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.INTENT_CLASSIFIER,
      taskKey: 'INTENT_CLASSIFIER',
      temperature: AGENT_CONFIG.TEMPERATURES.INTENT_CLASSIFIER,
      schema: IntentClassificationSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) => `Intent: ${output.intent}`,
    },
    deps
  );
}
