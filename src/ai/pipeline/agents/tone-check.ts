/**
 * Tone Check Agent
 *
 * Compares the draft's voice with the brief and scores the match. Suggestions are
 * reported, not applied; a low score surfaces as a warning on the final article.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { DraftSchema, renderDraftMarkdown } from './draft-writer';
import { createPromptAgent, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';
import { ContentBriefSchema } from './user-input';

/** Scores below this are flagged on the final article */
export const TONE_MATCH_THRESHOLD = 6;

export const ToneReportSchema = z.object({
  detectedTone: z.string().min(1),
  matchScore: z.number().min(0).max(10),
  adjustments: z.array(z.string().min(1)).default([]),
});

export type ToneReport = z.infer<typeof ToneReportSchema>;

function buildSystemPrompt(): string {
  return `You are a copy editor checking that an article sounds the way the brand wants it to.

Score how well the draft matches the requested tone from 0 (not at all) to 10 (perfectly) and
list concrete adjustments, quoting the passages they apply to.

Respond with JSON only:
{ "detectedTone": "", "matchScore": 0, "adjustments": [] }`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const brief = readStepOutput(state, STEP_IDS.USER_INPUT, ContentBriefSchema);
  const draft = readStepOutput(state, STEP_IDS.DRAFT_WRITER, DraftSchema);
  const markdown = draft ? renderDraftMarkdown(draft) : '(no draft available)';
  const preview =
    markdown.length > AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS
      ? `${markdown.slice(0, AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS)}\n\n[... article continues ...]`
      : markdown;

  return `Requested tone: ${brief?.tone ?? 'professional'}
Brand voice: ${brief?.brandVoice ?? 'informative and engaging'}
Audience: ${brief?.targetAudience ?? 'general audience'}

=== DRAFT ===
${preview}`;
}

export function createToneCheckStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.TONE_CHECK,
      taskKey: 'TONE_CHECK',
      temperature: AGENT_CONFIG.TEMPERATURES.TONE_CHECK,
      schema: ToneReportSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) => `Tone "${output.detectedTone}" scored ${output.matchScore}/10`,
    },
    deps
  );
}
