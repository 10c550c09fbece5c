/**
 * Readability Agent
 *
 * Scores how easy the draft is to read and proposes sentence-level rewrites.
 * Like the tone check, it reports and does not edit; the score feeds the final
 * article's warnings.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import { countWords } from '../markdown-utils';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { DraftSchema, renderDraftMarkdown } from './draft-writer';
import { createPromptAgent, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';
import { ContentBriefSchema } from './user-input';

/** Scores below this are flagged on the final article */
export const READABILITY_THRESHOLD = 6;

export const ReadabilityReportSchema = z.object({
  readabilityScore: z.number().min(0).max(10),
  readingLevel: z.string().default(''),
  improvements: z.array(z.string().min(1)).default([]),
  sentenceRewrites: z.array(z.object({ original: z.string().min(1), improved: z.string().min(1) })).default([]),
});

export type ReadabilityReport = z.infer<typeof ReadabilityReportSchema>;

function buildSystemPrompt(): string {
  return `You are a readability editor. You judge how easily the intended audience can read an article.

Score readability from 0 (very hard) to 10 (effortless). Name the reading level, list the most
useful improvements and rewrite at most five sentences that are too long or too dense.

Respond with JSON only:
{ "readabilityScore": 0, "readingLevel": "", "improvements": [], "sentenceRewrites": [{ "original": "", "improved": "" }] }`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const brief = readStepOutput(state, STEP_IDS.USER_INPUT, ContentBriefSchema);
  const draft = readStepOutput(state, STEP_IDS.DRAFT_WRITER, DraftSchema);
  const markdown = draft ? renderDraftMarkdown(draft) : '(no draft available)';
  const preview =
    markdown.length > AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS
      ? `${markdown.slice(0, AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS)}\n\n[... article continues ...]`
      : markdown;

  return `Audience: ${brief?.targetAudience ?? 'general audience'}
Draft length: ${draft ? countWords(markdown) : 0} words

=== DRAFT ===
${preview}`;
}

export function createReadabilityStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.READABILITY,
      taskKey: 'READABILITY',
      temperature: AGENT_CONFIG.TEMPERATURES.READABILITY,
      schema: ReadabilityReportSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) =>
        `Readability ${output.readabilityScore}/10, ${output.sentenceRewrites.length} rewrite(s) suggested`,
    },
    deps
  );
}
