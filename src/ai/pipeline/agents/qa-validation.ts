/**
 * QA Validation Agent
 *
 * Last review before assembly: checks the draft together with its SEO metadata and
 * decides whether the article can go out as is.
 */

import { z } from 'zod';

import { AGENT_CONFIG, SEO_CONSTRAINTS } from '../config';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { DraftSchema, renderDraftMarkdown } from './draft-writer';
import { SeoMetadataSchema } from './onpage-seo';
import { createPromptAgent, formatList, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';

export const QaReportSchema = z.object({
  qualityScore: z.number().min(0).max(10),
  grammarIssues: z.array(z.string().min(1)).default([]),
  seoCompliant: z.boolean(),
  improvements: z.array(z.string().min(1)).default([]),
  readyToPublish: z.boolean(),
});

export type QaReport = z.infer<typeof QaReportSchema>;

function buildSystemPrompt(): string {
  return `You are a quality assurance reviewer signing off articles before publication.

Check grammar and spelling, factual claims that need a source, and whether the metadata
follows the rules below. Set readyToPublish to false only for problems a reader would notice.

Metadata rules:
- title tag at most ${SEO_CONSTRAINTS.TITLE_TAG_MAX_LENGTH} characters
- meta description ${SEO_CONSTRAINTS.META_DESCRIPTION_MIN_LENGTH}-${SEO_CONSTRAINTS.META_DESCRIPTION_MAX_LENGTH} characters
- the focus keyword appears in the title tag and the first paragraph

Respond with JSON only:
{ "qualityScore": 0, "grammarIssues": [], "seoCompliant": true, "improvements": [], "readyToPublish": true }`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const draft = readStepOutput(state, STEP_IDS.DRAFT_WRITER, DraftSchema);
  const seo = readStepOutput(state, STEP_IDS.ONPAGE_SEO, SeoMetadataSchema);
  const markdown = draft ? renderDraftMarkdown(draft) : '(no draft available)';
  const preview =
    markdown.length > AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS
      ? `${markdown.slice(0, AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS)}\n\n[... article continues ...]`
      : markdown;

  const metadata = seo
    ? `Title tag: ${seo.titleTag}
Meta description: ${seo.metaDescription}
Focus keyword: ${seo.focusKeyword}
Tags:
${formatList(seo.tags, AGENT_CONFIG.PROMPT_LIST_LIMIT)}`
    : '(no SEO metadata available)';

  return `Topic: "${state.topic}"

=== METADATA ===
${metadata}

=== DRAFT ===
${preview}`;
}

export function createQaValidationStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.QA_VALIDATION,
      taskKey: 'QA_VALIDATION',
      temperature: AGENT_CONFIG.TEMPERATURES.QA_VALIDATION,
      schema: QaReportSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) =>
        `Quality ${output.qualityScore}/10, ${output.grammarIssues.length} grammar issue(s), ` +
        `ready to publish: ${output.readyToPublish}`,
    },
    deps
  );
}
