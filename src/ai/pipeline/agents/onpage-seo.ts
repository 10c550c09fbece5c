/**
 * On-Page SEO Agent
 *
 * Generates the search metadata for the finished draft: title tag, meta description,
 * URL slug, focus keyword and tags. Model output is normalized to the length and
 * format limits in SEO_CONSTRAINTS rather than rejected.
 */

import { z } from 'zod';

import { slugify } from '../../../utils/slug';
import { AGENT_CONFIG, SEO_CONSTRAINTS } from '../config';
import { clipAtWordBoundary } from '../markdown-utils';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { DraftSchema } from './draft-writer';
import { IntentClassificationSchema } from './intent-classifier';
import { KeywordSetSchema } from './keyword-mining';
import { createPromptAgent, formatList, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';

/**
 * Slugifies, drops empties and duplicates, and caps the tag count.
 *
 * @example
 * normalizeTags(['Sourdough', 'sourdough', 'Bread Baking', '']) // → ['sourdough', 'bread-baking']
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const unique = new Set(tags.map((tag) => slugify(tag)).filter((tag) => tag.length > 0));
  return [...unique].slice(0, SEO_CONSTRAINTS.MAX_TAGS);
}

export const SeoMetadataSchema = z.object({
  titleTag: z
    .string()
    .min(1)
    .transform((value) => clipAtWordBoundary(value, SEO_CONSTRAINTS.TITLE_TAG_MAX_LENGTH)),
  metaDescription: z
    .string()
    .min(1)
    .transform((value) => clipAtWordBoundary(value, SEO_CONSTRAINTS.META_DESCRIPTION_MAX_LENGTH)),
  urlSlug: z.string().default('').transform((value) => slugify(value)),
  focusKeyword: z.string().min(1).transform((value) => value.trim()),
  tags: z.array(z.string()).default([]).transform(normalizeTags),
});

export type SeoMetadata = z.infer<typeof SeoMetadataSchema>;

function buildSystemPrompt(): string {
  return `You are an SEO specialist writing on-page metadata for an article that is already written.

Requirements:
- titleTag: at most ${SEO_CONSTRAINTS.TITLE_TAG_MAX_LENGTH} characters, focus keyword near the start
- metaDescription: ${SEO_CONSTRAINTS.META_DESCRIPTION_MIN_LENGTH}-${SEO_CONSTRAINTS.META_DESCRIPTION_MAX_LENGTH} characters, ends with a reason to click
- urlSlug: lowercase words separated by hyphens, no stop words
- focusKeyword: the single phrase the article should rank for
- tags: ${SEO_CONSTRAINTS.MIN_TAGS}-${SEO_CONSTRAINTS.MAX_TAGS} lowercase topic tags

Respond with JSON only:
{ "titleTag": "", "metaDescription": "", "urlSlug": "", "focusKeyword": "", "tags": [] }`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const draft = readStepOutput(state, STEP_IDS.DRAFT_WRITER, DraftSchema);
  const keywords = readStepOutput(state, STEP_IDS.KEYWORD_MINING, KeywordSetSchema);
  const intent = readStepOutput(state, STEP_IDS.INTENT_CLASSIFIER, IntentClassificationSchema);

  const headings = draft?.sections.map((section) => section.heading);
  const introduction = draft
    ? clipAtWordBoundary(draft.introduction, AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS)
    : '(no draft available)';

  return `Topic: "${state.topic}"
Search intent: ${intent?.intent ?? 'unknown'}
Article title: ${draft?.title ?? state.topic}

Introduction:
${introduction}

Section headings:
${formatList(headings, AGENT_CONFIG.PROMPT_LIST_LIMIT)}

Primary keywords:
${formatList(keywords?.primaryKeywords, AGENT_CONFIG.PROMPT_LIST_LIMIT)}`;
}

export function createOnPageSeoStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.ONPAGE_SEO,
      taskKey: 'ONPAGE_SEO',
      temperature: AGENT_CONFIG.TEMPERATURES.ONPAGE_SEO,
      schema: SeoMetadataSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) => `Title tag "${output.titleTag}" (${output.titleTag.length} chars), ${output.tags.length} tags`,
    },
    deps
  );
}
