/**
 * Final Assembly Agent
 *
 * Terminal step. Merges the draft with the SEO metadata and the review results (tone,
 * readability, QA) into the publishable article. Deterministic: every field is derived
 * from earlier outputs, with fallbacks for the ones that are missing. Without a draft there is nothing to
 * publish, and the step fails.
 */

import { z } from 'zod';

import { truncatedSlug } from '../../../utils/slug';
import { AGENT_CONFIG, SEO_CONSTRAINTS } from '../config';
import { clipAtWordBoundary, countWords, estimateReadingMinutes, stripMarkdown } from '../markdown-utils';
import { StepExecutionError, type PipelineStep, type RunStateSnapshot } from '../types';
import { DraftSchema, renderDraftMarkdown } from './draft-writer';
import { IntentClassificationSchema, SEARCH_INTENTS } from './intent-classifier';
import { KeywordSetSchema } from './keyword-mining';
import { SeoMetadataSchema, normalizeTags } from './onpage-seo';
import { readStepOutput } from './prompt-agent';
import { QaReportSchema } from './qa-validation';
import { READABILITY_THRESHOLD, ReadabilityReportSchema } from './readability';
import { STEP_IDS } from './step-ids';
import { TONE_MATCH_THRESHOLD, ToneReportSchema } from './tone-check';

const ARTICLE_SLUG_MAX_LENGTH = 80;

export const FinalArticleSchema = z.object({
  title: z.string().min(1),
  titleTag: z.string().min(1),
  metaDescription: z.string(),
  slug: z.string().min(1),
  markdown: z.string().min(1),
  wordCount: z.number().int().nonnegative(),
  readingTimeMinutes: z.number().int().positive(),
  tags: z.array(z.string()),
  focusKeyword: z.string(),
  intent: z.enum(SEARCH_INTENTS).nullable(),
  toneScore: z.number().nullable(),
  readabilityScore: z.number().nullable(),
  qualityScore: z.number().nullable(),
  publishReady: z.boolean(),
  warnings: z.array(z.string()),
});

export type FinalArticle = z.infer<typeof FinalArticleSchema>;

/**
 * Builds the final article from the outputs in `state`.
 *
 * @throws StepExecutionError when the run has no usable draft
 */
export function assembleArticle(state: RunStateSnapshot): FinalArticle {
  const draft = readStepOutput(state, STEP_IDS.DRAFT_WRITER, DraftSchema);
  if (!draft) {
    throw new StepExecutionError(STEP_IDS.FINAL_ASSEMBLY, 'No draft available to assemble');
  }

  const seo = readStepOutput(state, STEP_IDS.ONPAGE_SEO, SeoMetadataSchema);
  const keywords = readStepOutput(state, STEP_IDS.KEYWORD_MINING, KeywordSetSchema);
  const intent = readStepOutput(state, STEP_IDS.INTENT_CLASSIFIER, IntentClassificationSchema);
  const tone = readStepOutput(state, STEP_IDS.TONE_CHECK, ToneReportSchema);
  const readability = readStepOutput(state, STEP_IDS.READABILITY, ReadabilityReportSchema);
  const qa = readStepOutput(state, STEP_IDS.QA_VALIDATION, QaReportSchema);

  const warnings: string[] = Object.values(state.failedSteps).map(
    (failure) => `Step ${failure.stepId} failed: ${failure.message}`
  );
  if (!seo) {
    warnings.push('SEO metadata missing; derived from the draft');
  }
  if (tone && tone.matchScore < TONE_MATCH_THRESHOLD) {
    warnings.push(`Tone match ${tone.matchScore}/10 is below ${TONE_MATCH_THRESHOLD}`);
  }
  if (readability && readability.readabilityScore < READABILITY_THRESHOLD) {
    warnings.push(`Readability ${readability.readabilityScore}/10 is below ${READABILITY_THRESHOLD}`);
  }
  if (qa && !qa.readyToPublish) {
    warnings.push(`QA review: not ready to publish (${qa.grammarIssues.length} grammar issue(s))`);
  }
  if (qa && !qa.seoCompliant) {
    warnings.push('QA review: metadata does not meet the SEO rules');
  }

  const markdown = renderDraftMarkdown(draft);
  const wordCount = countWords(markdown);
  const title = draft.title.trim();
  const metaDescription =
    seo?.metaDescription || clipAtWordBoundary(stripMarkdown(draft.introduction), SEO_CONSTRAINTS.META_DESCRIPTION_MAX_LENGTH);
  const tags = seo && seo.tags.length > 0 ? seo.tags : normalizeTags(keywords?.primaryKeywords ?? []);

  if (metaDescription.length < SEO_CONSTRAINTS.META_DESCRIPTION_MIN_LENGTH) {
    warnings.push(
      `Meta description is ${metaDescription.length} chars (minimum ${SEO_CONSTRAINTS.META_DESCRIPTION_MIN_LENGTH})`
    );
  }
  if (tags.length < SEO_CONSTRAINTS.MIN_TAGS) {
    warnings.push(`Only ${tags.length} tag(s) (minimum ${SEO_CONSTRAINTS.MIN_TAGS})`);
  }

  return {
    title,
    titleTag: seo?.titleTag || clipAtWordBoundary(title, SEO_CONSTRAINTS.TITLE_TAG_MAX_LENGTH),
    metaDescription,
    slug: seo?.urlSlug || truncatedSlug(title, ARTICLE_SLUG_MAX_LENGTH, truncatedSlug(state.topic, ARTICLE_SLUG_MAX_LENGTH)),
    markdown,
    wordCount,
    readingTimeMinutes: estimateReadingMinutes(wordCount, AGENT_CONFIG.WORDS_PER_MINUTE),
    tags,
    focusKeyword: seo?.focusKeyword || keywords?.primaryKeywords[0] || state.topic,
    intent: intent?.intent ?? null,
    toneScore: tone?.matchScore ?? null,
    readabilityScore: readability?.readabilityScore ?? null,
    qualityScore: qa?.qualityScore ?? null,
    publishReady: warnings.length === 0,
    warnings,
  };
}

export function createFinalAssemblyStep(): PipelineStep {
  return {
    id: STEP_IDS.FINAL_ASSEMBLY,
    async run(state, context) {
      const article = assembleArticle(state);
      context.logger.info(
        `Assembled "${article.title}": ${article.wordCount} words, ` +
          `${article.warnings.length} warning(s), publish ready: ${article.publishReady}`
      );
      return article;
    },
  };
}
