/**
 * Content Agents
 *
 * The steps of the default content pipeline:
 * - user-input: deterministic content brief
 * - trend-ideas, intent-classifier, keyword-mining: research
 * - outline-generator, draft-writer: writing
 * - tone-check, readability: review
 * - onpage-seo, qa-validation: metadata and sign-off
 * - final-assembly: terminal merge into the publishable article
 */

export { STEP_IDS, DEFAULT_STEP_SEQUENCE, type ContentStepId } from './step-ids';
export { createContentStepRegistry, type ContentAgentDeps } from './registry';
export { createPromptAgent, readStepOutput, type AgentDeps, type PromptAgentDefinition } from './prompt-agent';

export {
  createUserInputStep,
  buildContentBrief,
  ContentBriefSchema,
  type ContentBrief,
  type ContentBriefOverrides,
} from './user-input';
export { createTrendIdeasStep, TrendIdeasSchema, type TrendIdeas } from './trend-ideas';
export {
  createIntentClassifierStep,
  IntentClassificationSchema,
  SEARCH_INTENTS,
  normalizeIntent,
  type IntentClassification,
  type SearchIntent,
} from './intent-classifier';
export { createKeywordMiningStep, KeywordSetSchema, type KeywordSet } from './keyword-mining';
export { createOutlineGeneratorStep, OutlineSchema, type Outline } from './outline-generator';
export { createDraftWriterStep, DraftSchema, renderDraftMarkdown, type Draft } from './draft-writer';
export { createToneCheckStep, ToneReportSchema, TONE_MATCH_THRESHOLD, type ToneReport } from './tone-check';
export {
  createReadabilityStep,
  ReadabilityReportSchema,
  READABILITY_THRESHOLD,
  type ReadabilityReport,
} from './readability';
export { createOnPageSeoStep, SeoMetadataSchema, normalizeTags, type SeoMetadata } from './onpage-seo';
export { createQaValidationStep, QaReportSchema, type QaReport } from './qa-validation';
export { createFinalAssemblyStep, assembleArticle, FinalArticleSchema, type FinalArticle } from './final-assembly';
