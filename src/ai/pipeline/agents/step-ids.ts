/**
 * Identifiers of the content-generation steps, in default execution order.
 */
export const STEP_IDS = {
  USER_INPUT: 'user-input',
  TREND_IDEAS: 'trend-ideas',
  INTENT_CLASSIFIER: 'intent-classifier',
  KEYWORD_MINING: 'keyword-mining',
  OUTLINE_GENERATOR: 'outline-generator',
  DRAFT_WRITER: 'draft-writer',
  TONE_CHECK: 'tone-check',
  READABILITY: 'readability',
  ONPAGE_SEO: 'onpage-seo',
  QA_VALIDATION: 'qa-validation',
  FINAL_ASSEMBLY: 'final-assembly',
} as const;

export type ContentStepId = (typeof STEP_IDS)[keyof typeof STEP_IDS];

/**
 * The full pipeline: brief → research → writing → review → assembly.
 * `final-assembly` is terminal; its output is the publishable article.
 */
export const DEFAULT_STEP_SEQUENCE: readonly ContentStepId[] = Object.freeze([
  STEP_IDS.USER_INPUT,
  STEP_IDS.TREND_IDEAS,
  STEP_IDS.INTENT_CLASSIFIER,
  STEP_IDS.KEYWORD_MINING,
  STEP_IDS.OUTLINE_GENERATOR,
  STEP_IDS.DRAFT_WRITER,
  STEP_IDS.TONE_CHECK,
  STEP_IDS.READABILITY,
  STEP_IDS.ONPAGE_SEO,
  STEP_IDS.QA_VALIDATION,
  STEP_IDS.FINAL_ASSEMBLY,
]);
