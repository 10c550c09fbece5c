/**
 * Draft Writer Agent
 *
 * Writes the article from the outline: introduction, one body per outline section,
 * conclusion and an FAQ built from the question keywords.
 */

import { z } from 'zod';

import { AGENT_CONFIG } from '../config';
import { truncateJson } from '../json';
import type { PipelineStep, RunStateSnapshot } from '../types';
import { KeywordSetSchema } from './keyword-mining';
import { OutlineSchema } from './outline-generator';
import { createPromptAgent, formatList, readStepOutput, type AgentDeps } from './prompt-agent';
import { STEP_IDS } from './step-ids';
import { ContentBriefSchema } from './user-input';

export const DraftSchema = z.object({
  title: z.string().min(1),
  introduction: z.string().min(1),
  sections: z
    .array(
      z.object({
        heading: z.string().min(1),
        content: z.string().min(1),
      })
    )
    .min(1),
  conclusion: z.string().default(''),
  faq: z
    .array(
      z.object({
        question: z.string().min(1),
        answer: z.string().min(1),
      })
    )
    .default([]),
});

export type Draft = z.infer<typeof DraftSchema>;

function buildSystemPrompt(): string {
  return `You are a senior writer producing publish-quality web articles.

Write in markdown inside the JSON string values (paragraphs, lists, **bold**). Do not repeat
the section heading inside its content. Use keywords naturally; never stuff them.

Respond with JSON only:
{
  "title": "",
  "introduction": "",
  "sections": [{ "heading": "", "content": "" }],
  "conclusion": "",
  "faq": [{ "question": "", "answer": "" }]
}`;
}

function buildUserPrompt(state: RunStateSnapshot): string {
  const brief = readStepOutput(state, STEP_IDS.USER_INPUT, ContentBriefSchema);
  const keywords = readStepOutput(state, STEP_IDS.KEYWORD_MINING, KeywordSetSchema);
  const outline = readStepOutput(state, STEP_IDS.OUTLINE_GENERATOR, OutlineSchema);
  const wordCount = brief?.targetWordCount ?? AGENT_CONFIG.DEFAULT_TARGET_WORD_COUNT;

  const outlineSection = outline
    ? `=== OUTLINE ===\n${truncateJson(outline, AGENT_CONFIG.PROMPT_CONTEXT_MAX_CHARS)}`
    : '=== OUTLINE ===\nNo outline available. Choose a logical structure of 4-6 sections.';

  return `Write an article about "${state.topic}".

Tone: ${brief?.tone ?? 'professional'}
Brand voice: ${brief?.brandVoice ?? 'informative and engaging'}
Audience: ${brief?.targetAudience ?? 'general audience'}
Target length: ~${wordCount} words
Call to action for the conclusion: ${brief?.callToAction || 'none'}

${outlineSection}

=== KEYWORDS ===
${formatList(keywords?.primaryKeywords, AGENT_CONFIG.PROMPT_LIST_LIMIT)}

=== FAQ QUESTIONS ===
${formatList(keywords?.questionKeywords, AGENT_CONFIG.PROMPT_LIST_LIMIT)}`;
}

export function createDraftWriterStep(deps: AgentDeps): PipelineStep {
  return createPromptAgent(
    {
      id: STEP_IDS.DRAFT_WRITER,
      taskKey: 'DRAFT_WRITER',
      temperature: AGENT_CONFIG.TEMPERATURES.DRAFT_WRITER,
      schema: DraftSchema,
      buildSystemPrompt,
      buildUserPrompt,
      summarize: (output) => `Draft "${output.title}": ${output.sections.length} sections, ${output.faq.length} FAQ`,
    },
    deps
  );
}

/**
 * Renders a draft as a single markdown document (H1 title, H2 sections, FAQ as H3s).
 */
export function renderDraftMarkdown(draft: Draft): string {
  const blocks: string[] = [`# ${draft.title.trim()}`, draft.introduction.trim()];

  for (const section of draft.sections) {
    blocks.push(`## ${section.heading.trim()}`, section.content.trim());
  }

  if (draft.conclusion.trim()) {
    blocks.push('## Conclusion', draft.conclusion.trim());
  }

  if (draft.faq.length > 0) {
    blocks.push('## Frequently Asked Questions');
    for (const item of draft.faq) {
      blocks.push(`### ${item.question.trim()}`, item.answer.trim());
    }
  }

  return `${blocks.join('\n\n')}\n`;
}
