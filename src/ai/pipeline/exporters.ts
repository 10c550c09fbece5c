/**
 * Exporters
 *
 * Turns a finished run into files: the serialized RunState as a JSON report and,
 * when the run produced an article, the article as markdown with front matter.
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';

import { createPrefixedLogger } from '../../utils/logger';
import { truncatedSlug } from '../../utils/slug';
import { FinalArticleSchema, type FinalArticle } from './agents/final-assembly';
import { PIPELINE_CONFIG } from './config';
import { formatFileTimestamp } from './result-cache';
import { serializeRunState } from './run-state';
import type { RunStateSnapshot } from './types';

const log = createPrefixedLogger('[Export]');

export interface RunArtifacts {
  readonly reportPath: string;
  /** Null when the run has no final article */
  readonly articlePath: string | null;
}

/**
 * Renders the article as markdown with YAML front matter.
 * String values are JSON-quoted, which YAML reads as double-quoted scalars.
 *
 * @example
 * renderArticleMarkdown(article).split('\n')[1] // → 'title: "Sourdough Baking for Beginners"'
 */
export function renderArticleMarkdown(article: FinalArticle): string {
  const frontMatter = [
    '---',
    `title: ${JSON.stringify(article.title)}`,
    `description: ${JSON.stringify(article.metaDescription)}`,
    `slug: ${JSON.stringify(article.slug)}`,
    `tags: ${JSON.stringify(article.tags)}`,
    `focusKeyword: ${JSON.stringify(article.focusKeyword)}`,
    `wordCount: ${article.wordCount}`,
    `readingTimeMinutes: ${article.readingTimeMinutes}`,
    '---',
  ].join('\n');

  return `${frontMatter}\n\n${article.markdown.trim()}\n`;
}

/**
 * Base name shared by a run's exported files: `<topic-slug>_<YYYYMMDD_HHMMSS_mmm>`.
 */
export function buildArtifactBaseName(state: RunStateSnapshot): string {
  const topicSlug = truncatedSlug(state.topic, PIPELINE_CONFIG.TOPIC_SLUG_MAX_LENGTH, 'topic');
  return `${topicSlug}_${formatFileTimestamp(state.endedAt ?? state.startedAt)}`;
}

/**
 * Writes `<base>_run.json` and, for a completed run whose final output is an article,
 * `<base>.md` into `directory` (created if needed).
 */
export async function writeRunArtifacts(state: RunStateSnapshot, directory: string): Promise<RunArtifacts> {
  await mkdir(directory, { recursive: true });
  const baseName = buildArtifactBaseName(state);

  const reportPath = path.join(directory, `${baseName}_run.json`);
  await writeFile(reportPath, `${JSON.stringify(serializeRunState(state), null, 2)}\n`, 'utf8');
  log.info(`Run report written to ${reportPath}`);

  const article = state.status === 'completed' ? FinalArticleSchema.safeParse(state.finalOutput) : undefined;
  if (!article?.success) {
    return { reportPath, articlePath: null };
  }

  const articlePath = path.join(directory, `${baseName}.md`);
  await writeFile(articlePath, renderArticleMarkdown(article.data), 'utf8');
  log.info(`Article written to ${articlePath}`);
  return { reportPath, articlePath };
}
