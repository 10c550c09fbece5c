/**
 * Markdown Utilities
 *
 * Small text helpers for assembling and measuring generated articles.
 */

/**
 * Counts words in markdown. Tokens without a letter or digit (`#`, `-`, `**`) are not words.
 *
 * @example
 * countWords('## Getting Started\n\n- Feed the **starter** daily') // → 6
 */
export function countWords(markdown: string): number {
  return markdown.split(/\s+/).filter((token) => /[\p{L}\p{N}]/u.test(token)).length;
}

/**
 * Estimated reading time in whole minutes, never less than 1.
 */
export function estimateReadingMinutes(wordCount: number, wordsPerMinute: number): number {
  return Math.max(1, Math.ceil(wordCount / wordsPerMinute));
}

/**
 * Collapses whitespace and cuts `text` to at most `maxLength` characters, preferring
 * to end on a word boundary. Adds no ellipsis.
 *
 * @example
 * clipAtWordBoundary('Feed your starter twice a day for best results', 20) // → "Feed your starter"
 */
export function clipAtWordBoundary(text: string, maxLength: number): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;

  const cut = normalized.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).replace(/[\s,;:.-]+$/, '');
}

/**
 * Removes markdown emphasis, links and headings so text can be used in metadata.
 *
 * @example
 * stripMarkdown('Use a **stiff** dough, see [the guide](https://example.com).')
 * // → "Use a stiff dough, see the guide."
 */
export function stripMarkdown(markdown: string): string {
  return markdown
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/(\*\*|__|\*|_|`)/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}
