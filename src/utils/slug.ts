/**
 * URL Slug Generation Utility
 *
 * Single source of truth for URL-safe slugs: article slugs, cache file names
 * and exported artifact names all go through here.
 */

/**
 * Generate a URL-safe slug from a string.
 *
 * Transformations:
 * 1. Lowercase the string
 * 2. Normalize Unicode and remove diacritics (é → e, ñ → n)
 * 3. Replace non-alphanumeric characters with hyphens
 * 4. Remove leading/trailing hyphens
 *
 * @param value - The string to slugify (e.g., topic, title)
 * @returns URL-safe slug
 *
 * @example
 * slugify("Remote Work: Tips & Tools for 2025")
 * // → "remote-work-tips-tools-for-2025"
 *
 * @example
 * slugify("Café culture")
 * // → "cafe-culture"
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
    .replace(/[^a-z0-9]+/g, '-')     // Replace non-alphanumeric with hyphens
    .replace(/^-|-$/g, '');          // Remove leading/trailing hyphens
}

/**
 * Slugify and cap the length, never ending on a hyphen.
 * Falls back to `fallback` when nothing slug-worthy is left.
 *
 * @example
 * truncatedSlug('The Complete Guide to Sourdough Baking', 20) // → "the-complete-guide-t"
 * truncatedSlug('!!!', 20)                                    // → "untitled"
 */
export function truncatedSlug(value: string, maxLength: number, fallback = 'untitled'): string {
  const slug = slugify(value).slice(0, maxLength).replace(/-+$/, '');
  return slug.length > 0 ? slug : fallback;
}
