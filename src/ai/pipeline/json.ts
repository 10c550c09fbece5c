/**
 * JSON Utilities
 *
 * Validation of JSON-compatible values and extraction of JSON payloads
 * from free-form language-model replies.
 */

import { z } from 'zod';

import type { JsonObject, JsonValue } from './types';

// ============================================================================
// Schemas
// ============================================================================

const JsonPrimitiveSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

/**
 * Accepts exactly the values that survive a JSON round trip:
 * no undefined, NaN, Infinity, functions, dates, maps or sets.
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonPrimitiveSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

/** Dotted path to the first object that contains itself, or null. */
function findCircularPath(value: unknown, ancestors: object[] = [], path = '(root)'): string | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  if (ancestors.includes(value)) {
    return path;
  }
  ancestors.push(value);
  for (const [key, child] of Object.entries(value)) {
    const found = findCircularPath(child, ancestors, path === '(root)' ? key : `${path}.${key}`);
    if (found) return found;
  }
  ancestors.pop();
  return null;
}

/**
 * Checks that a value is JSON-compatible. Never throws: circular references and
 * accessors that throw while being read are reported as a reason.
 *
 * @returns The validated value, or a readable reason when it is not
 */
export function validateJsonValue(
  value: unknown
): { readonly ok: true; readonly value: JsonValue } | { readonly ok: false; readonly reason: string } {
  if (value === undefined) {
    return { ok: false, reason: 'value is undefined' };
  }
  try {
    const circularAt = findCircularPath(value);
    if (circularAt) {
      return { ok: false, reason: `circular reference at ${circularAt}` };
    }
    const result = JsonValueSchema.safeParse(value);
    if (result.success) {
      return { ok: true, value: result.data };
    }
    return { ok: false, reason: formatZodIssues(result.error) };
  } catch (error) {
    return { ok: false, reason: `value could not be read: ${error instanceof Error ? error.message : String(error)}` };
  }
}

/**
 * True for values that carry no content: null, a blank string, [] and {}.
 * A terminal step must not deliver one of these.
 */
export function isEmptyOutput(value: JsonValue): boolean {
  if (value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return typeof value === 'object' && Object.keys(value).length === 0;
}

/**
 * Flattens zod issues into one line: "path: message; path: message".
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// ============================================================================
// Extraction
// ============================================================================

const FENCED_JSON_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Extracts and parses the JSON payload of a model reply.
 *
 * Tries, in order: a fenced ```json block, the whole reply, and the span from the
 * first `{` to the last `}`.
 *
 * @returns The parsed value, or undefined when no candidate parses
 *
 * @example
 * extractJsonPayload('Here you go:\n```json\n{"intent":"Informational"}\n```')
 * // → { intent: 'Informational' }
 */
export function extractJsonPayload(text: string): JsonValue | undefined {
  const candidates: string[] = [];

  const fenced = FENCED_JSON_PATTERN.exec(text);
  if (fenced?.[1]) {
    candidates.push(fenced[1]);
  }

  candidates.push(text);

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = tryParseJson(candidate.trim());
    if (parsed !== undefined) {
      return parsed;
    }
  }
  return undefined;
}

function tryParseJson(text: string): JsonValue | undefined {
  if (text.length === 0) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  const validated = JsonValueSchema.safeParse(parsed);
  return validated.success ? validated.data : undefined;
}

/**
 * Cuts a value's JSON rendering to `maxChars` for embedding in a prompt.
 */
export function truncateJson(value: JsonValue | undefined, maxChars: number): string {
  if (value === undefined) return 'n/a';
  const text = JSON.stringify(value, null, 2);
  return text.length > maxChars ? `${text.slice(0, maxChars)}\n[... truncated ...]` : text;
}
