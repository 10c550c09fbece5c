import { describe, it, expect } from 'vitest';

import { extractJsonPayload, isEmptyOutput, truncateJson, validateJsonValue } from '../../../src/ai/pipeline/json';
import type { JsonValue } from '../../../src/ai/pipeline/types';

describe('validateJsonValue', () => {
  it('accepts JSON-compatible values', () => {
    expect(validateJsonValue({ a: [1, 'two', true, null], b: { c: -1.5 } })).toEqual({
      ok: true,
      value: { a: [1, 'two', true, null], b: { c: -1.5 } },
    });
    expect(validateJsonValue(null)).toEqual({ ok: true, value: null });
  });

  it('rejects undefined', () => {
    expect(validateJsonValue(undefined)).toEqual({ ok: false, reason: 'value is undefined' });
  });

  it.each([
    ['NaN', Number.NaN],
    ['Infinity', Number.POSITIVE_INFINITY],
    ['a function', () => 1],
    ['a Date', new Date(0)],
    ['a Map', new Map()],
    ['a nested undefined', { a: undefined }],
  ])('rejects %s', (_label, value) => {
    expect(validateJsonValue(value).ok).toBe(false);
  });

  it('reports a circular reference instead of overflowing the stack', () => {
    const looped: Record<string, unknown> = { x: 1 };
    looped.inner = { self: looped };

    expect(validateJsonValue(looped)).toEqual({ ok: false, reason: 'circular reference at inner.self' });
  });

  it('reports a getter that throws', () => {
    const value = {
      get boom(): string {
        throw new Error('getter exploded');
      },
    };

    expect(validateJsonValue(value)).toEqual({ ok: false, reason: 'value could not be read: getter exploded' });
  });

  it('accepts the same object twice when it is not its own ancestor', () => {
    const shared = { n: 1 };

    expect(validateJsonValue({ a: shared, b: shared })).toEqual({ ok: true, value: { a: { n: 1 }, b: { n: 1 } } });
  });
});

describe('isEmptyOutput', () => {
  it.each<[string, JsonValue]>([
    ['null', null],
    ['an empty string', ''],
    ['a blank string', '   '],
    ['an empty array', []],
    ['an empty object', {}],
  ])('treats %s as empty', (_label, value) => {
    expect(isEmptyOutput(value)).toBe(true);
  });

  it.each<[string, JsonValue]>([
    ['zero', 0],
    ['false', false],
    ['a word', 'x'],
    ['an array holding null', [null]],
    ['an object with a null field', { a: null }],
  ])('treats %s as content', (_label, value) => {
    expect(isEmptyOutput(value)).toBe(false);
  });
});

describe('extractJsonPayload', () => {
  it('parses a bare JSON reply', () => {
    expect(extractJsonPayload('{"intent":"Informational"}')).toEqual({ intent: 'Informational' });
  });

  it('prefers a fenced json block', () => {
    const reply = 'Here you go:\n```json\n{"tags":["a","b"]}\n```\nAnything else?';
    expect(extractJsonPayload(reply)).toEqual({ tags: ['a', 'b'] });
  });

  it('accepts an unlabeled fence', () => {
    expect(extractJsonPayload('```\n[1, 2]\n```')).toEqual([1, 2]);
  });

  it('falls back to the outermost braces', () => {
    expect(extractJsonPayload('Sure! {"score": 7, "notes": {"x": 1}} Hope this helps.')).toEqual({
      score: 7,
      notes: { x: 1 },
    });
  });

  it('returns undefined when nothing parses', () => {
    expect(extractJsonPayload('I cannot help with that.')).toBeUndefined();
    expect(extractJsonPayload('')).toBeUndefined();
    expect(extractJsonPayload('{ broken')).toBeUndefined();
  });
});

describe('truncateJson', () => {
  it('renders short values whole', () => {
    expect(truncateJson({ a: 1 }, 100)).toBe('{\n  "a": 1\n}');
  });

  it('cuts long values with a marker', () => {
    expect(truncateJson(['abcdefghij'], 5)).toBe('[\n  "\n[... truncated ...]');
  });

  it('renders a missing value as n/a', () => {
    expect(truncateJson(undefined, 10)).toBe('n/a');
  });
});
