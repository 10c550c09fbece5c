/**
 * AI Service Unit Tests
 *
 * Tests for configuration status and the text generators.
 * Uses MSW to mock OpenRouter API calls.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  createOpenRouterTextGenerator,
  createStaticTextGenerator,
  getAIStatus,
  getModel,
  isAIConfigured,
  type GenerateTextFn,
} from '../../src/ai';
import { PipelineError } from '../../src/ai/pipeline/types';
import { server } from '../mocks/server';
import { errorHandlers } from '../mocks/handlers';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('AI Service', () => {
  describe('isAIConfigured', () => {
    it('should return true when OPENROUTER_API_KEY is set', () => {
      vi.stubEnv('OPENROUTER_API_KEY', 'test-key');
      expect(isAIConfigured()).toBe(true);
    });

    it('should return false when OPENROUTER_API_KEY is empty or blank', () => {
      vi.stubEnv('OPENROUTER_API_KEY', '');
      expect(isAIConfigured()).toBe(false);

      vi.stubEnv('OPENROUTER_API_KEY', '   ');
      expect(isAIConfigured()).toBe(false);
    });
  });

  describe('getModel', () => {
    it('should prefer the environment override', () => {
      expect(getModel('DRAFT_WRITER', { AI_MODEL_DRAFT_WRITER: 'test/writer' })).toBe('test/writer');
    });

    it('should fall back to the default model', () => {
      expect(getModel('DRAFT_WRITER', {})).toBe('anthropic/claude-sonnet-4');
      expect(getModel('INTENT_CLASSIFIER', { AI_MODEL_INTENT_CLASSIFIER: '' })).toBe('openai/gpt-4o-mini');
    });
  });

  describe('getAIStatus', () => {
    it('should describe every agent task', () => {
      vi.stubEnv('AI_MODEL_DRAFT_WRITER', 'test/writer');
      vi.stubEnv('AI_MODEL_TONE_CHECK', '');

      const status = getAIStatus();

      expect(status.configured).toBe(true);
      expect(Object.keys(status.tasks)).toHaveLength(9);
      expect(status.tasks.DRAFT_WRITER).toEqual({
        name: 'Draft Writer',
        model: 'test/writer',
        envVar: 'AI_MODEL_DRAFT_WRITER',
        isOverridden: true,
      });
      expect(status.tasks.TONE_CHECK).toEqual({
        name: 'Tone Check',
        model: 'openai/gpt-4o-mini',
        envVar: 'AI_MODEL_TONE_CHECK',
        isOverridden: false,
      });
    });
  });

  describe('createOpenRouterTextGenerator', () => {
    it('should require an API key', () => {
      vi.stubEnv('OPENROUTER_API_KEY', '');

      expect(() => createOpenRouterTextGenerator()).toThrow(PipelineError);
      expect(() => createOpenRouterTextGenerator()).toThrow('OPENROUTER_API_KEY environment variable is required');
    });

    it('should pass the request to generateText and trim the reply', async () => {
      const generateText = vi.fn<GenerateTextFn>(async () => ({ text: '  {"ok":true}\n' }));
      const generator = createOpenRouterTextGenerator({ apiKey: 'test-secret', generateText });

      const text = await generator.generate({
        system: 'You are a keyword researcher.',
        prompt: 'Topic: sourdough',
        temperature: 0.3,
        model: 'test/keywords',
      });

      expect(text).toBe('{"ok":true}');
      const options = generateText.mock.calls[0]?.[0];
      expect(options).toMatchObject({ system: 'You are a keyword researcher.', prompt: 'Topic: sourdough', temperature: 0.3 });
      const model = options?.model;
      expect(typeof model === 'string' ? model : model?.modelId).toBe('test/keywords');
    });

    it('should use the default model when the request names none', async () => {
      const generateText = vi.fn<GenerateTextFn>(async () => ({ text: 'ok' }));
      const generator = createOpenRouterTextGenerator({ apiKey: 'test-secret', defaultModel: 'test/default', generateText });

      await generator.generate({ prompt: 'Hello' });

      const model = generateText.mock.calls[0]?.[0].model;
      expect(typeof model === 'string' ? model : model?.modelId).toBe('test/default');
    });

    it('should retry transient failures', async () => {
      const generateText = vi
        .fn<GenerateTextFn>()
        .mockRejectedValueOnce(new Error('429 Too Many Requests'))
        .mockResolvedValueOnce({ text: 'recovered' });
      const generator = createOpenRouterTextGenerator({
        apiKey: 'test-secret',
        generateText,
        retry: { initialDelayMs: 1 },
      });

      await expect(generator.generate({ prompt: 'Hello' })).resolves.toBe('recovered');
      expect(generateText).toHaveBeenCalledTimes(2);
    });

    it('should call OpenRouter over HTTP', async () => {
      const generator = createOpenRouterTextGenerator({ apiKey: 'test-secret', retry: { maxRetries: 0 } });

      const text = await generator.generate({ prompt: 'Say something', model: 'test/model' });

      expect(text).toBe('Mocked completion text.');
    });

    it('should surface HTTP errors', async () => {
      server.use(errorHandlers.unauthorized);
      const generator = createOpenRouterTextGenerator({ apiKey: 'test-secret', retry: { maxRetries: 0 } });

      await expect(generator.generate({ prompt: 'Say something', model: 'test/model' })).rejects.toThrow();
    });
  });

  describe('createStaticTextGenerator', () => {
    it('should return a fixed reply', async () => {
      const generator = createStaticTextGenerator('  fixed  ');
      await expect(generator.generate({ prompt: 'anything' })).resolves.toBe('fixed');
    });

    it('should compute replies from the request', async () => {
      const generator = createStaticTextGenerator(async (request) => request.prompt.toUpperCase());
      await expect(generator.generate({ prompt: 'shout' })).resolves.toBe('SHOUT');
    });
  });
});
