import { describe, it, expect } from 'vitest';

import {
  AGENT_CONFIG,
  GENERATOR_CONFIG,
  PIPELINE_CONFIG,
  SEO_CONSTRAINTS,
  getPipelineSettings,
} from '../../../src/ai/pipeline/config';

describe('getPipelineSettings', () => {
  it('falls back to defaults', () => {
    expect(getPipelineSettings({})).toEqual({
      openRouterApiKey: '',
      openRouterBaseUrl: GENERATOR_CONFIG.DEFAULT_OPENROUTER_BASE_URL,
      cacheDir: PIPELINE_CONFIG.DEFAULT_CACHE_DIR,
      outputDir: PIPELINE_CONFIG.DEFAULT_OUTPUT_DIR,
    });
  });

  it('reads overrides from the environment', () => {
    const settings = getPipelineSettings({
      OPENROUTER_API_KEY: ' test-secret ',
      OPENROUTER_BASE_URL: 'http://localhost:8080/v1',
      PIPELINE_CACHE_DIR: '/tmp/cache',
      PIPELINE_OUTPUT_DIR: '/tmp/output',
    });

    expect(settings).toEqual({
      openRouterApiKey: 'test-secret',
      openRouterBaseUrl: 'http://localhost:8080/v1',
      cacheDir: '/tmp/cache',
      outputDir: '/tmp/output',
    });
  });
});

describe('configuration constants', () => {
  it('keeps temperatures in the valid range', () => {
    for (const temperature of Object.values(AGENT_CONFIG.TEMPERATURES)) {
      expect(temperature).toBeGreaterThanOrEqual(0);
      expect(temperature).toBeLessThanOrEqual(2);
    }
  });

  it('keeps SEO limits consistent', () => {
    expect(SEO_CONSTRAINTS.META_DESCRIPTION_MIN_LENGTH).toBeLessThan(SEO_CONSTRAINTS.META_DESCRIPTION_MAX_LENGTH);
    expect(SEO_CONSTRAINTS.MIN_TAGS).toBeLessThanOrEqual(SEO_CONSTRAINTS.MAX_TAGS);
  });
});
