import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import {
  createContextualLogger,
  createPrefixedLogger,
  createStructuredLogger,
  generateCorrelationId,
  logger,
} from '../../src/utils/logger';

describe('logger', () => {
  let log: MockInstance<typeof console.log>;
  let warn: MockInstance<typeof console.warn>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('LOG_FORMAT', '');
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('levels', () => {
    it('routes each level to its console stream', () => {
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(log.mock.calls).toEqual([['d'], ['i']]);
      expect(warn).toHaveBeenCalledWith('w');
      expect(error).toHaveBeenCalledWith('e');
    });

    it('drops lines below LOG_LEVEL', () => {
      vi.stubEnv('LOG_LEVEL', 'warn');

      logger.info('hidden');
      logger.warn('shown');

      expect(log).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('shown');
    });

    it('defaults to info for an unknown LOG_LEVEL', () => {
      vi.stubEnv('LOG_LEVEL', 'verbose');

      logger.debug('hidden');
      logger.info('shown');

      expect(log.mock.calls).toEqual([['shown']]);
    });
  });

  describe('createPrefixedLogger', () => {
    it('prepends the prefix', () => {
      createPrefixedLogger('[ResultCache]').info('Entry written');
      expect(log).toHaveBeenCalledWith('[ResultCache] Entry written');
    });
  });

  describe('createStructuredLogger', () => {
    it('formats entries as readable text by default', () => {
      createStructuredLogger('[Orchestrator]').structured('info', {
        event: 'step_complete',
        message: 'done',
        stepId: 'draft-writer',
      });

      expect(log).toHaveBeenCalledWith('[Orchestrator] [step_complete]: done {"stepId":"draft-writer"}');
    });

    it('writes JSON when LOG_FORMAT=json', () => {
      vi.stubEnv('LOG_FORMAT', 'json');

      createStructuredLogger('[Orchestrator]').structured('warn', { event: 'step_failed', stepId: 'a' });

      const line: unknown = warn.mock.calls[0]?.[0];
      expect(typeof line === 'string' ? JSON.parse(line) : undefined).toMatchObject({
        level: 'warn',
        module: 'Orchestrator',
        event: 'step_failed',
        stepId: 'a',
      });
    });
  });

  describe('createContextualLogger', () => {
    it('tags lines with the correlation ID', () => {
      createContextualLogger('[Orchestrator]', { correlationId: 'corr-1' }).info('Run started');
      expect(log).toHaveBeenCalledWith('[Orchestrator] [corr-1] Run started');
    });

    it('merges the context into JSON entries', () => {
      vi.stubEnv('LOG_FORMAT', 'json');

      createContextualLogger('[Orchestrator]', { correlationId: 'corr-1', runId: 'run-1' }).structured('info', {
        event: 'run_started',
      });

      const line: unknown = log.mock.calls[0]?.[0];
      expect(typeof line === 'string' ? JSON.parse(line) : undefined).toMatchObject({
        correlationId: 'corr-1',
        runId: 'run-1',
        event: 'run_started',
      });
    });

    it('creates children that extend the context', () => {
      const child = createContextualLogger('[Orchestrator]', { correlationId: 'corr-1', runId: 'run-1' }).child({
        stepId: 'tone-check',
        correlationId: 'ignored',
      });

      expect(child.context).toEqual({ correlationId: 'corr-1', runId: 'run-1', stepId: 'tone-check' });
      child.warn('Slow step');
      expect(warn).toHaveBeenCalledWith('[Orchestrator] [corr-1] Slow step');
    });
  });
});

describe('generateCorrelationId', () => {
  it('has the timestamp-random format', () => {
    expect(generateCorrelationId()).toMatch(/^[a-z0-9]+-[a-z0-9]{8}$/);
  });

  it('is unique across calls', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateCorrelationId()));
    expect(ids.size).toBe(100);
  });
});
