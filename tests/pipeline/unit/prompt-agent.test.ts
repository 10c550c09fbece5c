import { afterEach, describe, expect, it, vi } from 'vitest';

import { createStaticTextGenerator, type TextGenerationRequest, type TextGenerator } from '../../../src/ai/service';
import { createPromptAgent, formatList, readStepOutput } from '../../../src/ai/pipeline/agents/prompt-agent';
import { ToneReportSchema, type ToneReport } from '../../../src/ai/pipeline/agents/tone-check';
import { StepExecutionError, type PipelineStep } from '../../../src/ai/pipeline/types';
import { buildSnapshot, createTestContext } from '../../mocks/run-state-fixtures';

function createToneAgent(generator: TextGenerator, model?: string): PipelineStep {
  return createPromptAgent<ToneReport>(
    {
      id: 'tone-check',
      taskKey: 'TONE_CHECK',
      temperature: 0.2,
      schema: ToneReportSchema,
      buildSystemPrompt: () => 'You check tone.',
      buildUserPrompt: (state) => `Topic: ${state.topic}`,
    },
    { generator, model }
  );
}

describe('createPromptAgent', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('sends the prompts and returns the parsed output', async () => {
    const requests: TextGenerationRequest[] = [];
    const generator = createStaticTextGenerator((request) => {
      requests.push(request);
      return '{"detectedTone":"warm","matchScore":9}';
    });

    const output = await createToneAgent(generator, 'test/model').run(buildSnapshot({}), createTestContext());

    expect(output).toEqual({ detectedTone: 'warm', matchScore: 9, adjustments: [] });
    expect(requests).toEqual([
      { system: 'You check tone.', prompt: 'Topic: Sourdough baking for beginners', temperature: 0.2, model: 'test/model' },
    ]);
  });

  it('uses the configured model for the task when no override is given', async () => {
    vi.stubEnv('AI_MODEL_TONE_CHECK', 'env/tone-model');
    const generate = vi.fn(async () => '{"detectedTone":"warm","matchScore":9}');

    await createToneAgent({ generate }).run(buildSnapshot({}), createTestContext());

    expect(generate).toHaveBeenCalledWith(expect.objectContaining({ model: 'env/tone-model' }));
  });

  it('wraps generator failures', async () => {
    const generator: TextGenerator = {
      generate: async () => {
        throw new Error('401 Unauthorized');
      },
    };

    const promise = createToneAgent(generator).run(buildSnapshot({}), createTestContext());

    await expect(promise).rejects.toBeInstanceOf(StepExecutionError);
    await expect(promise).rejects.toMatchObject({
      stepId: 'tone-check',
      message: 'Language model call failed: 401 Unauthorized',
    });
  });

  it('fails when the reply has no JSON', async () => {
    const generator = createStaticTextGenerator('I cannot help.');

    await expect(createToneAgent(generator).run(buildSnapshot({}), createTestContext())).rejects.toThrow(
      'Model reply contained no JSON payload (14 chars)'
    );
  });

  it('fails when the reply does not match the schema', async () => {
    const generator = createStaticTextGenerator('{"detectedTone":"warm"}');

    await expect(createToneAgent(generator).run(buildSnapshot({}), createTestContext())).rejects.toThrow(
      'Model reply did not match the expected shape: matchScore: Required'
    );
  });
});

describe('readStepOutput', () => {
  it('returns the parsed output of another step', () => {
    const state = buildSnapshot({ 'tone-check': { detectedTone: 'warm', matchScore: 7 } });

    expect(readStepOutput(state, 'tone-check', ToneReportSchema)).toEqual({
      detectedTone: 'warm',
      matchScore: 7,
      adjustments: [],
    });
  });

  it('returns undefined for missing or mismatched outputs', () => {
    const state = buildSnapshot({ 'tone-check': 'not a report' });

    expect(readStepOutput(state, 'tone-check', ToneReportSchema)).toBeUndefined();
    expect(readStepOutput(state, 'draft-writer', ToneReportSchema)).toBeUndefined();
  });
});

describe('formatList', () => {
  it('renders bullets up to the limit', () => {
    expect(formatList(['a', 'b', 'c'], 2)).toBe('- a\n- b');
  });

  it('renders a placeholder for empty lists', () => {
    expect(formatList(undefined, 5)).toBe('(none)');
    expect(formatList([], 5, 'n/a')).toBe('n/a');
  });
});
