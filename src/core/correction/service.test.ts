/**
 * Tests for RationaleCorrector
 */

import { describe, it, expect, vi } from 'vitest';
import { RationaleCorrector, buildPriorContext } from './service.js';
import { NO_RESULTS } from '../retrieval/index.js';
import type { LLMGateway } from '../llm/index.js';

function createCorrector(reply = '  Corrected: Paris is the capital of France.  ') {
  const call = vi.fn(async (_prompt: string, _temperature?: number): Promise<string> => reply);
  const gateway: LLMGateway = { model: 'test-model', call };
  return { corrector: new RationaleCorrector(gateway), call };
}

describe('buildPriorContext', () => {
  it('should number the corrected steps', () => {
    expect(buildPriorContext(['First step.', 'Second step.'])).toBe(
      'Previous corrected reasoning steps:\n1. First step.\n2. Second step.\n'
    );
  });

  it('should be empty without prior steps', () => {
    expect(buildPriorContext([])).toBe('');
  });
});

describe('RationaleCorrector', () => {
  it('should return the original unchanged for the no-results sentinel', async () => {
    const { corrector, call } = createCorrector();

    expect(await corrector.correct('Lyon is the capital.', NO_RESULTS)).toBe('Lyon is the capital.');
    expect(call).not.toHaveBeenCalled();
  });

  it('should return the original unchanged for blank evidence', async () => {
    const { corrector, call } = createCorrector();

    expect(await corrector.correct('Lyon is the capital.', '  ')).toBe('Lyon is the capital.');
    expect(call).not.toHaveBeenCalled();
  });

  it('should make one call at temperature 0 and trim the reply', async () => {
    const { corrector, call } = createCorrector();

    const corrected = await corrector.correct('Lyon is the capital.', 'Paris is the capital of France.');

    expect(corrected).toBe('Corrected: Paris is the capital of France.');
    expect(call).toHaveBeenCalledTimes(1);
    expect(call.mock.calls[0][1]).toBe(0);
  });

  it('should include the prior context, rationale and evidence in the prompt', async () => {
    const { corrector, call } = createCorrector();
    const context = buildPriorContext(['France is in Europe.']);

    await corrector.correct('Lyon is the capital.', 'Paris is the capital of France.', context);

    const prompt = call.mock.calls[0][0];
    expect(prompt).toContain('Previous corrected reasoning steps:\n1. France is in Europe.\n');
    expect(prompt).toContain('Original Rationale: Lyon is the capital.');
    expect(prompt).toContain('Supporting Knowledge:\nParis is the capital of France.');
  });
});
