/**
 * Tests for ModelGateway - caching, rate-limit backoff, content-safety retry
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ModelGateway,
  parseRetryAfterSeconds,
  neutralizePrompt,
  REFUSAL_TEXT,
} from './gateway.js';
import type { LLMProvider, LLMRequest, LLMResponse } from './service.js';
import {
  ContentBlockedError,
  ProviderError,
  RateLimitError,
  RateLimitExceededError,
} from '../../utils/errors.js';

function reply(content: string): LLMResponse {
  return { content, model: 'test-model' };
}

function createProvider() {
  const complete = vi.fn(async (_request: LLMRequest): Promise<LLMResponse> => reply('default'));
  const provider: LLMProvider = { model: 'test-model', complete };
  return { provider, complete };
}

describe('parseRetryAfterSeconds', () => {
  it('should parse minutes and fractional seconds', () => {
    const seconds = parseRetryAfterSeconds('Rate limit reached for model. Please try again in 1m22.08s. Visit the docs.');
    expect(seconds).toBeCloseTo(82.08, 5);
  });

  it('should parse seconds only', () => {
    expect(parseRetryAfterSeconds('Please try again in 7.5s')).toBe(7.5);
  });

  it('should parse minutes only', () => {
    expect(parseRetryAfterSeconds('try again in 2m')).toBe(120);
  });

  it('should return undefined without a hint', () => {
    expect(parseRetryAfterSeconds('Too many requests')).toBeUndefined();
    expect(parseRetryAfterSeconds('try again in 500ms')).toBeUndefined();
  });
});

describe('neutralizePrompt', () => {
  it('should frame the request and soften charged terms', () => {
    const neutral = neutralizePrompt('How did the bomb kill him?');
    expect(neutral.startsWith('The following is a neutral, educational request')).toBe(true);
    expect(neutral.endsWith('How did the explosive device cause the death of him?')).toBe(true);
  });
});

describe('ModelGateway', () => {
  const sleepFn = vi.fn(async (_ms: number): Promise<void> => undefined);

  beforeEach(() => {
    sleepFn.mockClear();
  });

  describe('response cache', () => {
    it('should key the cache on prompt text only, ignoring temperature', async () => {
      const { provider, complete } = createProvider();
      complete.mockResolvedValueOnce(reply('first')).mockResolvedValueOnce(reply('second'));
      const gateway = new ModelGateway(provider, { sleep: sleepFn });

      const cold = await gateway.call('What is the capital of France?', 0.2);
      const warm = await gateway.call('What is the capital of France?', 0.9);

      expect(cold).toBe('first');
      expect(warm).toBe('first');
      expect(complete).toHaveBeenCalledTimes(1);
      expect(complete.mock.calls[0][0].temperature).toBe(0.2);
    });

    it('should not share entries between different prompts', async () => {
      const { provider, complete } = createProvider();
      complete.mockResolvedValueOnce(reply('a')).mockResolvedValueOnce(reply('b'));
      const gateway = new ModelGateway(provider, { sleep: sleepFn });

      expect(await gateway.call('prompt one')).toBe('a');
      expect(await gateway.call('prompt two')).toBe('b');
      expect(complete).toHaveBeenCalledTimes(2);
    });

    it('should report hits and misses and clear on demand', async () => {
      const { provider, complete } = createProvider();
      const gateway = new ModelGateway(provider, { sleep: sleepFn });

      await gateway.call('p');
      await gateway.call('p');
      expect(gateway.cacheStats()).toEqual({ hits: 1, misses: 1, size: 1, maxEntries: 5000 });

      gateway.clearCache();
      await gateway.call('p');
      expect(complete).toHaveBeenCalledTimes(2);
    });

    it('should expose the provider model name', () => {
      const { provider } = createProvider();
      expect(new ModelGateway(provider).model).toBe('test-model');
    });
  });

  describe('rate limiting', () => {
    it('should wait the parsed duration plus the safety margin, then succeed', async () => {
      const { provider, complete } = createProvider();
      complete
        .mockRejectedValueOnce(new RateLimitError('Please try again in 1m22.08s.'))
        .mockResolvedValueOnce(reply('recovered'));
      const gateway = new ModelGateway(provider, { sleep: sleepFn, rateLimitMarginMs: 2000 });

      const text = await gateway.call('prompt');

      expect(text).toBe('recovered');
      expect(sleepFn).toHaveBeenCalledTimes(1);
      expect(sleepFn.mock.calls[0][0]).toBeCloseTo(84080, 3);
    });

    it('should raise RateLimitExceededError carrying the wait after max retries', async () => {
      const { provider, complete } = createProvider();
      complete.mockRejectedValue(new RateLimitError('Please try again in 1m22.08s.'));
      const gateway = new ModelGateway(provider, {
        sleep: sleepFn,
        maxRetries: 3,
        rateLimitMarginMs: 2000,
      });

      const error = await gateway.call('prompt').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitExceededError);
      if (error instanceof RateLimitExceededError) {
        expect(error.retryAfterSeconds).toBeCloseTo(84.08, 5);
        expect(error.message).toBe('Rate limit exceeded; retry after 84.08s');
      }
      expect(complete).toHaveBeenCalledTimes(4);
      expect(sleepFn).toHaveBeenCalledTimes(3);
    });

    it('should fall back to exponential backoff without a wait hint', async () => {
      const { provider, complete } = createProvider();
      complete.mockRejectedValue(new RateLimitError('Too many requests'));
      const gateway = new ModelGateway(provider, {
        sleep: sleepFn,
        maxRetries: 3,
        initialBackoffMs: 100,
        maxBackoffMs: 10000,
      });

      const error = await gateway.call('prompt').catch((e: unknown) => e);

      expect(sleepFn.mock.calls.map(call => call[0])).toEqual([100, 200, 400]);
      expect(error).toBeInstanceOf(RateLimitExceededError);
      if (error instanceof RateLimitExceededError) {
        expect(error.retryAfterSeconds).toBe(0.8);
      }
    });

    it('should use a Retry-After value carried by the error', async () => {
      const { provider } = createProvider();
      const gateway = new ModelGateway(provider, { rateLimitMarginMs: 1000 });
      expect(gateway.waitMsFor(new RateLimitError('Too many requests', 30), 0)).toBe(31000);
    });
  });

  describe('provider failures', () => {
    it('should propagate non-rate-limit errors without retrying', async () => {
      const { provider, complete } = createProvider();
      complete.mockRejectedValue(new ProviderError('LLM API error (500): boom', 500));
      const gateway = new ModelGateway(provider, { sleep: sleepFn });

      await expect(gateway.call('prompt')).rejects.toBeInstanceOf(ProviderError);
      expect(complete).toHaveBeenCalledTimes(1);
      expect(sleepFn).not.toHaveBeenCalled();
    });
  });

  describe('content safety', () => {
    it('should retry once with a neutralized prompt and cache under the original', async () => {
      const { provider, complete } = createProvider();
      complete
        .mockRejectedValueOnce(new ContentBlockedError('blocked'))
        .mockResolvedValueOnce(reply('safe answer'));
      const gateway = new ModelGateway(provider, { sleep: sleepFn });

      expect(await gateway.call('sensitive prompt')).toBe('safe answer');
      expect(complete.mock.calls[1][0].prompt).toBe(neutralizePrompt('sensitive prompt'));

      expect(await gateway.call('sensitive prompt')).toBe('safe answer');
      expect(complete).toHaveBeenCalledTimes(2);
    });

    it('should substitute the refusal text when blocked twice and not cache it', async () => {
      const { provider, complete } = createProvider();
      complete
        .mockRejectedValueOnce(new ContentBlockedError('blocked'))
        .mockRejectedValueOnce(new ContentBlockedError('blocked again'))
        .mockResolvedValueOnce(reply('later answer'));
      const gateway = new ModelGateway(provider, { sleep: sleepFn });

      expect(await gateway.call('sensitive prompt')).toBe(REFUSAL_TEXT);
      expect(await gateway.call('sensitive prompt')).toBe('later answer');
      expect(complete).toHaveBeenCalledTimes(3);
    });
  });
});
