/**
 * OpenAI-compatible chat completion client
 *
 * Talks to any `/chat/completions` endpoint (LiteLLM, vLLM, Together, Groq,
 * Ollama) and classifies failures into the gateway's error taxonomy.
 */

import { z } from 'zod';
import { config } from '../../config/index.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  ContentBlockedError,
  ProviderError,
  RateLimitError,
} from '../../utils/errors.js';

const log = createChildLogger('llm-service');

export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * Anything that can complete a prompt. The gateway only depends on this.
 */
export interface LLMProvider {
  readonly model: string;
  complete(request: LLMRequest): Promise<LLMResponse>;
}

export interface LLMServiceOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeout: number;
  maxTokens: number;
}

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z
        .object({
          role: z.string().optional(),
          content: z.string().nullable().optional(),
        })
        .optional(),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.union([
    z.string(),
    z.object({ message: z.string().optional(), code: z.union([z.string(), z.number()]).nullable().optional() }),
  ]),
});

const SAFETY_FINISH_REASONS = /^(content_filter|safety|recitation|prohibited_content|blocklist)$/i;
const SAFETY_ERROR_PATTERN = /content[ _-]?(filter|policy|management)|safety|blocked|flagged/i;

const DEFAULT_TEMPERATURE = 0.0;

/**
 * Pull a readable message out of a provider error body
 */
export function extractErrorMessage(body: string): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      const { error } = parsed.data;
      if (typeof error === 'string') return error;
      if (error.message) return error.message;
    }
  } catch {
    // Not JSON; fall through to the raw text
  }
  return body.trim().substring(0, 500);
}

function parseRetryAfterHeader(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export class LLMService implements LLMProvider {
  private readonly options: LLMServiceOptions;

  constructor(options: Partial<LLMServiceOptions> = {}) {
    this.options = { ...config.llm, ...options };
  }

  get model(): string {
    return this.options.model;
  }

  /**
   * Generate completion using LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const {
      prompt,
      systemPrompt,
      model = this.options.model,
      temperature = DEFAULT_TEMPERATURE,
      maxTokens = this.options.maxTokens,
    } = request;

    const messages: Array<{ role: string; content: string }> = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model,
          messages,
          temperature,
          max_tokens: maxTokens,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        const message = extractErrorMessage(errorText);
        log.debug({ status: response.status, message }, 'LLM API error');

        if (response.status === 429) {
          throw new RateLimitError(message, parseRetryAfterHeader(response.headers.get('retry-after')));
        }
        if ((response.status === 400 || response.status === 403) && SAFETY_ERROR_PATTERN.test(message)) {
          throw new ContentBlockedError(message);
        }
        throw new ProviderError(`LLM API error (${response.status}): ${message.substring(0, 200)}`, response.status);
      }

      const parsed = chatCompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError('LLM API returned an unexpected response shape');
      }

      const data = parsed.data;
      const choice = data.choices[0];
      const finishReason = choice?.finish_reason ?? '';
      if (SAFETY_FINISH_REASONS.test(finishReason)) {
        throw new ContentBlockedError(`Completion stopped by provider safety filter (${finishReason})`);
      }

      return {
        content: choice?.message?.content ?? '',
        model: data.model ?? model,
        usage: data.usage ? {
          promptTokens: data.usage.prompt_tokens,
          completionTokens: data.usage.completion_tokens,
          totalTokens: data.usage.total_tokens,
        } : undefined,
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ProviderError(`LLM API timeout: Request exceeded ${this.options.timeout}ms`);
      }
      if (error instanceof RateLimitError || error instanceof ContentBlockedError || error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(`LLM API request failed: ${error instanceof Error ? error.message : String(error)}`, undefined, {
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

// Singleton instance
let llmService: LLMService | null = null;

export function getLLMService(): LLMService {
  if (!llmService) {
    llmService = new LLMService();
  }
  return llmService;
}
