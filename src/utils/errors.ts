/**
 * Error taxonomy and error-message sanitization
 */

export class ChainOfKnowledgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChainOfKnowledgeError';
  }
}

/**
 * Provider signalled a rate limit (HTTP 429). Retried inside the gateway.
 */
export class RateLimitError extends ChainOfKnowledgeError {
  constructor(
    message: string,
    public readonly retryAfterSeconds?: number
  ) {
    super(message, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

/**
 * Rate-limit retries exhausted. Terminates the question.
 */
export class RateLimitExceededError extends ChainOfKnowledgeError {
  constructor(
    public readonly retryAfterSeconds: number,
    options?: { cause?: unknown }
  ) {
    super(`Rate limit exceeded; retry after ${retryAfterSeconds.toFixed(2)}s`, 'RATE_LIMIT_EXCEEDED', options);
    this.name = 'RateLimitExceededError';
  }
}

/**
 * Provider refused the prompt on content-safety grounds.
 */
export class ContentBlockedError extends ChainOfKnowledgeError {
  constructor(message: string) {
    super(message, 'CONTENT_BLOCKED');
    this.name = 'ContentBlockedError';
  }
}

/**
 * Any other provider failure. Never retried.
 */
export class ProviderError extends ChainOfKnowledgeError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROVIDER_ERROR', options);
    this.name = 'ProviderError';
  }
}

/**
 * A knowledge source request failed. Sources catch this and return no results.
 */
export class KnowledgeSourceError extends ChainOfKnowledgeError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'KNOWLEDGE_SOURCE_ERROR', options);
    this.name = 'KnowledgeSourceError';
  }
}

export class ConfigurationError extends ChainOfKnowledgeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors that end a question instead of degrading to "no evidence"
 */
export function isFatalGatewayError(error: unknown): boolean {
  return error instanceof RateLimitExceededError || error instanceof ProviderError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sanitize error messages to prevent information disclosure
 * Removes sensitive information like file paths, API keys, and internal details
 */
export function sanitizeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return 'An unexpected error occurred';
  }

  // API keys and bearer tokens
  let sanitized = error.message.replace(/sk-[a-zA-Z0-9]{20,}/g, '[REDACTED_API_KEY]');
  sanitized = sanitized.replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED]');

  // Absolute file paths (Unix, Windows)
  sanitized = sanitized.replace(/\/(?:home|usr|var|tmp|etc|opt|root)\/[^\s:'"]+/g, '[REDACTED_PATH]');
  sanitized = sanitized.replace(/[A-Z]:\\[^\s:'"]+/gi, '[REDACTED_PATH]');

  // IP addresses with ports
  sanitized = sanitized.replace(/\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}(:\d+)?/g, '[REDACTED_IP]');

  // Stack traces
  sanitized = sanitized.replace(/\n\s+at\s+.+/g, '');

  sanitized = sanitized.replace(/^(Error|TypeError|ReferenceError|SyntaxError):\s*/i, '');

  if (sanitized.length > 500) {
    sanitized = sanitized.substring(0, 497) + '...';
  }

  return sanitized || 'An error occurred while processing your request';
}
