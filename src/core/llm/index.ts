/**
 * LLM service exports
 */

export {
  LLMService,
  getLLMService,
  extractErrorMessage,
  type LLMRequest,
  type LLMResponse,
  type LLMProvider,
  type LLMServiceOptions,
} from './service.js';
export {
  ModelGateway,
  getModelGateway,
  parseRetryAfterSeconds,
  neutralizePrompt,
  REFUSAL_TEXT,
  type LLMGateway,
  type GatewayOptions,
} from './gateway.js';
export { ResponseCache, type CacheStats } from './response-cache.js';
