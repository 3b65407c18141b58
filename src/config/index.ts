/**
 * Configuration management for the Chain-of-Knowledge server
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Config, SourceName } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

// Load .env file
const __dirname = dirname(fileURLToPath(import.meta.url));
dotenvConfig({ path: resolve(__dirname, '../../.env') });

const KNOWN_SOURCES: readonly SourceName[] = ['wikidata_sparql', 'wikipedia', 'duckduckgo'];

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number, min?: number, max?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Invalid number for environment variable ${key}: ${value}`);
  }
  if (min !== undefined && parsed < min) {
    throw new ConfigurationError(`Environment variable ${key} must be at least ${min}, got ${parsed}`);
  }
  if (max !== undefined && parsed > max) {
    throw new ConfigurationError(`Environment variable ${key} must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

function getEnvFloat(key: string, defaultValue: number, min = 0, max = 1): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < min || parsed > max) {
    throw new ConfigurationError(`Environment variable ${key} must be a number in [${min}, ${max}], got ${value}`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function isSourceName(value: string): value is SourceName {
  return KNOWN_SOURCES.some(source => source === value);
}

function getEnvSources(key: string, defaultValue: readonly SourceName[]): SourceName[] {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return [...defaultValue];
  }
  const names = value.split(',').map(name => name.trim()).filter(Boolean);
  const unknown = names.filter(name => !isSourceName(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown knowledge source(s) in ${key}: ${unknown.join(', ')}`);
  }
  return names.filter(isSourceName);
}

export const config: Config = {
  llm: {
    // Local OpenAI-compatible servers accept requests without a key
    apiKey: getEnv('LLM_API_KEY', ''),
    baseUrl: getEnv('LLM_BASE_URL', 'http://localhost:4000/v1'),
    model: getEnv('LLM_MODEL', 'meta-llama/Llama-3-70b-chat-hf'),
    timeout: getEnvNumber('LLM_TIMEOUT', 60000, 1000, 600000),
    maxTokens: getEnvNumber('LLM_MAX_TOKENS', 1024, 16, 32768),
  },
  gateway: {
    maxRetries: getEnvNumber('LLM_MAX_RETRIES', 3, 0, 10),
    initialBackoffMs: getEnvNumber('LLM_BACKOFF_MS', 1000, 10, 60000),
    maxBackoffMs: getEnvNumber('LLM_MAX_BACKOFF_MS', 120000, 100, 600000),
    rateLimitMarginMs: getEnvNumber('LLM_RATE_LIMIT_MARGIN_MS', 2000, 0, 60000),
    cacheMaxEntries: getEnvNumber('LLM_CACHE_SIZE', 5000, 1, 1000000),
  },
  pipeline: {
    numRationales: getEnvNumber('NUM_RATIONALES', 5, 1, 20),
    numRationalesClaim: getEnvNumber('NUM_RATIONALES_CLAIM', 3, 1, 20),
    consensusThreshold: getEnvFloat('CONSENSUS_THRESHOLD', 0.5),
    earlyStopThreshold: getEnvFloat('EARLY_STOP_THRESHOLD', 0.7),
    earlyStopping: getEnvBoolean('EARLY_STOPPING', true),
    maxParallelCalls: getEnvNumber('MAX_PARALLEL_CALLS', 3, 1, 20),
  },
  knowledge: {
    sources: getEnvSources('KNOWLEDGE_SOURCES', KNOWN_SOURCES),
    timeout: getEnvNumber('KNOWLEDGE_TIMEOUT', 10000, 500, 120000),
    topK: getEnvNumber('KNOWLEDGE_TOP_K', 3, 1, 20),
    wikipediaLanguage: getEnv('WIKIPEDIA_LANGUAGE', 'en'),
    webSearchLimit: getEnvNumber('WEB_SEARCH_LIMIT', 100, 0, 100000),
    userAgent: getEnv('HTTP_USER_AGENT', 'chain-of-knowledge-mcp/1.0 (knowledge-grounded QA)'),
  },
};

export default config;
