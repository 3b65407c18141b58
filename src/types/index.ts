/**
 * Core type definitions for the Chain-of-Knowledge server
 */

// Domain types
export const DOMAINS = ['factual', 'medical', 'physics', 'biology'] as const;
export type Domain = (typeof DOMAINS)[number];

export const QUERY_TYPES = ['sparql', 'medical', 'natural_language'] as const;
export type QueryType = (typeof QUERY_TYPES)[number];

export type SourceName = 'wikidata_sparql' | 'wikipedia' | 'duckduckgo';

// Reasoning types
export interface Rationale {
  /** 1-based generation index */
  index: number;
  text: string;
  temperature: number;
}

export interface Agreement {
  /** Representative extracted answer of the modal group */
  answer: string;
  /** Modal frequency share in [0,1] */
  share: number;
}

// Retrieval types
export interface GeneratedQuery {
  text: string;
  type: QueryType;
  domain: Domain;
}

export interface KnowledgeItem {
  content: string;
  /** Relevance score in [0,1] */
  score: number;
  source: string;
}

export interface RawKnowledge {
  content: string;
  source: string;
}

export type RetrievalOutcome =
  | { status: 'success'; query: GeneratedQuery; evidence: string }
  | { status: 'empty'; query: GeneratedQuery }
  | { status: 'failure'; reason: string };

// Pipeline types
export type PipelineStage = 'consensus_validated' | 'full_pipeline';
export type Confidence = 'high' | 'medium';

export type PipelineState =
  | 'START'
  | 'RATIONALE_GENERATION'
  | 'CONSENSUS_CHECK'
  | 'EARLY_STOP'
  | 'RETRIEVAL_LOOP'
  | 'CONSOLIDATION'
  | 'DONE';

export interface ModelsUsed {
  reasoning: string;
  queryGeneration: string;
  consolidation: string;
}

export interface PipelineResult {
  question: string;
  answer: string;
  stage: PipelineStage;
  confidence: Confidence;
  domains: Domain[];
  rationales: Rationale[];
  extractedAnswers: string[];
  /** Modal answer share among extracted answers */
  agreement: number;
  /** Index-aligned with rationales; empty when stopped early */
  correctedRationales: string[];
  modelsUsed: ModelsUsed;
  trace: PipelineState[];
  durationMs: number;
}

export interface BatchPrediction {
  question: string;
  /** Empty string when the question failed */
  prediction: string;
  result?: PipelineResult;
  error?: string;
}

// MCP Tool types
export interface ToolResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Config types
export interface Config {
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeout: number;
    maxTokens: number;
  };
  gateway: {
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    rateLimitMarginMs: number;
    cacheMaxEntries: number;
  };
  pipeline: {
    numRationales: number;
    numRationalesClaim: number;
    consensusThreshold: number;
    earlyStopThreshold: number;
    earlyStopping: boolean;
    maxParallelCalls: number;
  };
  knowledge: {
    sources: SourceName[];
    timeout: number;
    topK: number;
    wikipediaLanguage: string;
    webSearchLimit: number;
    userAgent: string;
  };
}
