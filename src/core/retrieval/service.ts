/**
 * Retrieval service - adaptive queries fanned out to ranked knowledge sources
 *
 * SPARQL goes to a structured primary source first; when that yields nothing,
 * the literals of the query are searched as keywords on the text sources under
 * a stricter threshold. Text queries go to every text source at once.
 */

import { config } from '../../config/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage, isFatalGatewayError } from '../../utils/errors.js';
import { getModelGateway, type LLMGateway } from '../llm/index.js';
import {
  DEFAULT_RELEVANCE_THRESHOLD,
  RelevanceScorer,
  SourceRanker,
  getKnowledgeSourceRegistry,
  type KnowledgeSourceRegistry,
} from '../knowledge/index.js';
import type {
  Domain,
  GeneratedQuery,
  KnowledgeItem,
  QueryType,
  RawKnowledge,
  RetrievalOutcome,
  SourceName,
} from '../../types/index.js';
import { QueryGenerator, keywordsFromSparql, sparqlSearchTerms } from './query-generator.js';

const log = createChildLogger('retrieval');

export const NO_RESULTS = 'No results found';

export interface RetrievalOptions {
  /** Snippets requested from each source */
  topK: number;
  /** Snippets kept as evidence */
  evidenceItems: number;
  threshold: number;
  /** Applied after an empty structured primary */
  fallbackThreshold: number;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  topK: config.knowledge.topK,
  evidenceItems: 3,
  threshold: DEFAULT_RELEVANCE_THRESHOLD,
  fallbackThreshold: 0.15,
};

export class RetrievalService {
  private readonly registry: KnowledgeSourceRegistry;
  private readonly generator: QueryGenerator;
  private readonly ranker = new SourceRanker();
  private readonly scorer = new RelevanceScorer();
  private readonly options: RetrievalOptions;

  constructor(gateway: LLMGateway, registry: KnowledgeSourceRegistry, options: Partial<RetrievalOptions> = {}) {
    this.registry = registry;
    this.generator = new QueryGenerator(gateway);
    this.options = { ...DEFAULT_RETRIEVAL_OPTIONS, ...options };
  }

  generateQuery(rationale: string, domain: Domain): Promise<GeneratedQuery> {
    return this.generator.generateQuery(rationale, domain);
  }

  /**
   * Top evidence snippets for a query, best first. Never rejects.
   */
  async searchEvidence(query: string, queryType: QueryType, domain: Domain): Promise<string[]> {
    try {
      const ranked = this.ranker.rankSources(domain, queryType, this.registry.names());
      const items = queryType === 'sparql'
        ? await this.searchStructured(query, domain, ranked)
        : await this.searchText(query, ranked, query, this.options.threshold);

      const top = this.scorer.getTopK(items, this.options.evidenceItems);
      log.debug({ queryType, domain, candidates: items.length, kept: top.length }, 'Query executed');
      return top.map(item => item.content);
    } catch (error) {
      log.error({ queryType, domain }, `Query execution failed: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Evidence text for a query: the top snippets joined by newlines, or
   * NO_RESULTS. Never rejects.
   */
  async executeQuery(query: string, queryType: QueryType, domain: Domain): Promise<string> {
    const snippets = await this.searchEvidence(query, queryType, domain);
    return snippets.length > 0 ? snippets.join('\n') : NO_RESULTS;
  }

  /**
   * Generate a query for the rationale and run it. Fatal gateway errors propagate.
   */
  async retrieve(rationale: string, domain: Domain): Promise<RetrievalOutcome> {
    let query: GeneratedQuery;
    try {
      query = await this.generateQuery(rationale, domain);
    } catch (error) {
      if (isFatalGatewayError(error)) throw error;
      return { status: 'failure', reason: `Query generation failed: ${errorMessage(error)}` };
    }

    if (!query.text) {
      return { status: 'failure', reason: 'Generated query was empty' };
    }

    const evidence = await this.executeQuery(query.text, query.type, domain);
    return evidence === NO_RESULTS
      ? { status: 'empty', query }
      : { status: 'success', query, evidence };
  }

  private async searchStructured(query: string, domain: Domain, ranked: SourceName[]): Promise<KnowledgeItem[]> {
    const keywords = keywordsFromSparql(query);
    const primary = ranked.length > 0 ? this.registry.get(ranked[0]) : undefined;

    if (primary?.kind === 'structured') {
      const raw = await this.registry.searchMany([primary.name], query, this.options.topK);
      const items = this.rank(sparqlSearchTerms(query) || query, raw, this.options.threshold);
      if (items.length > 0) return items;
    }

    if (!keywords) {
      log.debug({ domain }, 'No literals to fall back on');
      return [];
    }
    log.debug({ domain, keywords }, 'Falling back to text sources');
    return this.searchText(keywords, ranked, keywords, this.options.fallbackThreshold);
  }

  private async searchText(
    query: string,
    ranked: SourceName[],
    scoreAgainst: string,
    threshold: number
  ): Promise<KnowledgeItem[]> {
    const textSources = ranked.filter(name => this.registry.get(name)?.kind === 'text');
    if (textSources.length === 0) return [];
    const raw = await this.registry.searchMany(textSources, query, this.options.topK);
    return this.rank(scoreAgainst, raw, threshold);
  }

  private rank(query: string, raw: RawKnowledge[], threshold: number): KnowledgeItem[] {
    return this.scorer.filterByThreshold(this.scorer.score(query, raw), threshold);
  }
}

export function getRetrievalService(): RetrievalService {
  return new RetrievalService(getModelGateway(), getKnowledgeSourceRegistry());
}
