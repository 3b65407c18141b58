/**
 * Source ranking by domain and query type
 */

import type { Domain, QueryType, SourceName } from '../../types/index.js';

const DOMAIN_PRIORITY: Record<Domain, readonly SourceName[]> = {
  factual: ['wikidata_sparql', 'wikipedia'],
  medical: ['wikipedia', 'wikidata_sparql'],
  physics: ['wikipedia', 'wikidata_sparql'],
  biology: ['wikipedia', 'wikidata_sparql'],
};

const QUERY_TYPE_PRIORITY: Record<QueryType, readonly SourceName[]> = {
  sparql: ['wikidata_sparql'],
  medical: ['wikipedia'],
  natural_language: ['wikipedia', 'wikidata_sparql'],
};

export class SourceRanker {
  /**
   * Query-type priority first, then domain priority, then the remaining
   * available sources in the order given. Only available names are returned.
   */
  rankSources(domain: Domain, queryType: QueryType, available: readonly SourceName[]): SourceName[] {
    const ranked: SourceName[] = [];
    const candidates = [...QUERY_TYPE_PRIORITY[queryType], ...DOMAIN_PRIORITY[domain], ...available];
    for (const name of candidates) {
      if (available.includes(name) && !ranked.includes(name)) {
        ranked.push(name);
      }
    }
    return ranked;
  }

  selectBestSource(domain: Domain, queryType: QueryType, available: readonly SourceName[]): SourceName | null {
    return this.rankSources(domain, queryType, available)[0] ?? null;
  }

  getFallbackSources(
    domain: Domain,
    queryType: QueryType,
    available: readonly SourceName[],
    exclude: readonly SourceName[] = []
  ): SourceName[] {
    return this.rankSources(domain, queryType, available).filter(name => !exclude.includes(name));
  }
}
