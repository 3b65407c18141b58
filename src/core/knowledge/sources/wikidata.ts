/**
 * Wikidata SPARQL endpoint
 *
 * Model-written queries are cleaned and syntax-checked first; a query that
 * fails the check is skipped without a request.
 */

import { z } from 'zod';
import { config } from '../../../config/index.js';
import { createChildLogger } from '../../../utils/logger.js';
import { KnowledgeSourceError, errorMessage } from '../../../utils/errors.js';
import { getJson } from '../http.js';
import type { KnowledgeSource, SourceOptions } from '../types.js';

const log = createChildLogger('wikidata');

export const WIKIDATA_SPARQL_ENDPOINT = 'https://query.wikidata.org/sparql';
const MIN_QUERY_LENGTH = 20;

// An entity or property id followed directly by a capitalised word: a missing predicate or object
const MALFORMED_PATTERNS: readonly RegExp[] = [/wd:\w+\s+[A-Z]/, /wdt:\w+\s+[A-Z]/];

const sparqlResponseSchema = z.object({
  results: z.object({
    bindings: z.array(z.record(z.object({ value: z.string() }))),
  }),
});

type Binding = Record<string, { value: string }>;

/**
 * Strip code fences, a language tag, comments, and anything after the last `}`
 */
export function cleanSparql(raw: string): string {
  let query = raw;
  if (query.includes('```')) {
    const block = query.split('```').find(part => /SELECT|ASK/i.test(part));
    if (block !== undefined) query = block;
  }

  query = query.trim().replace(/^sparql\b/i, '').trim();

  query = query
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .join('\n');

  if (!query.endsWith('}') && query.includes('}')) {
    query = query.substring(0, query.lastIndexOf('}') + 1);
  }
  return query.trim();
}

export function isValidSparql(query: string): boolean {
  if (query.trim().length < MIN_QUERY_LENGTH) return false;

  const upper = query.toUpperCase();
  if (!upper.includes('SELECT') && !upper.includes('ASK')) return false;
  if (!upper.includes('WHERE')) return false;

  const opening = (query.match(/\{/g) ?? []).length;
  const closing = (query.match(/\}/g) ?? []).length;
  if (opening !== closing) return false;

  return !MALFORMED_PATTERNS.some(pattern => pattern.test(query));
}

/**
 * One line per binding: `key: value | key: value`, entity URIs shortened to their id
 */
export function formatBindings(bindings: readonly Binding[], topK: number): string[] {
  return bindings
    .slice(0, topK)
    .map(binding =>
      Object.entries(binding)
        .map(([key, { value }]) => {
          const entity = value.startsWith('http') ? value.split('/entity/') : [];
          return entity.length > 1 ? `${key}: ${entity[entity.length - 1]}` : `${key}: ${value}`;
        })
        .join(' | ')
    )
    .filter(line => line.length > 0);
}

export class WikidataSource implements KnowledgeSource {
  readonly name = 'wikidata_sparql';
  readonly kind = 'structured';
  private readonly options: SourceOptions;

  constructor(options: Partial<SourceOptions> = {}) {
    this.options = {
      timeout: config.knowledge.timeout,
      userAgent: config.knowledge.userAgent,
      ...options,
    };
  }

  async search(sparql: string, topK: number): Promise<string[]> {
    const query = cleanSparql(sparql);
    if (!isValidSparql(query)) {
      log.debug({ query: query.substring(0, 100) }, 'Invalid SPARQL query, skipping');
      return [];
    }

    try {
      const params = new URLSearchParams({ query, format: 'json' });
      const data = await getJson(`${WIKIDATA_SPARQL_ENDPOINT}?${params}`, sparqlResponseSchema, {
        ...this.options,
        source: this.name,
        accept: 'application/sparql-results+json',
      });
      const results = formatBindings(data.results.bindings, topK);
      log.debug({ results: results.length }, 'Wikidata query finished');
      return results;
    } catch (error) {
      if (error instanceof KnowledgeSourceError && error.status === 400) {
        log.debug({ query: query.substring(0, 100) }, 'SPARQL rejected by endpoint (400)');
      } else {
        log.warn(`Wikidata query failed: ${errorMessage(error)}`);
      }
      return [];
    }
  }
}
