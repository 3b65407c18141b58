/**
 * Adaptive query generation: one query per (rationale, domain)
 */

import { createChildLogger } from '../../utils/logger.js';
import { cleanSparql } from '../knowledge/sources/wikidata.js';
import type { LLMGateway } from '../llm/index.js';
import { medicalQueryPrompt, searchQueryPrompt, sparqlPrompt } from '../prompts.js';
import type { Domain, GeneratedQuery, QueryType } from '../../types/index.js';

const log = createChildLogger('query-generator');

export const MAX_SPARQL_LENGTH = 2000;
export const MAX_TEXT_QUERY_LENGTH = 300;

const QUERY_LABEL = /^(?:search query|query|key medical terms(?: and concepts)?|medical terms|keywords)\s*:\s*/i;
const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/;

export function queryTypeFor(domain: Domain): QueryType {
  switch (domain) {
    case 'factual':
      return 'sparql';
    case 'medical':
      return 'medical';
    case 'physics':
    case 'biology':
      return 'natural_language';
  }
}

/**
 * Single-line keyword query from model output: fences, labels, list markers
 * and wrapping quotes removed
 */
export function cleanTextQuery(raw: string): string {
  const text = raw
    .replace(/```[a-z]*\n?/gi, '')
    .split('\n')
    .map(line => line.trim().replace(QUERY_LABEL, '').replace(LIST_MARKER, '').trim())
    .filter(line => line.length > 0)
    .join(' ')
    .replace(/^["'`]+|["'`]+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  return text.substring(0, MAX_TEXT_QUERY_LENGTH);
}

/**
 * Language-tagged literals of a SPARQL query as a keyword query
 */
export function keywordsFromSparql(sparql: string): string {
  const keywords: string[] = [];
  for (const match of sparql.matchAll(/"([^"]+)"@[a-z-]+|'([^']+)'@[a-z-]+/gi)) {
    const literal = (match[1] ?? match[2] ?? '').trim();
    if (literal && !keywords.includes(literal)) {
      keywords.push(literal);
    }
  }
  return keywords.join(' ').substring(0, MAX_TEXT_QUERY_LENGTH);
}

/**
 * Words a SPARQL result is expected to contain: the query's literals, then its
 * variable names split into words (`?capitalLabel` gives "capital label")
 */
export function sparqlSearchTerms(sparql: string): string {
  const terms = keywordsFromSparql(sparql).split(' ').filter(term => term.length > 0);
  for (const match of sparql.matchAll(/\?([A-Za-z_]\w*)/g)) {
    const words = match[1]
      .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
      .replace(/_/g, ' ')
      .toLowerCase()
      .split(' ');
    for (const word of words) {
      if (word && !terms.includes(word)) terms.push(word);
    }
  }
  return terms.join(' ');
}

export class QueryGenerator {
  private readonly gateway: LLMGateway;

  constructor(gateway: LLMGateway) {
    this.gateway = gateway;
  }

  async generateQuery(rationale: string, domain: Domain): Promise<GeneratedQuery> {
    const type = queryTypeFor(domain);
    const text = await this.queryText(rationale, type);
    log.debug({ domain, type, length: text.length }, 'Generated query');
    return { text, type, domain };
  }

  private async queryText(rationale: string, type: QueryType): Promise<string> {
    switch (type) {
      case 'sparql':
        return cleanSparql(await this.gateway.call(sparqlPrompt(rationale), 0)).substring(0, MAX_SPARQL_LENGTH);
      case 'medical':
        return cleanTextQuery(await this.gateway.call(medicalQueryPrompt(rationale), 0));
      case 'natural_language':
        return cleanTextQuery(await this.gateway.call(searchQueryPrompt(rationale), 0));
    }
  }
}
