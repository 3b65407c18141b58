/**
 * Wikipedia: MediaWiki full-text search, then the REST summary of each hit
 */

import { z } from 'zod';
import { config } from '../../../config/index.js';
import { createChildLogger } from '../../../utils/logger.js';
import { errorMessage } from '../../../utils/errors.js';
import { getJson } from '../http.js';
import type { KnowledgeSource, SourceOptions } from '../types.js';

const log = createChildLogger('wikipedia');

export const MAX_QUERY_LENGTH = 300;
export const MAX_SUMMARY_LENGTH = 300;

export interface WikipediaOptions extends SourceOptions {
  language: string;
}

const searchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({ title: z.string() })),
  }),
});

const summaryResponseSchema = z.object({
  title: z.string().optional(),
  extract: z.string().default(''),
});

export function truncateQuery(query: string): string {
  return query.length > MAX_QUERY_LENGTH ? `${query.substring(0, MAX_QUERY_LENGTH - 3)}...` : query;
}

export class WikipediaSource implements KnowledgeSource {
  readonly name = 'wikipedia';
  readonly kind = 'text';
  private readonly options: WikipediaOptions;

  constructor(options: Partial<WikipediaOptions> = {}) {
    this.options = {
      timeout: config.knowledge.timeout,
      userAgent: config.knowledge.userAgent,
      language: config.knowledge.wikipediaLanguage,
      ...options,
    };
  }

  private get baseUrl(): string {
    return `https://${this.options.language}.wikipedia.org`;
  }

  async search(query: string, topK: number): Promise<string[]> {
    const text = truncateQuery(query.trim());
    if (!text) return [];

    try {
      const params = new URLSearchParams({
        action: 'query',
        list: 'search',
        srsearch: text,
        srlimit: String(topK),
        format: 'json',
      });
      const data = await getJson(`${this.baseUrl}/w/api.php?${params}`, searchResponseSchema, {
        ...this.options,
        source: this.name,
      });

      const titles = data.query.search.slice(0, topK).map(hit => hit.title);
      const summaries = await Promise.all(titles.map(title => this.summary(title)));
      const results = summaries.filter(summary => summary.length > 0);
      log.debug({ query: text, titles: titles.length, results: results.length }, 'Wikipedia search');
      return results;
    } catch (error) {
      log.warn({ query: text }, `Wikipedia search failed: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Page summary cut to MAX_SUMMARY_LENGTH; empty when the page cannot be read
   */
  private async summary(title: string): Promise<string> {
    const path = encodeURIComponent(title.replace(/ /g, '_'));
    try {
      const data = await getJson(`${this.baseUrl}/api/rest_v1/page/summary/${path}`, summaryResponseSchema, {
        ...this.options,
        source: this.name,
      });
      return data.extract.trim().substring(0, MAX_SUMMARY_LENGTH);
    } catch (error) {
      log.debug({ title }, `Could not read page summary: ${errorMessage(error)}`);
      return '';
    }
  }
}
