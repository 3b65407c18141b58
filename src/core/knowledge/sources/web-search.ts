/**
 * DuckDuckGo web search over the HTML endpoint, parsed with cheerio
 */

import * as cheerio from 'cheerio';
import { config } from '../../../config/index.js';
import { createChildLogger } from '../../../utils/logger.js';
import { errorMessage } from '../../../utils/errors.js';
import { httpGet } from '../http.js';
import type { KnowledgeSource, SourceOptions } from '../types.js';

const log = createChildLogger('duckduckgo');

export const DUCKDUCKGO_HTML_ENDPOINT = 'https://html.duckduckgo.com/html/';
export const MAX_SNIPPET_LENGTH = 200;

export interface WebSearchOptions extends SourceOptions {
  /** Requests allowed per process before the source goes quiet */
  requestLimit: number;
}

/**
 * Result snippets (or titles when a result has no snippet) from a results page
 */
export function parseResults(html: string, topK: number): string[] {
  const $ = cheerio.load(html);
  const snippets: string[] = [];

  $('.result').each((_, element) => {
    if (snippets.length >= topK) return false;
    const result = $(element);
    const snippet = result.find('.result__snippet').text().trim() || result.find('.result__title').text().trim();
    const text = snippet.replace(/\s+/g, ' ').substring(0, MAX_SNIPPET_LENGTH);
    if (text) snippets.push(text);
    return undefined;
  });

  return snippets;
}

export class WebSearchSource implements KnowledgeSource {
  readonly name = 'duckduckgo';
  readonly kind = 'text';
  private readonly options: WebSearchOptions;
  private requestCount = 0;

  constructor(options: Partial<WebSearchOptions> = {}) {
    this.options = {
      timeout: config.knowledge.timeout,
      userAgent: config.knowledge.userAgent,
      requestLimit: config.knowledge.webSearchLimit,
      ...options,
    };
  }

  get requestsMade(): number {
    return this.requestCount;
  }

  async search(query: string, topK: number): Promise<string[]> {
    const text = query.trim();
    if (!text) return [];
    if (this.requestCount >= this.options.requestLimit) {
      log.warn({ limit: this.options.requestLimit }, 'DuckDuckGo request limit reached, skipping');
      return [];
    }

    this.requestCount++;
    try {
      const response = await httpGet(`${DUCKDUCKGO_HTML_ENDPOINT}?${new URLSearchParams({ q: text })}`, {
        ...this.options,
        source: this.name,
        accept: 'text/html',
      });
      const results = parseResults(await response.text(), topK);
      log.debug({ query: text, results: results.length }, 'DuckDuckGo search');
      return results;
    } catch (error) {
      log.debug({ query: text }, `DuckDuckGo search failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
