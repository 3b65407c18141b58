/**
 * Named collection of knowledge sources
 */

import { config } from '../../config/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { withTimeout } from '../../utils/retry.js';
import type { RawKnowledge, SourceName } from '../../types/index.js';
import type { KnowledgeSource } from './types.js';
import { WikipediaSource } from './sources/wikipedia.js';
import { WikidataSource } from './sources/wikidata.js';
import { WebSearchSource } from './sources/web-search.js';

const log = createChildLogger('knowledge-registry');

export class KnowledgeSourceRegistry {
  private readonly sources = new Map<SourceName, KnowledgeSource>();
  private readonly timeoutMs: number;

  constructor(sources: readonly KnowledgeSource[] = [], timeoutMs = config.knowledge.timeout) {
    this.timeoutMs = timeoutMs;
    for (const source of sources) {
      this.register(source);
    }
  }

  register(source: KnowledgeSource): void {
    this.sources.set(source.name, source);
    log.debug({ source: source.name, kind: source.kind }, 'Registered knowledge source');
  }

  get(name: SourceName): KnowledgeSource | undefined {
    return this.sources.get(name);
  }

  /** Registered names in registration order */
  names(): SourceName[] {
    return [...this.sources.keys()];
  }

  /**
   * Query the named sources concurrently, each bounded by the per-source timeout.
   * Results are merged in the order the names were given; a failing or slow
   * source contributes nothing.
   */
  async searchMany(names: readonly SourceName[], query: string, topK: number): Promise<RawKnowledge[]> {
    const targets = names
      .map(name => this.sources.get(name))
      .filter((source): source is KnowledgeSource => source !== undefined);

    const settled = await Promise.allSettled(
      targets.map(source => withTimeout(source.search(query, topK), this.timeoutMs, source.name))
    );

    const merged: RawKnowledge[] = [];
    settled.forEach((outcome, i) => {
      const source = targets[i];
      if (outcome.status === 'rejected') {
        log.warn({ source: source.name }, `Knowledge source failed: ${errorMessage(outcome.reason)}`);
        return;
      }
      for (const content of outcome.value) {
        if (content.trim()) merged.push({ content, source: source.name });
      }
    });
    return merged;
  }

  /**
   * Query every registered source; one result list per source name
   */
  async searchAll(query: string, topK = config.knowledge.topK): Promise<Partial<Record<SourceName, string[]>>> {
    const names = this.names();
    const items = await this.searchMany(names, query, topK);
    const results: Partial<Record<SourceName, string[]>> = {};
    for (const name of names) {
      results[name] = items.filter(item => item.source === name).map(item => item.content);
    }
    return results;
  }
}

export function createSource(name: SourceName): KnowledgeSource {
  switch (name) {
    case 'wikipedia':
      return new WikipediaSource();
    case 'wikidata_sparql':
      return new WikidataSource();
    case 'duckduckgo':
      return new WebSearchSource();
  }
}

// Singleton instance; the web source's request budget lives with it
let registry: KnowledgeSourceRegistry | null = null;

export function getKnowledgeSourceRegistry(): KnowledgeSourceRegistry {
  if (!registry) {
    registry = new KnowledgeSourceRegistry(config.knowledge.sources.map(createSource));
  }
  return registry;
}
