/**
 * Knowledge source capability
 */

import type { SourceName } from '../../types/index.js';

/**
 * `text` sources take keyword or natural-language queries; `structured` sources
 * only take SPARQL.
 */
export type SourceKind = 'text' | 'structured';

export interface KnowledgeSource {
  readonly name: SourceName;
  readonly kind: SourceKind;
  /**
   * Resolve to at most `topK` snippets. Implementations resolve to `[]` on any
   * failure instead of rejecting.
   */
  search(query: string, topK: number): Promise<string[]>;
}

export interface SourceOptions {
  timeout: number;
  userAgent: string;
}
