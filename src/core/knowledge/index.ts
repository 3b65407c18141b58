export type { KnowledgeSource, SourceKind, SourceOptions } from './types.js';
export {
  RelevanceScorer,
  scoreItem,
  sequenceSimilarity,
  DEFAULT_RELEVANCE_THRESHOLD,
  DEFAULT_TOP_K,
} from './relevance-scorer.js';
export { SourceRanker } from './source-ranker.js';
export { KnowledgeSourceRegistry, createSource, getKnowledgeSourceRegistry } from './registry.js';
export { WikipediaSource, truncateQuery } from './sources/wikipedia.js';
export { WikidataSource, cleanSparql, isValidSparql, formatBindings } from './sources/wikidata.js';
export { WebSearchSource, parseResults } from './sources/web-search.js';
