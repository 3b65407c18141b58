export {
  RetrievalService,
  getRetrievalService,
  NO_RESULTS,
  DEFAULT_RETRIEVAL_OPTIONS,
  type RetrievalOptions,
} from './service.js';
export {
  QueryGenerator,
  queryTypeFor,
  cleanTextQuery,
  keywordsFromSparql,
  sparqlSearchTerms,
  MAX_SPARQL_LENGTH,
  MAX_TEXT_QUERY_LENGTH,
} from './query-generator.js';
