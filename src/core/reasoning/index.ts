export { ReasoningService, getReasoningService, parseDomains, type ReasoningOptions } from './service.js';
export {
  extractAnswer,
  normalizeAnswer,
  measureAgreement,
  hasConsensus,
  stripMarkdown,
  lastSentence,
  ANSWER_MARKERS,
  MAX_ANSWER_LENGTH,
} from './answer-extraction.js';
export { isClaimStyle, selectTemperature, CLAIM_MARKER, TEMPERATURES } from './complexity.js';
