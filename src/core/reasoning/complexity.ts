/**
 * Question classification heuristics
 */

export const CLAIM_MARKER = 'Claim:';

export const TEMPERATURES = {
  claim: 0.2,
  multiHop: 0.8,
  explanatory: 0.5,
  simple: 0.3,
  default: 0.7,
} as const;

const MULTI_HOP_PATTERNS: readonly RegExp[] = [
  /\b(?:who|which|that) (?:directed|wrote|founded|played|starred|created|invented|discovered)\b/,
  /\bboth\b/,
  /\bthe same\b/,
  /\bwhich (?:of|one)\b/,
];

const EXPLANATORY_PATTERNS: readonly RegExp[] = [
  /\bwhy\b/,
  /\bhow does\b/,
  /\bexplain\b/,
  /\bcompare\b/,
  /\bdifference between\b/,
  /\bversus\b/,
  /\bvs\b/,
];

const SIMPLE_PATTERNS: readonly RegExp[] = [
  /^(?:what|who|when|where) (?:is|was|are|were)\b/,
  /\bcapital of\b/,
  /\bhow many\b/,
  /\bwhat year\b/,
];

/**
 * Claim-verification input: the literal marker, or the fever dataset hint
 */
export function isClaimStyle(question: string, datasetHint?: string): boolean {
  return question.includes(CLAIM_MARKER) || datasetHint?.toLowerCase() === 'fever';
}

/**
 * Sampling temperature for rationale generation
 */
export function selectTemperature(question: string, datasetHint?: string): number {
  if (isClaimStyle(question, datasetHint)) return TEMPERATURES.claim;

  const text = question.toLowerCase().trim();
  if (MULTI_HOP_PATTERNS.some(pattern => pattern.test(text))) return TEMPERATURES.multiHop;
  if (EXPLANATORY_PATTERNS.some(pattern => pattern.test(text))) return TEMPERATURES.explanatory;
  if (SIMPLE_PATTERNS.some(pattern => pattern.test(text))) return TEMPERATURES.simple;
  return TEMPERATURES.default;
}
