/**
 * Pure string transforms for pulling a short answer out of free-text reasoning
 */

import type { Agreement } from '../../types/index.js';

export const MAX_ANSWER_LENGTH = 100;

/** Checked in order; each matched at its last occurrence */
export const ANSWER_MARKERS = [
  'final answer:',
  'answer:',
  'conclusion:',
  'the answer is',
  'answer is',
] as const;

const TRAILING_CONNECTIVE = /\b(?:Therefore|Thus|Hence)\b/;
const LEADING_CONNECTIVE = /^(?:So|Thus|Therefore|Hence)\b[,\s]*/;

const NORMALIZE_PREFIXES: readonly RegExp[] = [
  /^the answer is(?=[\s,:]|$)/,
  /^answer:/,
  /^therefore(?=[\s,:]|$)/,
  /^thus(?=[\s,:]|$)/,
  /^so(?=[\s,:]|$)/,
];

export function stripMarkdown(text: string): string {
  return text.replace(/\*\*/g, '').replace(/\*/g, '').trim();
}

/**
 * Last non-empty period-delimited sentence, without a leading connective
 */
export function lastSentence(text: string): string {
  const sentences = text
    .split('.')
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0);
  const last = sentences[sentences.length - 1];
  if (last === undefined) {
    return text.trim();
  }
  return last.replace(LEADING_CONNECTIVE, '').trim();
}

function answerAfterMarker(text: string, marker: string): string {
  const at = text.toLowerCase().lastIndexOf(marker);
  if (at === -1) return '';

  const firstLine = text.slice(at + marker.length).trim().split('\n')[0];
  let answer = firstLine.split(TRAILING_CONNECTIVE)[0].trim();
  answer = answer.replace(/^[:\s]+/, '').trim();
  if (answer.includes('. ')) {
    answer = `${answer.split('. ')[0]}.`;
  }
  return answer.trim();
}

/**
 * Short answer used for consensus voting. Never the final answer.
 */
export function extractAnswer(rationale: string): string {
  const text = stripMarkdown(rationale);

  for (const marker of ANSWER_MARKERS) {
    const answer = answerAfterMarker(text, marker);
    if (answer) {
      return answer.substring(0, MAX_ANSWER_LENGTH);
    }
  }

  return lastSentence(text).substring(0, MAX_ANSWER_LENGTH);
}

/**
 * Comparison form of an extracted answer
 */
export function normalizeAnswer(answer: string): string {
  let normalized = answer.toLowerCase().trim();
  for (const prefix of NORMALIZE_PREFIXES) {
    if (prefix.test(normalized)) {
      normalized = normalized.replace(prefix, '').replace(/^[\s:,]+/, '');
    }
  }
  normalized = normalized.replace(/\s+/g, ' ').trim().substring(0, MAX_ANSWER_LENGTH);
  return normalized.replace(/[.!?,;:]+$/, '').trim();
}

/**
 * Modal answer by normalized form. Ties go to the group seen first; the
 * representative is the first raw answer of the group.
 */
export function measureAgreement(answers: readonly string[]): Agreement {
  if (answers.length === 0) {
    return { answer: '', share: 0 };
  }

  const groups = new Map<string, { answer: string; count: number }>();
  for (const answer of answers) {
    const key = normalizeAnswer(answer);
    const group = groups.get(key);
    if (group) {
      group.count++;
    } else {
      groups.set(key, { answer, count: 1 });
    }
  }

  let best: { answer: string; count: number } | undefined;
  for (const group of groups.values()) {
    if (!best || group.count > best.count) {
      best = group;
    }
  }

  return best
    ? { answer: best.answer, share: best.count / answers.length }
    : { answer: '', share: 0 };
}

/**
 * True iff the modal share is strictly greater than the threshold
 */
export function hasConsensus(answers: readonly string[], threshold: number): boolean {
  if (answers.length === 0) return false;
  return measureAgreement(answers).share > threshold;
}
