/**
 * Answer consolidation - one terse final answer from the corrected rationales
 */

import { createChildLogger } from '../../utils/logger.js';
import { getModelGateway, type LLMGateway } from '../llm/index.js';
import { claimConsolidationPrompt, consolidationPrompt } from '../prompts.js';
import { ANSWER_MARKERS, isClaimStyle, stripMarkdown } from '../reasoning/index.js';

const log = createChildLogger('consolidation');

export const MAX_FINAL_ANSWER_LENGTH = 200;

export const VERIFICATION_LABELS = ['SUPPORTS', 'REFUTES', 'NOT ENOUGH INFO'] as const;
export type VerificationLabel = (typeof VERIFICATION_LABELS)[number];

const LEADING_CONNECTIVES: readonly RegExp[] = [
  /^(?:therefore|thus|hence|so|in conclusion)(?=[\s,:]|$)[,:]?\s*/i,
  /^based on[^,:\n]*[,:]\s*/i,
];

const SURROUNDING_QUOTES = /^["'`“”‘’]+|["'`“”‘’]+$/g;
const TRAILING_PUNCTUATION = /[.!?,;:]+$/;
// "D.C.", "U.S.", "B." keep their final period
const SINGLE_LETTER_END = /(?:^|[\s.])[A-Za-z]\.$/;
const LONE_CHOICE = /^\(?([A-Za-z])[.):]?$/;

export function transcript(rationales: readonly string[]): string {
  return rationales.map((text, i) => `${i + 1}. ${text}`).join('\n');
}

function stripLeadingConnectives(text: string): string {
  let current = text;
  let previous = '';
  while (current !== previous) {
    previous = current;
    for (const pattern of LEADING_CONNECTIVES) {
      current = current.replace(pattern, '').trim();
    }
  }
  return current;
}

function afterLastMarker(text: string): string {
  const lower = text.toLowerCase();
  for (const marker of ANSWER_MARKERS) {
    const at = lower.lastIndexOf(marker);
    if (at === -1) continue;
    const answer = text.slice(at + marker.length).trim().split('\n')[0].replace(/^[:\s]+/, '').trim();
    if (answer) return answer;
  }
  return '';
}

function lastNonEmptySentence(text: string): string {
  const sentences = text
    .split(/(?<=[.!?])\s+/)
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0);
  return sentences[sentences.length - 1] ?? '';
}

/**
 * Reduce a raw consolidation reply to the bare answer
 */
export function cleanConsolidatedAnswer(raw: string): string {
  const text = stripLeadingConnectives(stripMarkdown(raw));

  let answer = afterLastMarker(text) || lastNonEmptySentence(text);
  answer = stripLeadingConnectives(answer).replace(SURROUNDING_QUOTES, '').trim();
  if (!SINGLE_LETTER_END.test(answer)) {
    answer = answer.replace(TRAILING_PUNCTUATION, '').trim();
  }

  const choice = LONE_CHOICE.exec(answer);
  if (choice) {
    answer = choice[1];
  }
  return answer.substring(0, MAX_FINAL_ANSWER_LENGTH);
}

const LABEL_PATTERNS: ReadonlyArray<[RegExp, VerificationLabel]> = [
  [/\bNOT\s+ENOUGH\b/, 'NOT ENOUGH INFO'],
  [/(?:\bNOT|N'T|\bNEVER)\s+(?:BEEN\s+|BE\s+)?SUPPORT/, 'REFUTES'],
  [/\bREFUT/, 'REFUTES'],
  [/\bSUPPORT/, 'SUPPORTS'],
];

/**
 * Map a verification reply onto one of the three labels. The label mentioned
 * first wins; a negated "support" reads as REFUTES.
 */
export function toVerificationLabel(answer: string): VerificationLabel {
  const upper = answer.toUpperCase();
  let best: { index: number; label: VerificationLabel } | undefined;
  for (const [pattern, label] of LABEL_PATTERNS) {
    const match = pattern.exec(upper);
    if (match && (!best || match.index < best.index)) {
      best = { index: match.index, label };
    }
  }
  return best?.label ?? 'NOT ENOUGH INFO';
}

export class AnswerConsolidator {
  private readonly gateway: LLMGateway;

  constructor(gateway: LLMGateway) {
    this.gateway = gateway;
  }

  async consolidate(question: string, corrected: readonly string[], datasetHint?: string): Promise<string> {
    const steps = transcript(corrected);
    const claim = isClaimStyle(question, datasetHint);
    const prompt = claim ? claimConsolidationPrompt(question, steps) : consolidationPrompt(question, steps);

    const reply = await this.gateway.call(prompt, 0);
    const answer = claim ? toVerificationLabel(stripMarkdown(reply)) : cleanConsolidatedAnswer(reply);
    log.info({ claim, answerLength: answer.length }, 'Final answer consolidated');
    return answer;
  }
}

export function getAnswerConsolidator(): AnswerConsolidator {
  return new AnswerConsolidator(getModelGateway());
}
