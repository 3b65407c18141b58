/**
 * Tests for answer extraction and consensus helpers
 */

import { describe, it, expect } from 'vitest';
import {
  extractAnswer,
  hasConsensus,
  lastSentence,
  measureAgreement,
  normalizeAnswer,
  stripMarkdown,
} from './answer-extraction.js';

describe('extractAnswer', () => {
  it('should take the text after an explicit marker', () => {
    expect(extractAnswer('Paris is the seat of government.\nAnswer: Paris')).toBe('Paris');
  });

  it('should strip markdown emphasis and keep the first sentence', () => {
    expect(extractAnswer('**Final Answer:** Paris. It is in France.')).toBe('Paris.');
  });

  it('should cut at a trailing connective', () => {
    expect(extractAnswer('The answer is 42 Therefore we stop here')).toBe('42');
  });

  it('should match markers case-insensitively at their last occurrence', () => {
    const rationale = 'ANSWER: maybe Lyon\nLet me reconsider the facts.\nanswer: Paris';
    expect(extractAnswer(rationale)).toBe('Paris');
  });

  it('should only keep the first line after the marker', () => {
    expect(extractAnswer('Answer: B\nBecause option B is the only noble gas.')).toBe('B');
  });

  it('should fall back to the last sentence without a leading connective', () => {
    const rationale = 'Paris is large. It has many museums. So the capital is Paris.';
    expect(extractAnswer(rationale)).toBe('the capital is Paris');
  });

  it('should bound the answer length', () => {
    expect(extractAnswer(`Answer: ${'x'.repeat(150)}`)).toHaveLength(100);
  });
});

describe('lastSentence', () => {
  it('should return the text itself when there is no period', () => {
    expect(lastSentence('  no punctuation here ')).toBe('no punctuation here');
  });

  it('should strip a connective followed by a comma', () => {
    expect(lastSentence('Both are cities. Therefore, Paris')).toBe('Paris');
  });
});

describe('stripMarkdown', () => {
  it('should remove bold and italic markers', () => {
    expect(stripMarkdown(' **Paris** is *big* ')).toBe('Paris is big');
  });
});

describe('normalizeAnswer', () => {
  it('should strip answer prefixes, case and trailing punctuation', () => {
    expect(normalizeAnswer('The answer is Paris.')).toBe('paris');
    expect(normalizeAnswer('Answer: Paris')).toBe('paris');
    expect(normalizeAnswer('So,  Paris')).toBe('paris');
  });

  it('should only strip whole-word prefixes', () => {
    expect(normalizeAnswer('Sofia')).toBe('sofia');
  });

  it('should keep hyphenated words that begin with a prefix', () => {
    expect(normalizeAnswer('So-called dark matter')).toBe('so-called dark matter');
    expect(normalizeAnswer('Thus-far untested')).toBe('thus-far untested');
  });

  it('should collapse whitespace', () => {
    expect(normalizeAnswer('New   York\tCity')).toBe('new york city');
  });
});

describe('measureAgreement', () => {
  it('should group answers by normalized form', () => {
    const agreement = measureAgreement(['Paris', 'paris.', 'The answer is Paris', 'Lyon', 'Paris']);
    expect(agreement).toEqual({ answer: 'Paris', share: 0.8 });
  });

  it('should break ties in favour of the first group seen', () => {
    expect(measureAgreement(['Lyon', 'Paris'])).toEqual({ answer: 'Lyon', share: 0.5 });
  });

  it('should report zero share for no answers', () => {
    expect(measureAgreement([])).toEqual({ answer: '', share: 0 });
  });
});

describe('hasConsensus', () => {
  const sevenOfTen = ['a', 'a', 'a', 'a', 'a', 'a', 'a', 'b', 'b', 'b'];

  it('should return false when the share equals the threshold', () => {
    expect(hasConsensus(sevenOfTen, 0.7)).toBe(false);
  });

  it('should return true when the share exceeds the threshold', () => {
    expect(hasConsensus(['Paris', 'Paris', 'Paris', 'Paris', 'Lyon'], 0.7)).toBe(true);
  });

  it('should return false for two-way splits at the nominal threshold', () => {
    expect(hasConsensus(['Paris', 'Lyon'], 0.5)).toBe(false);
  });

  it('should return false for no answers', () => {
    expect(hasConsensus([], 0)).toBe(false);
  });
});
