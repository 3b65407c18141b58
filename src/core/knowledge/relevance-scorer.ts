/**
 * Heuristic relevance of a knowledge snippet to a query
 *
 * score = 0.4 * word overlap
 *       + 0.3 exact query substring (or 0.15 when a query word longer than 3 chars appears)
 *       + 0.3 * sequence similarity against the first 500 chars
 */

import type { KnowledgeItem, RawKnowledge } from '../../types/index.js';

const OVERLAP_WEIGHT = 0.4;
const EXACT_MATCH_BONUS = 0.3;
const PARTIAL_MATCH_BONUS = 0.15;
const SIMILARITY_WEIGHT = 0.3;
const SIMILARITY_WINDOW = 500;

export const DEFAULT_RELEVANCE_THRESHOLD = 0.1;
export const DEFAULT_TOP_K = 3;

function words(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(word => word.length > 0));
}

type Match = [start1: number, start2: number, size: number];

function longestMatch(
  a: string,
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Match {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const size = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    j2len = next;
  }

  return [bestI, bestJ, bestSize];
}

/**
 * Ratcliff/Obershelp similarity 2M/T, where M counts characters in the
 * recursively found longest common blocks. 1 for two empty strings.
 */
export function sequenceSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const positions = b2j.get(b[j]);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(b[j], [j]);
    }
  }

  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const [i, j, size] = longestMatch(a, b2j, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) pending.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
  }

  return (2 * matched) / total;
}

/**
 * Relevance of one snippet, in [0, 1]
 */
export function scoreItem(query: string, content: string): number {
  const queryLower = query.toLowerCase().trim();
  if (!queryLower || !content.trim()) return 0;

  const contentLower = content.toLowerCase();
  const queryWords = words(queryLower);
  const contentWords = words(contentLower);

  let overlap = 0;
  for (const word of queryWords) {
    if (contentWords.has(word)) overlap++;
  }
  let score = OVERLAP_WEIGHT * (overlap / queryWords.size);

  if (contentLower.includes(queryLower)) {
    score += EXACT_MATCH_BONUS;
  } else if ([...queryWords].some(word => word.length > 3 && contentLower.includes(word))) {
    score += PARTIAL_MATCH_BONUS;
  }

  score += SIMILARITY_WEIGHT * sequenceSimilarity(queryLower, contentLower.substring(0, SIMILARITY_WINDOW));

  return Math.min(1, Math.max(0, score));
}

export class RelevanceScorer {
  /**
   * Score snippets against a query, highest first
   */
  score(query: string, items: readonly RawKnowledge[]): KnowledgeItem[] {
    return items
      .map(item => ({ content: item.content, source: item.source, score: scoreItem(query, item.content) }))
      .sort((a, b) => b.score - a.score);
  }

  filterByThreshold(items: readonly KnowledgeItem[], threshold = DEFAULT_RELEVANCE_THRESHOLD): KnowledgeItem[] {
    return items.filter(item => item.score >= threshold);
  }

  getTopK(items: readonly KnowledgeItem[], k = DEFAULT_TOP_K): KnowledgeItem[] {
    return items.slice(0, k);
  }
}
