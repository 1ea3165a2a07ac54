/**
 * Similarity heuristics used by the similarity grouping strategy.
 *
 * Neither score is a true string metric: the content score compares
 * characters at equal positions, and the name score counts which distinct
 * characters of one stem occur anywhere in the other. Both are kept as-is
 * so that groupings stay stable across versions.
 */

import { fileStem } from './directory-scanner.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 60;

const PREFIX_MIN_LENGTH = 3;
const PREFIX_BONUS_PER_CHAR = 5;

/**
 * Score two digests: 100 when equal, otherwise the share of positions
 * holding the same character, over the longer key.
 */
export function contentSimilarity(key1: string, key2: string): number {
  if (key1 === key2) {
    return 100;
  }
  const total = Math.max(key1.length, key2.length);
  const overlap = Math.min(key1.length, key2.length);
  let common = 0;
  for (let i = 0; i < overlap; i++) {
    if (key1[i] === key2[i]) common++;
  }
  return (common / total) * 100;
}

/**
 * Length of the shared leading run, counted in code points.
 */
export function commonPrefixLength(s1: string, s2: string): number {
  const chars1 = Array.from(s1);
  const chars2 = Array.from(s2);
  const limit = Math.min(chars1.length, chars2.length);
  let length = 0;
  while (length < limit && chars1[length] === chars2[length]) {
    length++;
  }
  return length;
}

/**
 * Score two file stems (extension stripped, lowercased).
 * Lengths are counted in code points. Stems whose lengths differ by more
 * than half the longer one score 0.
 */
export function stemSimilarity(s1: string, s2: string): number {
  const chars1 = Array.from(s1);
  const chars2 = new Set(s2);
  const length2 = Array.from(s2).length;
  const total = Math.max(chars1.length, length2);
  if (Math.abs(chars1.length - length2) > Math.floor(total / 2)) {
    return 0;
  }

  let common = 0;
  for (const char of new Set(chars1)) {
    if (chars2.has(char)) common++;
  }
  let score = total > 0 ? (common / total) * 100 : 0;

  const prefixLength = commonPrefixLength(s1, s2);
  if (prefixLength >= PREFIX_MIN_LENGTH) {
    score = Math.min(100, score + prefixLength * PREFIX_BONUS_PER_CHAR);
  }
  return score;
}

export function nameSimilarity(name1: string, name2: string): number {
  return stemSimilarity(fileStem(name1).toLowerCase(), fileStem(name2).toLowerCase());
}
