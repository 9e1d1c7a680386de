/**
 * Character-level similarity between two texts.
 */

import { matchedCount } from './alignment.js';
import { splitChars } from './sequence.js';

/** Round to two decimal places */
export function roundRatio(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Similarity of two texts as a percentage: 2·M / T · 100, where M is the
 * number of characters matched by a longest common subsequence and T the
 * combined length. Two empty texts are identical (100).
 */
export function similarityRatio(original: string, modernized: string): number {
  const a = splitChars(original);
  const b = splitChars(modernized);
  const total = a.length + b.length;
  if (total === 0) return 100;

  return roundRatio(((2 * matchedCount(a, b)) / total) * 100);
}
