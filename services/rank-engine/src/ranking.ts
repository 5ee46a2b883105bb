/**
 * Ranking over a complete set of scoring results.
 *
 * @module ranking
 */

import { invalidArgumentError } from '@skillrank/common';

import type { ScoringResult } from './types';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;
export const DEFAULT_TOP_K = 10;

/** Descending by overall score; Array.prototype.sort is stable, so ties keep input order. */
function sortByScore<T extends ScoringResult>(results: readonly T[]): T[] {
  return [...results].sort((a, b) => b.overallScore - a.overallScore);
}

/**
 * Orders results by overall score and assigns ranks 1..n.
 * Returns new result objects; the inputs keep their rank.
 *
 * @example
 * rank([r1 (0.75), r2 (0.90), r3 (0.60)]) // [r2 rank 1, r1 rank 2, r3 rank 3]
 */
export function rank<T extends ScoringResult>(results: readonly T[]): T[] {
  return sortByScore(results).map((result, index) => ({ ...result, rank: index + 1 }));
}

/**
 * Results whose overall score is at least the threshold, in input order.
 */
export function filterByThreshold<T extends ScoringResult>(
  results: readonly T[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): T[] {
  if (!Number.isFinite(threshold)) {
    throw invalidArgumentError('Threshold must be a finite number', { threshold });
  }

  return results.filter((result) => result.overallScore >= threshold);
}

/**
 * The k highest-scoring results. Sorts afresh and ignores any existing rank.
 */
export function topK<T extends ScoringResult>(results: readonly T[], k: number = DEFAULT_TOP_K): T[] {
  if (!Number.isInteger(k) || k < 0) {
    throw invalidArgumentError('k must be a non-negative integer', { k });
  }

  return sortByScore(results).slice(0, k);
}
