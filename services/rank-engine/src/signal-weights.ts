/**
 * Signal Weight Configuration
 *
 * The overall score is a weighted sum of three signals: skill match,
 * semantic similarity and experience. Weights can come from configuration
 * or be overridden per call; either way they are validated and normalized
 * to sum to 1.0 before use.
 *
 * @module signal-weights
 */

import { getLogger, invalidArgumentError, type Logger } from '@skillrank/common';

import type { ScoringWeights, SignalName } from './types';

export const SIGNAL_NAMES: readonly SignalName[] = ['skillMatch', 'semanticSimilarity', 'experience'];

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  skillMatch: 0.4,
  semanticSimilarity: 0.4,
  experience: 0.2
});

const SUM_TOLERANCE = 0.001;

/**
 * Throws invalid_argument unless every weight is finite and non-negative,
 * their sum is finite and at least one is positive.
 */
export function validateWeights(weights: ScoringWeights): void {
  let sum = 0;
  for (const key of SIGNAL_NAMES) {
    const value = weights[key];
    if (!Number.isFinite(value) || value < 0) {
      throw invalidArgumentError('Scoring weights must be finite and non-negative', { signal: key, value });
    }
    sum += value;
  }

  if (!Number.isFinite(sum)) {
    throw invalidArgumentError('Scoring weights must have a finite sum', { weights: { ...weights } });
  }

  if (sum === 0) {
    throw invalidArgumentError('Scoring weights must not all be zero', { weights: { ...weights } });
  }
}

/**
 * Normalizes weights to ensure they sum to 1.0.
 *
 * Weights already within 0.001 of 1.0 are returned as they are. Otherwise
 * each weight is divided by the sum and a warning is logged.
 */
export function normalizeWeights(weights: ScoringWeights, logger?: Logger): ScoringWeights {
  validateWeights(weights);

  let sum = 0;
  for (const key of SIGNAL_NAMES) {
    sum += weights[key];
  }

  if (Math.abs(sum - 1.0) <= SUM_TOLERANCE) {
    return { ...weights };
  }

  (logger ?? getLogger({ module: 'signal-weights' })).warn(
    { sum: Number(sum.toFixed(3)) },
    'Normalizing scoring weights to sum to 1.0.'
  );

  return {
    skillMatch: weights.skillMatch / sum,
    semanticSimilarity: weights.semanticSimilarity / sum,
    experience: weights.experience / sum
  };
}

/**
 * Merges per-call overrides over base weights, then normalizes.
 *
 * @example
 * resolveWeights({ experience: 0 }, DEFAULT_WEIGHTS)
 * // { skillMatch: 0.5, semanticSimilarity: 0.5, experience: 0 }
 */
export function resolveWeights(
  overrides: Partial<ScoringWeights> | undefined,
  base: ScoringWeights = DEFAULT_WEIGHTS,
  logger?: Logger
): ScoringWeights {
  if (!overrides || Object.keys(overrides).length === 0) {
    return normalizeWeights(base, logger);
  }

  return normalizeWeights(
    {
      skillMatch: overrides.skillMatch ?? base.skillMatch,
      semanticSimilarity: overrides.semanticSimilarity ?? base.semanticSimilarity,
      experience: overrides.experience ?? base.experience
    },
    logger
  );
}
