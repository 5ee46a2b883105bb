/**
 * Signal Calculators
 *
 * Pure functions that turn candidate and target data into 0-1 signals:
 *
 * - calculateSkillMatch - required skill coverage blended with Jaccard overlap
 * - calculateSemanticSimilarity - embedding similarity rescaled into [0, 1]
 * - calculateExperienceScore - years of experience against the requirement
 *
 * @module signal-calculators
 */

import { invalidArgumentError } from '@skillrank/common';

import type { CanonicalSkill, Embedding, SkillMatchResult } from './types';
import { computeSimilarity, isSimilarityMethod } from './vector-utils';

// ============================================================================
// Constants
// ============================================================================

const COVERAGE_WEIGHT = 0.7;
const JACCARD_WEIGHT = 0.3;

/** Extra years beyond the requirement that earn the full bonus */
const EXPERIENCE_BONUS_SPAN_YEARS = 5;
const EXPERIENCE_BONUS_CAP = 0.2;

export const DEFAULT_MAX_EXPERIENCE_YEARS = 20;

// ============================================================================
// Signal Calculator Functions
// ============================================================================

/**
 * Scores how well candidate skills cover the required skills.
 *
 * score = 0.7 * |C∩J| / |J| + 0.3 * |C∩J| / |C∪J|
 *
 * An empty requirement set scores 1.0 with no matched skills.
 *
 * @example
 * calculateSkillMatch(['python', 'django', 'postgresql', 'docker'], ['python', 'django', 'aws'])
 * // score ≈ 0.5867, coverage 2/3, jaccard 2/5, matched ['django', 'python']
 */
export function calculateSkillMatch(
  candidateSkills: Iterable<CanonicalSkill>,
  requiredSkills: Iterable<CanonicalSkill>
): SkillMatchResult {
  const required = new Set(requiredSkills);
  if (required.size === 0) {
    return { score: 1.0, coverage: 1.0, jaccard: 1.0, matched: [] };
  }

  const candidate = new Set(candidateSkills);
  const matched = [...required].filter((skill) => candidate.has(skill)).sort();

  const union = new Set([...candidate, ...required]);
  const coverage = matched.length / required.size;
  const jaccard = matched.length / union.size;

  return {
    score: COVERAGE_WEIGHT * coverage + JACCARD_WEIGHT * jaccard,
    coverage,
    jaccard,
    matched
  };
}

/**
 * Embedding similarity as a 0-1 signal.
 *
 * - cosine: (cos + 1) / 2, 0 when either vector has zero magnitude
 * - dot: clamped to [-1, 1], then rescaled like cosine
 * - euclidean: 1 / (1 + distance)
 */
export function calculateSemanticSimilarity(
  candidateEmbedding: Embedding,
  targetEmbedding: Embedding,
  method: string = 'cosine'
): number {
  if (!isSimilarityMethod(method)) {
    throw invalidArgumentError(`Unknown similarity method: ${method}`, { method });
  }

  const similarity = computeSimilarity(candidateEmbedding, targetEmbedding, method);

  switch (method) {
    case 'cosine':
      if (isZeroVector(candidateEmbedding) || isZeroVector(targetEmbedding)) {
        return 0;
      }
      return clampUnit((similarity + 1) / 2);
    case 'dot':
      return clampUnit((Math.max(-1, Math.min(1, similarity)) + 1) / 2);
    case 'euclidean':
      return clampUnit(similarity);
  }
}

/**
 * Experience fit.
 *
 * - no requirement: years / maxYears, capped at 1
 * - at or above the requirement: 1 plus a bonus of up to 0.2, capped at 1
 * - below the requirement: years / required
 *
 * @example
 * calculateExperienceScore(5, 3)  // 1.0
 * calculateExperienceScore(3, 5)  // 0.6
 */
export function calculateExperienceScore(
  candidateYears: number,
  requiredYears?: number,
  maxYears: number = DEFAULT_MAX_EXPERIENCE_YEARS
): number {
  if (!Number.isFinite(candidateYears) || candidateYears < 0) {
    throw invalidArgumentError('Experience years must be a non-negative number', { candidateYears });
  }

  if (requiredYears === undefined) {
    return Math.min(candidateYears / maxYears, 1.0);
  }

  if (!Number.isFinite(requiredYears) || requiredYears < 0) {
    throw invalidArgumentError('Required experience years must be a non-negative number', { requiredYears });
  }

  if (candidateYears >= requiredYears) {
    const bonus = Math.min((candidateYears - requiredYears) / EXPERIENCE_BONUS_SPAN_YEARS, EXPERIENCE_BONUS_CAP);
    return Math.min(1.0 + bonus, 1.0);
  }

  return candidateYears / requiredYears;
}

// ============================================================================
// Helpers
// ============================================================================

function isZeroVector(v: Embedding): boolean {
  return v.every((value) => value === 0);
}

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}
