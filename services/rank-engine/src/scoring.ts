/**
 * Scoring Engine
 *
 * Combines the three signals into one ScoringResult per (candidate, target)
 * pair. The engine holds only read-only settings, so one instance can score
 * any number of candidates independently.
 *
 * @module scoring
 */

import { getLogger, invalidArgumentError, type Logger } from '@skillrank/common';

import { normalizeWeights, DEFAULT_WEIGHTS } from './signal-weights';
import {
  calculateExperienceScore,
  calculateSemanticSimilarity,
  calculateSkillMatch,
  DEFAULT_MAX_EXPERIENCE_YEARS
} from './signal-calculators';
import type {
  CandidateComparison,
  CandidateProfile,
  ScoringResult,
  ScoringWeights,
  SignalName,
  SimilarityMethod,
  TargetProfile
} from './types';
import { isSimilarityMethod } from './vector-utils';

export type SignalScores = Record<SignalName, number>;

export interface ScoringEngineOptions {
  weights?: ScoringWeights;
  /** Accepts any string so configured values can be checked here */
  similarityMethod?: string;
  maxExperienceYears?: number;
  logger?: Logger;
}

/** Overall score difference below which two candidates are considered tied */
export const COMPARISON_TIE_MARGIN = 0.05;

/**
 * Computes the final weighted score from individual signals.
 *
 * @param weights - Must already be normalized
 *
 * @example
 * computeWeightedScore(
 *   { skillMatch: 0.8, semanticSimilarity: 0.6, experience: 1.0 },
 *   { skillMatch: 0.4, semanticSimilarity: 0.4, experience: 0.2 }
 * ); // 0.76
 */
export function computeWeightedScore(signals: SignalScores, weights: ScoringWeights): number {
  let score = 0;
  score += signals.skillMatch * weights.skillMatch;
  score += signals.semanticSimilarity * weights.semanticSimilarity;
  score += signals.experience * weights.experience;

  return Math.max(0, Math.min(1, score));
}

export class ScoringEngine {
  readonly weights: ScoringWeights;
  readonly similarityMethod: SimilarityMethod;
  readonly maxExperienceYears: number;
  private readonly logger: Logger;

  constructor(options: ScoringEngineOptions = {}) {
    this.logger = options.logger ?? getLogger({ module: 'scoring-engine' });

    const method = options.similarityMethod ?? 'cosine';
    if (!isSimilarityMethod(method)) {
      throw invalidArgumentError(`Unknown similarity method: ${method}`, { method });
    }

    const maxExperienceYears = options.maxExperienceYears ?? DEFAULT_MAX_EXPERIENCE_YEARS;
    if (!Number.isFinite(maxExperienceYears) || maxExperienceYears <= 0) {
      throw invalidArgumentError('maxExperienceYears must be a positive number', { maxExperienceYears });
    }

    this.weights = normalizeWeights(options.weights ?? DEFAULT_WEIGHTS, this.logger);
    this.similarityMethod = method;
    this.maxExperienceYears = maxExperienceYears;
  }

  /**
   * Scores one candidate against one target. The result carries rank 0;
   * ranks are assigned by the ranking stage.
   */
  score(candidate: CandidateProfile, target: TargetProfile): ScoringResult {
    if (candidate.embedding.length !== target.embedding.length) {
      throw invalidArgumentError('Embedding dimensionality mismatch', {
        candidateId: candidate.id,
        targetId: target.id,
        candidateDimensions: candidate.embedding.length,
        targetDimensions: target.embedding.length
      });
    }

    const skillMatch = calculateSkillMatch(candidate.skills, target.requiredSkills);
    const semanticSimilarity = calculateSemanticSimilarity(
      candidate.embedding,
      target.embedding,
      this.similarityMethod
    );
    const experience = calculateExperienceScore(
      candidate.experienceYears,
      target.requiredExperienceYears,
      this.maxExperienceYears
    );

    const overallScore = computeWeightedScore(
      { skillMatch: skillMatch.score, semanticSimilarity, experience },
      this.weights
    );

    this.logger.debug(
      { candidateId: candidate.id, targetId: target.id, overallScore },
      'Scored candidate.'
    );

    return {
      candidateId: candidate.id,
      targetId: target.id,
      skillMatchScore: skillMatch.score,
      semanticSimilarityScore: semanticSimilarity,
      experienceScore: experience,
      overallScore,
      matchedSkills: Object.freeze(skillMatch.matched),
      rank: 0
    };
  }

  scoreAll(candidates: readonly CandidateProfile[], target: TargetProfile): ScoringResult[] {
    return candidates.map((candidate) => this.score(candidate, target));
  }
}

/**
 * Per-signal differences (first minus second) and a recommendation.
 * Overall differences within COMPARISON_TIE_MARGIN are a tie.
 */
export function compareCandidates(first: ScoringResult, second: ScoringResult): CandidateComparison {
  const overallDiff = first.overallScore - second.overallScore;

  let recommendation: CandidateComparison['recommendation'] = 'tie';
  if (overallDiff > COMPARISON_TIE_MARGIN) {
    recommendation = 'candidate1';
  } else if (overallDiff < -COMPARISON_TIE_MARGIN) {
    recommendation = 'candidate2';
  }

  return {
    skillMatchDiff: first.skillMatchScore - second.skillMatchScore,
    semanticDiff: first.semanticSimilarityScore - second.semanticSimilarityScore,
    experienceDiff: first.experienceScore - second.experienceScore,
    overallDiff,
    recommendation
  };
}
