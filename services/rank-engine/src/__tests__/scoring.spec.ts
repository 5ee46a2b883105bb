import { describe, expect, it } from 'vitest';

import { isServiceError } from '@skillrank/common';

import { compareCandidates, computeWeightedScore, ScoringEngine } from '../scoring';
import type { CandidateProfile, TargetProfile } from '../types';
import { makeResult } from './fixtures';

const candidate: CandidateProfile = {
  id: 'cand-1',
  skills: ['django', 'docker', 'postgresql', 'python'],
  experienceYears: 3,
  embedding: [1, 0]
};

const target: TargetProfile = {
  id: 'job-1',
  requiredSkills: ['aws', 'django', 'python'],
  requiredExperienceYears: 5,
  embedding: [1, 0]
};

describe('computeWeightedScore', () => {
  it('sums weighted signals', () => {
    const score = computeWeightedScore(
      { skillMatch: 0.8, semanticSimilarity: 0.6, experience: 1.0 },
      { skillMatch: 0.4, semanticSimilarity: 0.4, experience: 0.2 }
    );

    expect(score).toBeCloseTo(0.76, 10);
  });
});

describe('ScoringEngine', () => {
  it('scores a candidate against a target', () => {
    const engine = new ScoringEngine();

    const result = engine.score(candidate, target);

    expect(result.candidateId).toBe('cand-1');
    expect(result.targetId).toBe('job-1');
    expect(result.skillMatchScore).toBeCloseTo(0.5867, 4);
    expect(result.semanticSimilarityScore).toBeCloseTo(1, 10);
    expect(result.experienceScore).toBe(0.6);
    expect(result.overallScore).toBeCloseTo(0.7547, 4);
    expect(result.matchedSkills).toEqual(['django', 'python']);
    expect(result.rank).toBe(0);
  });

  it('normalizes configured weights', () => {
    const engine = new ScoringEngine({ weights: { skillMatch: 1, semanticSimilarity: 0, experience: 0 } });

    expect(engine.score(candidate, target).overallScore).toBeCloseTo(0.5867, 4);
    expect(new ScoringEngine({ weights: { skillMatch: 2, semanticSimilarity: 2, experience: 0 } }).weights).toEqual({
      skillMatch: 0.5,
      semanticSimilarity: 0.5,
      experience: 0
    });
  });

  it('keeps the overall score within [0, 1]', () => {
    const engine = new ScoringEngine();
    const far: CandidateProfile = { ...candidate, skills: [], experienceYears: 0, embedding: [-1, 0] };

    const low = engine.score(far, target);
    expect(low.overallScore).toBeGreaterThanOrEqual(0);
    expect(low.overallScore).toBeLessThanOrEqual(1);

    const perfect = engine.score({ ...candidate, skills: ['aws', 'django', 'python'], experienceYears: 9 }, target);
    expect(perfect.overallScore).toBeCloseTo(1, 10);
    expect(perfect.overallScore).toBeLessThanOrEqual(1);
  });

  it('uses the configured similarity method', () => {
    const engine = new ScoringEngine({ similarityMethod: 'euclidean' });

    const result = engine.score({ ...candidate, embedding: [0, 0] }, { ...target, embedding: [3, 4] });

    expect(result.semanticSimilarityScore).toBeCloseTo(1 / 6, 10);
  });

  it('rejects mismatched embedding dimensions', () => {
    const engine = new ScoringEngine();
    let caught: unknown;
    try {
      engine.score({ ...candidate, embedding: [1, 0, 0] }, target);
    } catch (error) {
      caught = error;
    }

    expect(isServiceError(caught, 'invalid_argument')).toBe(true);
  });

  it('rejects invalid settings at construction', () => {
    expect(() => new ScoringEngine({ similarityMethod: 'manhattan' })).toThrow('Unknown similarity method: manhattan');
    expect(() => new ScoringEngine({ weights: { skillMatch: 0, semanticSimilarity: 0, experience: 0 } })).toThrow(
      /all be zero/
    );
    expect(() => new ScoringEngine({ maxExperienceYears: 0 })).toThrow(/positive/);
  });

  it('scores candidates independently', () => {
    const engine = new ScoringEngine();
    const other: CandidateProfile = { ...candidate, id: 'cand-2', skills: ['aws'] };

    const [first, second] = engine.scoreAll([candidate, other], target);

    expect(first).toEqual(engine.score(candidate, target));
    expect(second.candidateId).toBe('cand-2');
    expect(second.matchedSkills).toEqual(['aws']);
  });
});

describe('compareCandidates', () => {
  it('recommends the clearly better candidate', () => {
    const comparison = compareCandidates(makeResult('a', 0.8), makeResult('b', 0.7));

    expect(comparison.recommendation).toBe('candidate1');
    expect(comparison.overallDiff).toBeCloseTo(0.1, 10);
    expect(comparison.skillMatchDiff).toBeCloseTo(0.1, 10);
  });

  it('calls close scores a tie', () => {
    expect(compareCandidates(makeResult('a', 0.7), makeResult('b', 0.72)).recommendation).toBe('tie');
  });

  it('recommends the second candidate when it leads', () => {
    expect(compareCandidates(makeResult('a', 0.5), makeResult('b', 0.8)).recommendation).toBe('candidate2');
  });
});
