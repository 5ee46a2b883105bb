import type { ScoringResult } from '../types';

export function makeResult(candidateId: string, overallScore: number, overrides: Partial<ScoringResult> = {}): ScoringResult {
  return {
    candidateId,
    targetId: 'job-1',
    skillMatchScore: overallScore,
    semanticSimilarityScore: overallScore,
    experienceScore: overallScore,
    overallScore,
    matchedSkills: [],
    rank: 0,
    ...overrides
  };
}
