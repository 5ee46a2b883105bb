// ============================================================================
// Types and configuration
// ============================================================================

export type * from './types';
export { getRankEngineConfig, resetRankEngineConfig, type RankEngineConfig } from './config';

// ============================================================================
// Skill extraction
// ============================================================================

export * from './skills';

// ============================================================================
// Scoring
// ============================================================================

export { computeSimilarity, cosineSimilarity, euclideanDistance, isSimilarityMethod, SIMILARITY_METHODS } from './vector-utils';
export { DEFAULT_WEIGHTS, normalizeWeights, resolveWeights, SIGNAL_NAMES, validateWeights } from './signal-weights';
export {
  calculateExperienceScore,
  calculateSemanticSimilarity,
  calculateSkillMatch,
  DEFAULT_MAX_EXPERIENCE_YEARS
} from './signal-calculators';
export {
  compareCandidates,
  computeWeightedScore,
  COMPARISON_TIE_MARGIN,
  ScoringEngine,
  type ScoringEngineOptions,
  type SignalScores
} from './scoring';

// ============================================================================
// Ranking and screening
// ============================================================================

export { DEFAULT_SIMILARITY_THRESHOLD, DEFAULT_TOP_K, filterByThreshold, rank, topK } from './ranking';
export { explain } from './explanation';
export {
  CandidateInputSchema,
  CandidateProfileSchema,
  ScoringWeightsOverrideSchema,
  TargetInputSchema,
  TargetProfileSchema,
  type CandidateInput,
  type ScoringWeightsOverride,
  type TargetInput
} from './schemas';
export {
  createScreeningService,
  ScreeningService,
  type EmbeddingProvider,
  type ScreenedCandidate,
  type ScreeningOptions,
  type ScreeningReport,
  type ScreeningServiceDeps
} from './screening-service';
