import { getConfig as getBaseConfig, parseList, parseNumber, type ServiceConfig } from '@skillrank/common';

import type { ScoringWeights } from './types';

export interface ScoringRuntimeConfig {
  weights: ScoringWeights;
  /** Left as a raw string; the scoring engine rejects unknown methods */
  similarityMethod: string;
  maxExperienceYears: number;
  scoreDecimals: number;
}

export interface RankingRuntimeConfig {
  similarityThreshold: number;
  topK: number;
}

export interface SkillsRuntimeConfig {
  customKeywords: string[];
}

export interface RankEngineConfig {
  base: ServiceConfig;
  scoring: ScoringRuntimeConfig;
  ranking: RankingRuntimeConfig;
  skills: SkillsRuntimeConfig;
}

let cachedConfig: RankEngineConfig | null = null;

export function getRankEngineConfig(): RankEngineConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();

  const scoring: ScoringRuntimeConfig = {
    weights: {
      skillMatch: parseNumber(process.env.SCORING_WEIGHT_SKILL_MATCH, 0.4),
      semanticSimilarity: parseNumber(process.env.SCORING_WEIGHT_SEMANTIC_SIMILARITY, 0.4),
      experience: parseNumber(process.env.SCORING_WEIGHT_EXPERIENCE, 0.2)
    },
    similarityMethod: process.env.SCORING_SIMILARITY_METHOD?.trim().toLowerCase() || 'cosine',
    maxExperienceYears: Math.max(1, parseNumber(process.env.SCORING_MAX_EXPERIENCE_YEARS, 20)),
    scoreDecimals: Math.max(0, Math.trunc(parseNumber(process.env.SCORE_DECIMALS, 4)))
  };

  const ranking: RankingRuntimeConfig = {
    similarityThreshold: parseNumber(process.env.SIMILARITY_THRESHOLD, 0.5),
    topK: Math.max(1, Math.trunc(parseNumber(process.env.RANKING_TOP_K, 10)))
  };

  const skills: SkillsRuntimeConfig = {
    customKeywords: parseList(process.env.SKILLS_CUSTOM_KEYWORDS)
  };

  cachedConfig = {
    base,
    scoring,
    ranking,
    skills
  };

  return cachedConfig;
}

export function resetRankEngineConfig(): void {
  cachedConfig = null;
}
