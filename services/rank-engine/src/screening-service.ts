import { getLogger, type Logger } from '@skillrank/common';

import { getRankEngineConfig, type RankEngineConfig } from './config';
import { explain } from './explanation';
import { filterByThreshold, rank, topK } from './ranking';
import {
  CandidateInputSchema,
  CandidateProfileSchema,
  parseOrThrow,
  ScoringWeightsOverrideSchema,
  TargetInputSchema,
  TargetProfileSchema,
  type CandidateInput,
  type ScoringWeightsOverride,
  type TargetInput
} from './schemas';
import { ScoringEngine } from './scoring';
import { resolveWeights } from './signal-weights';
import {
  cleanText,
  extractContactInfo,
  extractYearsOfExperience,
  SkillDictionary,
  SkillExtractor,
  toSkillSet
} from './skills';
import type { CandidateProfile, Embedding, ScoringResult, TargetProfile } from './types';

/**
 * Produces a fixed-length vector for a piece of text. Every vector returned
 * by one provider must have the same dimensionality.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

export interface ScreeningServiceDeps {
  config: RankEngineConfig;
  embeddings: EmbeddingProvider;
  extractor?: SkillExtractor;
  logger?: Logger;
}

export interface ScreeningOptions {
  weights?: ScoringWeightsOverride;
  threshold?: number;
  limit?: number;
}

export interface ScreenedCandidate extends ScoringResult {
  explanation: string;
}

export interface ScreeningReport {
  targetId: string;
  /** Every candidate, ranked */
  ranked: ScreenedCandidate[];
  /** Ranked candidates at or above the threshold, capped at the limit */
  shortlist: ScreenedCandidate[];
  timings: {
    profilesMs?: number;
    scoringMs: number;
    totalMs: number;
  };
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export class ScreeningService {
  private readonly config: RankEngineConfig;
  private readonly embeddings: EmbeddingProvider;
  private readonly extractor: SkillExtractor;
  private readonly engine: ScoringEngine;
  private readonly logger: Logger;

  constructor(deps: ScreeningServiceDeps) {
    this.config = deps.config;
    this.embeddings = deps.embeddings;
    this.logger = (deps.logger ?? getLogger()).child({ module: 'screening-service' });
    this.extractor =
      deps.extractor ??
      new SkillExtractor({
        dictionary: SkillDictionary.createDefault(deps.config.skills.customKeywords),
        logger: this.logger
      });
    this.engine = this.createEngine(deps.config.scoring.weights);
  }

  async buildCandidateProfile(input: CandidateInput): Promise<CandidateProfile> {
    const { id, text, experienceYears } = parseOrThrow(CandidateInputSchema, input, 'candidate input');

    const skills = this.extractor.extract(text);
    const years = experienceYears ?? extractYearsOfExperience(text);
    const contact = extractContactInfo(text);
    const embedding = await this.embeddings.embed(cleanText(text));

    const profile = parseOrThrow(
      CandidateProfileSchema,
      { id, skills: [...skills], experienceYears: years, embedding },
      'candidate profile'
    );

    this.logger.debug({ candidateId: id, skillCount: skills.length, experienceYears: years }, 'Built candidate profile.');

    return {
      ...profile,
      skills: toSkillSet(profile.skills),
      embedding: freezeEmbedding(profile.embedding),
      contact
    };
  }

  async buildTargetProfile(input: TargetInput): Promise<TargetProfile> {
    const { id, text, requiredExperienceYears } = parseOrThrow(TargetInputSchema, input, 'target input');

    const { required, preferred } = this.extractor.splitRequirements(text);
    const embedding = await this.embeddings.embed(cleanText(text));

    const profile = parseOrThrow(
      TargetProfileSchema,
      {
        id,
        requiredSkills: [...required],
        preferredSkills: [...preferred],
        requiredExperienceYears,
        embedding
      },
      'target profile'
    );

    this.logger.debug(
      { targetId: id, required: required.length, preferred: preferred.length },
      'Built target profile.'
    );

    return {
      id: profile.id,
      requiredSkills: toSkillSet(profile.requiredSkills),
      preferredSkills: toSkillSet(profile.preferredSkills ?? []),
      requiredExperienceYears: profile.requiredExperienceYears,
      embedding: freezeEmbedding(profile.embedding)
    };
  }

  /**
   * Scores every candidate against the target and ranks the full set.
   * Sub-scores are rounded to the configured number of decimals first.
   */
  screen(
    target: TargetProfile,
    candidates: readonly CandidateProfile[],
    options: ScreeningOptions = {}
  ): ScreeningReport {
    const start = Date.now();
    const engine = options.weights ? this.engineWithOverrides(options.weights) : this.engine;
    const decimals = this.config.scoring.scoreDecimals;

    const scored = engine.scoreAll(candidates, target).map((result) => ({
      ...result,
      skillMatchScore: roundTo(result.skillMatchScore, decimals),
      semanticSimilarityScore: roundTo(result.semanticSimilarityScore, decimals),
      experienceScore: roundTo(result.experienceScore, decimals),
      overallScore: roundTo(result.overallScore, decimals)
    }));

    const ranked: ScreenedCandidate[] = rank(scored).map((result) => ({ ...result, explanation: explain(result) }));

    const threshold = options.threshold ?? this.config.ranking.similarityThreshold;
    const limit = options.limit ?? this.config.ranking.topK;
    const shortlist = topK(filterByThreshold(ranked, threshold), limit);

    const scoringMs = Date.now() - start;

    this.logger.info(
      {
        targetId: target.id,
        candidates: candidates.length,
        shortlisted: shortlist.length,
        topScore: ranked[0]?.overallScore ?? null,
        scoringMs
      },
      'Screening completed.'
    );

    return {
      targetId: target.id,
      ranked,
      shortlist,
      timings: { scoringMs, totalMs: scoringMs }
    };
  }

  /**
   * Builds the target and every candidate profile concurrently, then screens.
   */
  async screenTexts(
    targetInput: TargetInput,
    candidateInputs: readonly CandidateInput[],
    options: ScreeningOptions = {}
  ): Promise<ScreeningReport> {
    const totalStart = Date.now();

    const [target, candidates] = await Promise.all([
      this.buildTargetProfile(targetInput),
      Promise.all(candidateInputs.map((input) => this.buildCandidateProfile(input)))
    ]);
    const profilesMs = Date.now() - totalStart;

    const report = this.screen(target, candidates, options);

    return {
      ...report,
      timings: {
        profilesMs,
        scoringMs: report.timings.scoringMs,
        totalMs: Date.now() - totalStart
      }
    };
  }

  private engineWithOverrides(overrides: ScoringWeightsOverride): ScoringEngine {
    const parsed = parseOrThrow(ScoringWeightsOverrideSchema, overrides, 'scoring weights');
    return this.createEngine(resolveWeights(parsed, this.config.scoring.weights, this.logger));
  }

  private createEngine(weights: RankEngineConfig['scoring']['weights']): ScoringEngine {
    return new ScoringEngine({
      weights,
      similarityMethod: this.config.scoring.similarityMethod,
      maxExperienceYears: this.config.scoring.maxExperienceYears,
      logger: this.logger
    });
  }
}

function freezeEmbedding(values: number[]): Embedding {
  return Object.freeze([...values]);
}

/**
 * Screening service wired from environment configuration.
 */
export function createScreeningService(
  embeddings: EmbeddingProvider,
  config: RankEngineConfig = getRankEngineConfig()
): ScreeningService {
  return new ScreeningService({ config, embeddings });
}
