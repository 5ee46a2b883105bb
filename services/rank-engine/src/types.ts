/**
 * Shared types for skill extraction, scoring and ranking.
 */

/** Normalized, alias-resolved skill identifier (e.g. "javascript"). */
export type CanonicalSkill = string;

/** Alphabetically sorted, deduplicated and frozen list of canonical skills. */
export type ExtractedSkillSet = readonly CanonicalSkill[];

export type Embedding = readonly number[];

export interface ContactInfo {
  email: string | null;
  phone: string | null;
  linkedin: string | null;
  github: string | null;
}

export interface CandidateProfile {
  id: string;
  skills: ExtractedSkillSet;
  /** Non-negative years of experience */
  experienceYears: number;
  embedding: Embedding;
  /** Present on profiles built from resume text */
  contact?: ContactInfo;
}

export interface TargetProfile {
  id: string;
  requiredSkills: ExtractedSkillSet;
  preferredSkills?: ExtractedSkillSet;
  requiredExperienceYears?: number;
  embedding: Embedding;
}

export type SignalName = 'skillMatch' | 'semanticSimilarity' | 'experience';

export type ScoringWeights = Record<SignalName, number>;

export interface ScoringResult {
  readonly candidateId: string;
  readonly targetId: string;
  readonly skillMatchScore: number;
  readonly semanticSimilarityScore: number;
  readonly experienceScore: number;
  readonly overallScore: number;
  readonly matchedSkills: readonly CanonicalSkill[];
  /** 1-based position after ranking; 0 before */
  readonly rank: number;
}

export type SimilarityMethod = 'cosine' | 'dot' | 'euclidean';

export interface RequirementSplit {
  required: ExtractedSkillSet;
  preferred: ExtractedSkillSet;
}

export type SkillCategory =
  | 'languages'
  | 'frameworks'
  | 'databases'
  | 'cloud'
  | 'tooling'
  | 'soft-skills'
  | 'other';

export type CategorizedSkills = Partial<Record<SkillCategory, CanonicalSkill[]>>;

export interface SkillMatchResult {
  score: number;
  coverage: number;
  jaccard: number;
  matched: CanonicalSkill[];
}

export interface CandidateComparison {
  skillMatchDiff: number;
  semanticDiff: number;
  experienceDiff: number;
  overallDiff: number;
  recommendation: 'candidate1' | 'candidate2' | 'tie';
}
