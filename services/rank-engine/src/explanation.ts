/**
 * Human-readable rationale for a scoring result. Purely descriptive.
 *
 * @module explanation
 */

import type { ScoringResult } from './types';

interface Bucket {
  /** Minimum percentage (0-100) */
  min: number;
  label: string;
}

const SKILL_MATCH_BUCKETS: readonly Bucket[] = [
  { min: 80, label: 'Excellent' },
  { min: 60, label: 'Good' },
  { min: 40, label: 'Moderate' },
  { min: 0, label: 'Limited' }
];

const SEMANTIC_BUCKETS: readonly Bucket[] = [
  { min: 75, label: 'Strong' },
  { min: 50, label: 'Moderate' },
  { min: 0, label: 'Weak' }
];

const EXPERIENCE_BUCKETS: readonly Bucket[] = [
  { min: 100, label: 'Meets or exceeds experience requirements' },
  { min: 75, label: 'Close to experience requirements' },
  { min: 0, label: 'Below experience requirements' }
];

export const MAX_EXPLAINED_SKILLS = 5;

function bucketFor(percent: number, buckets: readonly Bucket[]): string {
  for (const bucket of buckets) {
    if (percent >= bucket.min) {
      return bucket.label;
    }
  }
  return buckets[buckets.length - 1].label;
}

function toPercent(score: number): number {
  return score * 100;
}

/** Whole percent, halves rounded to even: 62.5 -> "62", 87.5 -> "88" */
function formatPercent(percent: number): string {
  const floor = Math.floor(percent);
  const fraction = percent - floor;
  const rounded = fraction > 0.5 || (fraction === 0.5 && floor % 2 !== 0) ? floor + 1 : floor;
  return `${rounded}%`;
}

/**
 * @example
 * explain(result)
 * // 'Good skill match (67%) | Strong semantic alignment (88%) | Meets or exceeds experience requirements | Matched skills: django, python'
 */
export function explain(result: ScoringResult): string {
  const parts: string[] = [];

  const skillPercent = toPercent(result.skillMatchScore);
  parts.push(`${bucketFor(skillPercent, SKILL_MATCH_BUCKETS)} skill match (${formatPercent(skillPercent)})`);

  const semanticPercent = toPercent(result.semanticSimilarityScore);
  parts.push(`${bucketFor(semanticPercent, SEMANTIC_BUCKETS)} semantic alignment (${formatPercent(semanticPercent)})`);

  parts.push(bucketFor(toPercent(result.experienceScore), EXPERIENCE_BUCKETS));

  if (result.matchedSkills.length > 0) {
    const shown = result.matchedSkills.slice(0, MAX_EXPLAINED_SKILLS).join(', ');
    const hidden = result.matchedSkills.length - MAX_EXPLAINED_SKILLS;
    parts.push(hidden > 0 ? `Matched skills: ${shown} (+${hidden} more)` : `Matched skills: ${shown}`);
  }

  return parts.join(' | ');
}
