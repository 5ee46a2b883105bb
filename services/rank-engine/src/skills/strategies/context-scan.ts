import type { CanonicalSkill } from '../../types';
import type { SkillDictionary } from '../dictionary';
import { captureClause, findHeaders, matchDelimitedSpan } from './spans';

/**
 * Phrases whose object is usually a skill ("hands-on with X").
 */
export const CONTEXT_PHRASE_PATTERNS: readonly RegExp[] = [
  /\b(?:proficient|skilled|experienced|expert)\s+(?:in|with)\s+/gi,
  /\b(?:knowledge|understanding)\s+of\s+/gi,
  /\b(?:working\s+)?(?:experience|exposure)\s+(?:with|in)\s+/gi,
  /\bstrong\s+(?:background|foundation)\s+in\s+/gi,
  /\bhands-on\s+(?:experience\s+)?(?:with|in)\s+/gi
];

/**
 * Strategy 3: the object of a context phrase, up to the end of the clause.
 */
export function contextPatternScan(text: string, dictionary: SkillDictionary): Set<CanonicalSkill> {
  const skills = new Set<CanonicalSkill>();

  for (const phrase of findHeaders(text, CONTEXT_PHRASE_PATTERNS)) {
    const clause = captureClause(text, phrase.end);
    for (const skill of matchDelimitedSpan(clause, dictionary)) {
      skills.add(skill);
    }
  }

  return skills;
}
