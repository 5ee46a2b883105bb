import type { CanonicalSkill } from '../../types';
import type { SkillDictionary } from '../dictionary';

/**
 * Strategy 1: every vocabulary entry, matched case-insensitively against the
 * whole text on word boundaries.
 */
export function keywordScan(text: string, dictionary: SkillDictionary): Set<CanonicalSkill> {
  const skills = new Set<CanonicalSkill>();

  for (const { canonical, pattern } of dictionary.keywordPatterns) {
    if (pattern.test(text)) {
      skills.add(canonical);
    }
  }

  return skills;
}
