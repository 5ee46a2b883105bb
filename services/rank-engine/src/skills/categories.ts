/**
 * Fixed membership tables that bucket skills for display.
 *
 * @module skills/categories
 */

import type { CanonicalSkill, CategorizedSkills, SkillCategory } from '../types';
import categoryTable from './data/skill-categories.json';

/** Bucket order in categorized output; "other" catches everything unlisted */
export const SKILL_CATEGORY_ORDER: readonly SkillCategory[] = [
  'languages',
  'frameworks',
  'databases',
  'cloud',
  'tooling',
  'soft-skills',
  'other'
];

const CATEGORY_MEMBERSHIP: Record<Exclude<SkillCategory, 'other'>, readonly string[]> = categoryTable;

/**
 * skill -> category. When a skill appears in more than one table the first
 * category in SKILL_CATEGORY_ORDER wins.
 */
const CATEGORY_INDEX: ReadonlyMap<CanonicalSkill, SkillCategory> = (() => {
  const index = new Map<CanonicalSkill, SkillCategory>();
  for (const category of SKILL_CATEGORY_ORDER) {
    if (category === 'other') {
      continue;
    }
    for (const skill of CATEGORY_MEMBERSHIP[category]) {
      if (!index.has(skill)) {
        index.set(skill, category);
      }
    }
  }
  return index;
})();

export function getSkillCategory(skill: CanonicalSkill): SkillCategory {
  return CATEGORY_INDEX.get(skill.toLowerCase()) ?? 'other';
}

/**
 * Partitions skills into category buckets. Skills keep their input order
 * within a bucket; empty buckets are omitted.
 *
 * @example
 * categorizeSkills(['python', 'react', 'aws', 'kanban'])
 * // { languages: ['python'], frameworks: ['react'], cloud: ['aws'], other: ['kanban'] }
 */
export function categorizeSkills(skills: Iterable<CanonicalSkill>): CategorizedSkills {
  const buckets = new Map<SkillCategory, CanonicalSkill[]>();

  for (const skill of skills) {
    const category = getSkillCategory(skill);
    const bucket = buckets.get(category);
    if (bucket) {
      bucket.push(skill);
    } else {
      buckets.set(category, [skill]);
    }
  }

  const result: CategorizedSkills = {};
  for (const category of SKILL_CATEGORY_ORDER) {
    const bucket = buckets.get(category);
    if (bucket && bucket.length > 0) {
      result[category] = bucket;
    }
  }

  return result;
}
