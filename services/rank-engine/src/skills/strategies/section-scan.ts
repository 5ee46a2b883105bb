import type { CanonicalSkill } from '../../types';
import type { SkillDictionary } from '../dictionary';
import { captureSentence, findHeaders, matchDelimitedSpan } from './spans';

/**
 * Headers that introduce a list of skills. Each match is followed by the
 * span that gets tokenized.
 */
export const SECTION_HEADER_PATTERNS: readonly RegExp[] = [
  /\b(?:technical\s+)?skills?(?:\s+and\s+technologies)?[:\s]+/gi,
  /\b(?:core\s+)?competencies[:\s]+/gi,
  /\btechnologies[:\s]+/gi,
  /\bexpertise[:\s]+/gi,
  /\bproficient\s+in[:\s]+/gi,
  /\bexperienced\s+(?:in|with)[:\s]+/gi
];

/**
 * Strategy 2: skills listed after a section header, up to the end of the
 * sentence.
 */
export function sectionScan(text: string, dictionary: SkillDictionary): Set<CanonicalSkill> {
  const skills = new Set<CanonicalSkill>();

  for (const header of findHeaders(text, SECTION_HEADER_PATTERNS)) {
    const span = captureSentence(text, header.end);
    for (const skill of matchDelimitedSpan(span, dictionary)) {
      skills.add(skill);
    }
  }

  return skills;
}
