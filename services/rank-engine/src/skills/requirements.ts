/**
 * Required-vs-preferred scan for job descriptions.
 *
 * Spans are captured the same way as the section scan, up to the end of the
 * sentence. A span ends early only at a header that opens a line or carries
 * a colon, so "Must have: X; nice to have: Y" keeps Y out of the required
 * set while "Must have: X plus Y." keeps both.
 *
 * @module skills/requirements
 */

import type { CanonicalSkill } from '../types';
import type { SkillDictionary } from './dictionary';
import { keywordScan } from './strategies/keyword-scan';
import { captureSentence, findHeaders, matchDelimitedSpan, type HeaderMatch } from './strategies/spans';

export const REQUIRED_HEADER_PATTERNS: readonly RegExp[] = [
  /\b(?:required|must\s+have|mandatory|essential)[:\s]+/gi,
  /\brequirements?[:\s]+/gi
];

export const PREFERRED_HEADER_PATTERNS: readonly RegExp[] = [
  /\b(?:preferred|nice\s+to\s+have|bonus|desired)[:\s]+/gi,
  /\b(?:plus|advantage)[:\s]+/gi
];

export interface RequirementSections {
  required: Set<CanonicalSkill>;
  preferred: Set<CanonicalSkill>;
}

/** Only whitespace or a bullet between the line start and a header */
const LINE_PREFIX = /^[\s*•\-–—]*$/;

function opensSection(text: string, header: HeaderMatch): boolean {
  if (text.slice(header.start, header.end).includes(':')) {
    return true;
  }

  const lineStart = text.lastIndexOf('\n', header.start - 1) + 1;
  return LINE_PREFIX.test(text.slice(lineStart, header.start));
}

function spanAfter(text: string, header: HeaderMatch, allHeaders: readonly HeaderMatch[]): string {
  const span = captureSentence(text, header.end);
  const limit = header.end + span.length;

  const next = allHeaders.find(
    (other) => other.start >= header.end && other.start < limit && opensSection(text, other)
  );
  return next ? text.slice(header.end, next.start) : span;
}

function collect(
  text: string,
  headers: readonly HeaderMatch[],
  allHeaders: readonly HeaderMatch[],
  dictionary: SkillDictionary
): Set<CanonicalSkill> {
  const skills = new Set<CanonicalSkill>();

  for (const header of headers) {
    const span = spanAfter(text, header, allHeaders);
    for (const skill of keywordScan(span, dictionary)) {
      skills.add(skill);
    }
    for (const skill of matchDelimitedSpan(span, dictionary)) {
      skills.add(skill);
    }
  }

  return skills;
}

/**
 * Collects skills under required and preferred headers. A skill that shows
 * up under both is treated as required only. No fallback is applied here;
 * see SkillExtractor.splitRequirements.
 */
export function scanRequirementSections(text: string, dictionary: SkillDictionary): RequirementSections {
  const requiredHeaders = findHeaders(text, REQUIRED_HEADER_PATTERNS);
  const preferredHeaders = findHeaders(text, PREFERRED_HEADER_PATTERNS);
  const allHeaders = [...requiredHeaders, ...preferredHeaders].sort((a, b) => a.start - b.start);

  const required = collect(text, requiredHeaders, allHeaders, dictionary);
  const preferred = collect(text, preferredHeaders, allHeaders, dictionary);

  for (const skill of required) {
    preferred.delete(skill);
  }

  return { required, preferred };
}
