/**
 * SkillDictionary - the vocabulary, alias map and normalizer as one value.
 *
 * Built once per process (or per tenant) and injected into extractors.
 * Holds the precompiled keyword patterns used by the keyword scan so that
 * regex compilation happens at construction, not per document.
 *
 * @module skills/dictionary
 */

import type { CanonicalSkill, ExtractedSkillSet } from '../types';
import { normalizeSkill } from './normalizer';
import { AliasMap, SkillVocabulary } from './vocabulary';

export interface KeywordPattern {
  /** Vocabulary entry as written */
  entry: string;
  /** Normalized form reported when the entry matches */
  canonical: CanonicalSkill;
  /** Case-insensitive, whole-word matcher; no global flag, safe to share */
  pattern: RegExp;
}

export interface SkillDictionaryOptions {
  vocabulary?: SkillVocabulary;
  aliases?: AliasMap;
}

const NOT_WORD_CHARACTER = '[\\p{L}\\p{N}_]';

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds a matcher that refuses partial words on either side. Word
 * boundaries are expressed as lookarounds so entries that end in symbols
 * ("c++", "c#") still match.
 */
export function buildKeywordPattern(entry: string): RegExp {
  const body = entry
    .split(/\s+/)
    .map(escapeRegex)
    .join('\\s+');

  return new RegExp(`(?<!${NOT_WORD_CHARACTER})${body}(?!${NOT_WORD_CHARACTER})`, 'iu');
}

/**
 * Deduplicates and sorts skills into an ExtractedSkillSet.
 */
export function toSkillSet(skills: Iterable<CanonicalSkill>): ExtractedSkillSet {
  const unique = new Set<CanonicalSkill>();
  for (const skill of skills) {
    if (skill.length > 0) {
      unique.add(skill);
    }
  }

  return Object.freeze([...unique].sort());
}

export class SkillDictionary {
  readonly vocabulary: SkillVocabulary;
  readonly aliases: AliasMap;
  readonly keywordPatterns: readonly KeywordPattern[];
  private readonly canonicalSkills: ReadonlySet<CanonicalSkill>;

  constructor(options: SkillDictionaryOptions = {}) {
    this.vocabulary = options.vocabulary ?? SkillVocabulary.create();
    this.aliases = options.aliases ?? new AliasMap();

    const canonicalSkills = new Set<CanonicalSkill>();
    const patterns: KeywordPattern[] = [];

    for (const entry of this.vocabulary.toArray()) {
      const canonical = this.normalize(entry);
      if (canonical.length === 0) {
        continue;
      }
      canonicalSkills.add(canonical);
      patterns.push({ entry, canonical, pattern: buildKeywordPattern(entry) });
    }

    this.canonicalSkills = canonicalSkills;
    this.keywordPatterns = Object.freeze(patterns);
  }

  /**
   * Default vocabulary and aliases, optionally extended with custom skills.
   */
  static createDefault(customKeywords: Iterable<string> = []): SkillDictionary {
    return new SkillDictionary({ vocabulary: SkillVocabulary.create(customKeywords) });
  }

  normalize(raw: string): CanonicalSkill {
    return normalizeSkill(raw, this.aliases);
  }

  /**
   * Resolves a free-text token to a known skill.
   *
   * @returns The canonical skill, or undefined if the token is not in the vocabulary
   */
  lookup(token: string): CanonicalSkill | undefined {
    const canonical = this.normalize(token);
    return this.canonicalSkills.has(canonical) ? canonical : undefined;
  }

  isKnown(skill: CanonicalSkill): boolean {
    return this.canonicalSkills.has(skill);
  }

  /**
   * Normalizes arbitrary skill strings (e.g. from a stored profile) into an
   * ExtractedSkillSet. Unknown skills are kept in cleaned form.
   */
  canonicalize(skills: Iterable<string>): ExtractedSkillSet {
    const normalized: CanonicalSkill[] = [];
    for (const skill of skills) {
      normalized.push(this.normalize(skill));
    }
    return toSkillSet(normalized);
  }
}
