/**
 * Skill vocabulary and alias tables.
 *
 * Both are immutable values: they are built once (defaults plus any custom
 * entries) and handed to every extractor that needs them.
 *
 * @module skills/vocabulary
 */

import { invalidArgumentError } from '@skillrank/common';

import type { CanonicalSkill } from '../types';
import defaultAliases from './data/skill-aliases.json';
import defaultKeywords from './data/skill-keywords.json';
import { cleanSkill, normalizeSkill, type AliasResolver } from './normalizer';

export const DEFAULT_SKILL_KEYWORDS: readonly string[] = Object.freeze([...defaultKeywords]);

export const DEFAULT_SKILL_ALIASES: Readonly<Record<string, string>> = Object.freeze({ ...defaultAliases });

/**
 * Immutable set of canonical skill identifiers.
 * Every member is lower-case, non-empty and has no surrounding whitespace.
 */
export class SkillVocabulary implements Iterable<CanonicalSkill> {
  private readonly entries: ReadonlySet<CanonicalSkill>;

  private constructor(entries: Set<CanonicalSkill>) {
    this.entries = entries;
  }

  /**
   * Builds a vocabulary from the default keyword list plus custom entries.
   *
   * @param customEntries - Extra skills, normalized to lower-case and trimmed
   * @param baseEntries - Keyword list to start from (defaults to the bundled list)
   */
  static create(
    customEntries: Iterable<string> = [],
    baseEntries: Iterable<string> = DEFAULT_SKILL_KEYWORDS
  ): SkillVocabulary {
    const entries = new Set<CanonicalSkill>();

    for (const source of [baseEntries, customEntries]) {
      for (const raw of source) {
        const entry = raw.toLowerCase().trim();
        if (entry.length === 0) {
          throw invalidArgumentError('Skill vocabulary entries must be non-empty', { entry: raw });
        }
        entries.add(entry);
      }
    }

    return new SkillVocabulary(entries);
  }

  has(skill: string): boolean {
    return this.entries.has(skill);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Entries in alphabetical order */
  toArray(): CanonicalSkill[] {
    return [...this.entries].sort();
  }

  [Symbol.iterator](): Iterator<CanonicalSkill> {
    return this.entries.values();
  }
}

/**
 * Surface-form variant -> canonical skill.
 *
 * Keys are stored cleaned (see cleanSkill). Construction rejects any target
 * that does not normalize back to itself, which keeps resolution idempotent.
 */
export class AliasMap implements AliasResolver {
  private readonly entries: ReadonlyMap<string, CanonicalSkill>;

  constructor(aliases: Readonly<Record<string, string>> = DEFAULT_SKILL_ALIASES) {
    const entries = new Map<string, CanonicalSkill>();

    for (const [variant, target] of Object.entries(aliases)) {
      const key = cleanSkill(variant);
      const canonical = target.toLowerCase().trim();
      if (key.length === 0 || canonical.length === 0) {
        throw invalidArgumentError('Alias entries must be non-empty', { variant, target });
      }
      entries.set(key, canonical);
    }

    this.entries = entries;

    for (const [variant, target] of entries) {
      const resolved = normalizeSkill(target, this);
      if (resolved !== target) {
        throw invalidArgumentError('Alias target must resolve to itself', {
          variant,
          target,
          resolvesTo: resolved
        });
      }
    }
  }

  resolve(cleaned: string): CanonicalSkill | undefined {
    return this.entries.get(cleaned);
  }

  get size(): number {
    return this.entries.size;
  }

  /** New map with the extra aliases layered over these ones */
  extend(extra: Readonly<Record<string, string>>): AliasMap {
    return new AliasMap({ ...Object.fromEntries(this.entries), ...extra });
  }
}
