/**
 * Skill Normalizer
 *
 * Turns a raw skill mention ("  React.js ", "C++", "Node.JS") into its
 * canonical identifier. Cleaning lower-cases, drops every character that is
 * not a word character, whitespace, "+" or "#", collapses whitespace and trims.
 * The cleaned string is then looked up in the alias map; unknown skills pass
 * through cleaned.
 *
 * @module skills/normalizer
 */

import type { CanonicalSkill } from '../types';

/** Anything outside [word-char, whitespace, +, #] */
const DISALLOWED_CHARACTERS = /[^\p{L}\p{N}_\s+#]/gu;

const WHITESPACE_RUN = /\s+/g;

/**
 * Resolves cleaned surface forms to canonical skills.
 */
export interface AliasResolver {
  resolve(cleaned: string): CanonicalSkill | undefined;
}

/**
 * Lower-cases, strips disallowed characters and collapses whitespace.
 * Never consults aliases.
 *
 * @example
 * cleanSkill(' React.js ') // 'reactjs'
 * cleanSkill('C++')        // 'c++'
 */
export function cleanSkill(raw: string): string {
  return raw
    .toLowerCase()
    .replace(DISALLOWED_CHARACTERS, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Normalizes a raw skill to its canonical identifier.
 * Total: unknown input comes back cleaned but unmapped.
 *
 * @example
 * normalizeSkill('JS', aliases)       // 'javascript'
 * normalizeSkill('Erlang', aliases)   // 'erlang'
 */
export function normalizeSkill(raw: string, aliases?: AliasResolver): CanonicalSkill {
  const cleaned = cleanSkill(raw);
  if (!aliases || cleaned.length === 0) {
    return cleaned;
  }

  return aliases.resolve(cleaned) ?? cleaned;
}
