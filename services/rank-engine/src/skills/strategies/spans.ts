/**
 * Span capture and token lookup shared by the section, context and
 * requirement scans.
 *
 * @module skills/strategies/spans
 */

import type { CanonicalSkill } from '../../types';
import type { SkillDictionary } from '../dictionary';
import { cleanSkill } from '../normalizer';

/** Sentence end: terminal punctuation followed by whitespace or end of text. "node.js" does not end a sentence. */
const SENTENCE_BOUNDARY = /[.!?](?=\s|$)/;

/** Clause end for context phrases: comma, semicolon, newline or sentence end */
const CLAUSE_BOUNDARY = /[,;\n]|[.!?](?=\s|$)/;

const TOKEN_DELIMITERS = /[,;|•·▪\n\t]+/;

const LEADING_BULLET = /^[\s*\-–—]+/;

/** Words shorter than this only count when they form a whole token */
export const MIN_WORD_LENGTH = 3;

export interface HeaderMatch {
  start: number;
  end: number;
}

function captureUntil(text: string, from: number, boundary: RegExp): string {
  const rest = text.slice(from);
  const match = boundary.exec(rest);
  return match ? rest.slice(0, match.index) : rest;
}

export function captureSentence(text: string, from: number): string {
  return captureUntil(text, from, SENTENCE_BOUNDARY);
}

export function captureClause(text: string, from: number): string {
  return captureUntil(text, from, CLAUSE_BOUNDARY);
}

/**
 * All matches of the given header patterns, sorted by position.
 * Patterns must carry the global flag.
 */
export function findHeaders(text: string, patterns: readonly RegExp[]): HeaderMatch[] {
  const headers: HeaderMatch[] = [];

  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      headers.push({ start, end: start + match[0].length });
    }
  }

  return headers.sort((a, b) => a.start - b.start || a.end - b.end);
}

/**
 * Splits a captured span on list delimiters and looks every token up whole
 * and word by word.
 */
export function matchDelimitedSpan(span: string, dictionary: SkillDictionary): Set<CanonicalSkill> {
  const skills = new Set<CanonicalSkill>();

  for (const rawToken of span.split(TOKEN_DELIMITERS)) {
    const token = rawToken.replace(LEADING_BULLET, '').trim();
    if (token.length === 0) {
      continue;
    }

    const whole = dictionary.lookup(token);
    if (whole) {
      skills.add(whole);
    }

    for (const word of token.split(/\s+/)) {
      if (cleanSkill(word).length < MIN_WORD_LENGTH) {
        continue;
      }
      const canonical = dictionary.lookup(word);
      if (canonical) {
        skills.add(canonical);
      }
    }
  }

  return skills;
}
