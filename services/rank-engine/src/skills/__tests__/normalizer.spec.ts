import { describe, expect, it } from 'vitest';

import { cleanSkill, normalizeSkill } from '../normalizer';
import { AliasMap } from '../vocabulary';

const aliases = new AliasMap();

describe('cleanSkill', () => {
  it('lower-cases, strips punctuation and collapses whitespace', () => {
    expect(cleanSkill('  React.js ')).toBe('reactjs');
    expect(cleanSkill('Machine   Learning')).toBe('machine learning');
    expect(cleanSkill('CI/CD')).toBe('cicd');
  });

  it('keeps + and #', () => {
    expect(cleanSkill('C++')).toBe('c++');
    expect(cleanSkill('C#')).toBe('c#');
  });
});

describe('normalizeSkill', () => {
  it('resolves aliases after cleaning', () => {
    expect(normalizeSkill('JS', aliases)).toBe('javascript');
    expect(normalizeSkill('ReactJS', aliases)).toBe('react');
    expect(normalizeSkill('K8s', aliases)).toBe('kubernetes');
    expect(normalizeSkill('Amazon  Web Services', aliases)).toBe('aws');
    expect(normalizeSkill('PowerBI', aliases)).toBe('power bi');
  });

  it('passes unknown skills through cleaned', () => {
    expect(normalizeSkill('Erlang', aliases)).toBe('erlang');
    expect(normalizeSkill('Node.JS', aliases)).toBe('nodejs');
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeSkill('   ', aliases)).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'JS',
      'C++',
      'C#',
      'CI/CD',
      'scikit-learn',
      'sklearn',
      'Node.js',
      'Google Cloud Platform',
      'ruby on rails',
      'Power BI',
      'Some Unknown Tool 2.0',
      ''
    ];

    for (const sample of samples) {
      const once = normalizeSkill(sample, aliases);
      expect(normalizeSkill(once, aliases)).toBe(once);
    }
  });

  it('works without an alias map', () => {
    expect(normalizeSkill('JS')).toBe('js');
  });
});
