import { describe, expect, it } from 'vitest';

import { createCapturingLogger, WARN_LEVEL } from '../../__tests__/test-logger';
import { annotationCapability, type TextAnnotator } from '../annotation';
import { SkillDictionary } from '../dictionary';
import { SkillExtractor } from '../skill-extractor';

describe('SkillExtractor.extract', () => {
  const extractor = new SkillExtractor();

  it('extracts every skill from a skills section', () => {
    const skills = extractor.extract('Skills: Python, JavaScript, React, Django, PostgreSQL, AWS, Docker');

    expect(skills).toEqual(['aws', 'django', 'docker', 'javascript', 'postgresql', 'python', 'react']);
  });

  it('combines keyword and context matches', () => {
    const skills = extractor.extract(
      'Experienced in Python, Django, and PostgreSQL. Familiar with Docker and Kubernetes.'
    );

    expect(skills).toEqual(['django', 'docker', 'kubernetes', 'postgresql', 'python']);
  });

  it('is deterministic and sorted', () => {
    const text = 'Technologies: K8s, Postgres. Proficient in TypeScript and Go';

    const first = extractor.extract(text);
    const second = extractor.extract(text);

    expect(first).toEqual(second);
    expect([...first].sort()).toEqual(first);
    expect(first).toEqual(['go', 'kubernetes', 'postgresql', 'typescript']);
  });

  it('does not report java inside javascript', () => {
    expect(extractor.extract('Senior JavaScript developer')).toEqual(['javascript']);
  });

  it('returns a frozen empty set for blank text', () => {
    const skills = extractor.extract('  \n ');

    expect(skills).toEqual([]);
    expect(Object.isFrozen(skills)).toBe(true);
  });

  it('uses custom vocabulary entries', () => {
    const custom = new SkillExtractor({ dictionary: SkillDictionary.createDefault(['Erlang']) });

    expect(custom.extract('We use Erlang daily')).toEqual(['erlang']);
    expect(extractor.extract('We use Erlang daily')).toEqual([]);
  });
});

describe('SkillExtractor with an annotator', () => {
  it('adds skills found by the annotator', () => {
    const annotator: TextAnnotator = {
      annotate: () => ({ entities: ['TensorFlow'], nounPhrases: [] })
    };
    const extractor = new SkillExtractor({ annotation: annotationCapability(annotator, 'fake') });

    expect(extractor.annotationAvailable).toBe(true);
    expect(extractor.extract('Python models for Acme')).toEqual(['python', 'tensorflow']);
  });

  it('logs and continues when the annotator throws', () => {
    const { logger, lines } = createCapturingLogger();
    const annotator: TextAnnotator = {
      annotate: () => {
        throw new Error('model not loaded');
      }
    };
    const extractor = new SkillExtractor({
      annotation: annotationCapability(annotator, 'broken'),
      logger
    });

    expect(extractor.extract('Python developer')).toEqual(['python']);

    const warning = lines.find((line) => line.level === WARN_LEVEL);
    expect(warning?.msg).toBe('Entity extraction failed; continuing with remaining strategies.');
    expect(warning?.annotator).toBe('broken');
  });
});

describe('SkillExtractor.splitRequirements', () => {
  const extractor = new SkillExtractor();

  it('separates required and preferred sections', () => {
    const split = extractor.splitRequirements(
      'Required: Python, Django and PostgreSQL.\nNice to have: Docker, Kubernetes.'
    );

    expect(split.required).toEqual(['django', 'postgresql', 'python']);
    expect(split.preferred).toEqual(['docker', 'kubernetes']);
  });

  it('keeps a required list together across an inline "plus"', () => {
    expect(extractor.splitRequirements('Must have: Python plus AWS.')).toEqual({
      required: ['aws', 'python'],
      preferred: []
    });
  });

  it('treats the whole text as required when no section yields skills', () => {
    const split = extractor.splitRequirements('We build Python services on AWS');

    expect(split.required).toEqual(['aws', 'python']);
    expect(split.preferred).toEqual([]);
  });

  it('returns empty sets for blank text', () => {
    expect(extractor.splitRequirements('')).toEqual({ required: [], preferred: [] });
  });
});
