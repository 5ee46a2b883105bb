/**
 * Skill Extractor
 *
 * Runs four extraction strategies over free text and unions their output:
 *
 * 1. keyword scan - every vocabulary entry as a whole word
 * 2. section scan - lists after "Skills:", "Technologies:" and similar headers
 * 3. context scan - objects of "proficient in", "experience with", ...
 * 4. entity scan  - named entities and noun phrases, when an annotator is present
 *
 * Output is always an ExtractedSkillSet: canonical, deduplicated, sorted.
 *
 * @module skills/skill-extractor
 */

import { getLogger, type Logger } from '@skillrank/common';

import type { CanonicalSkill, ExtractedSkillSet, RequirementSplit } from '../types';
import { ANNOTATION_UNAVAILABLE, type AnnotationCapability } from './annotation';
import { SkillDictionary, toSkillSet } from './dictionary';
import { scanRequirementSections } from './requirements';
import { contextPatternScan, entityPhraseScan, keywordScan, sectionScan } from './strategies';

export interface SkillExtractorDeps {
  dictionary?: SkillDictionary;
  annotation?: AnnotationCapability;
  logger?: Logger;
}

const EMPTY_SKILL_SET: ExtractedSkillSet = Object.freeze([]);

export class SkillExtractor {
  readonly dictionary: SkillDictionary;
  private readonly annotation: AnnotationCapability;
  private readonly logger: Logger;

  constructor(deps: SkillExtractorDeps = {}) {
    this.dictionary = deps.dictionary ?? SkillDictionary.createDefault();
    this.annotation = deps.annotation ?? ANNOTATION_UNAVAILABLE;
    this.logger = deps.logger ?? getLogger({ module: 'skill-extractor' });

    if (!this.annotation.available) {
      this.logger.debug({ reason: this.annotation.reason }, 'Entity extraction disabled.');
    }
  }

  get annotationAvailable(): boolean {
    return this.annotation.available;
  }

  /**
   * Extracts every known skill mentioned in the text.
   *
   * @example
   * extractor.extract('Experienced in Python, Django, and PostgreSQL. Familiar with Docker and Kubernetes.')
   * // ['django', 'docker', 'kubernetes', 'postgresql', 'python']
   */
  extract(text: string): ExtractedSkillSet {
    if (text.trim().length === 0) {
      return EMPTY_SKILL_SET;
    }

    const found: CanonicalSkill[] = [
      ...keywordScan(text, this.dictionary),
      ...sectionScan(text, this.dictionary),
      ...contextPatternScan(text, this.dictionary),
      ...this.runEntityScan(text)
    ];

    return toSkillSet(found);
  }

  /**
   * Splits a job description into required and preferred skills.
   * When neither kind of header yields anything, the whole text is treated
   * as required and preferred is empty.
   */
  splitRequirements(text: string): RequirementSplit {
    if (text.trim().length === 0) {
      return { required: EMPTY_SKILL_SET, preferred: EMPTY_SKILL_SET };
    }

    const { required, preferred } = scanRequirementSections(text, this.dictionary);

    if (required.size === 0 && preferred.size === 0) {
      return { required: this.extract(text), preferred: EMPTY_SKILL_SET };
    }

    return {
      required: toSkillSet(required),
      preferred: toSkillSet(preferred)
    };
  }

  private runEntityScan(text: string): Set<CanonicalSkill> {
    const annotation = this.annotation;
    if (!annotation.available) {
      return new Set();
    }

    try {
      return entityPhraseScan(text, this.dictionary, annotation);
    } catch (error) {
      this.logger.warn(
        { error, annotator: annotation.name },
        'Entity extraction failed; continuing with remaining strategies.'
      );
      return new Set();
    }
  }
}
