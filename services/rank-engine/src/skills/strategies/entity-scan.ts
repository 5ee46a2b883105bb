import type { CanonicalSkill } from '../../types';
import type { AnnotationCapability } from '../annotation';
import type { SkillDictionary } from '../dictionary';
import { cleanSkill } from '../normalizer';
import { MIN_WORD_LENGTH } from './spans';

/**
 * Strategy 4: named entities and noun phrases from the annotation
 * capability. Contributes nothing when the capability is unavailable.
 */
export function entityPhraseScan(
  text: string,
  dictionary: SkillDictionary,
  capability: AnnotationCapability
): Set<CanonicalSkill> {
  const skills = new Set<CanonicalSkill>();
  if (!capability.available) {
    return skills;
  }

  const { entities, nounPhrases } = capability.annotator.annotate(text);

  for (const entity of entities) {
    const canonical = dictionary.lookup(entity);
    if (canonical) {
      skills.add(canonical);
    }
  }

  for (const phrase of nounPhrases) {
    const canonical = dictionary.lookup(phrase);
    if (canonical) {
      skills.add(canonical);
    }

    for (const word of phrase.split(/\s+/)) {
      if (cleanSkill(word).length < MIN_WORD_LENGTH) {
        continue;
      }
      const wordSkill = dictionary.lookup(word);
      if (wordSkill) {
        skills.add(wordSkill);
      }
    }
  }

  return skills;
}
