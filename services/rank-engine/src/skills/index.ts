// ============================================================================
// Normalization and vocabulary
// ============================================================================

export { cleanSkill, normalizeSkill, type AliasResolver } from './normalizer';
export { AliasMap, DEFAULT_SKILL_ALIASES, DEFAULT_SKILL_KEYWORDS, SkillVocabulary } from './vocabulary';
export {
  buildKeywordPattern,
  SkillDictionary,
  toSkillSet,
  type KeywordPattern,
  type SkillDictionaryOptions
} from './dictionary';

// ============================================================================
// Extraction
// ============================================================================

export {
  ANNOTATION_UNAVAILABLE,
  annotationCapability,
  type AnnotationCapability,
  type TextAnnotations,
  type TextAnnotator
} from './annotation';
export { SkillExtractor, type SkillExtractorDeps } from './skill-extractor';
export {
  PREFERRED_HEADER_PATTERNS,
  REQUIRED_HEADER_PATTERNS,
  scanRequirementSections,
  type RequirementSections
} from './requirements';
export * from './strategies';

// ============================================================================
// Categorization and resume details
// ============================================================================

export { categorizeSkills, getSkillCategory, SKILL_CATEGORY_ORDER } from './categories';
export { extractYearsOfExperience } from './experience-years';
export { cleanText, extractContactInfo } from './resume-text';
