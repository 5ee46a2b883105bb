export { keywordScan } from './keyword-scan';
export { sectionScan, SECTION_HEADER_PATTERNS } from './section-scan';
export { contextPatternScan, CONTEXT_PHRASE_PATTERNS } from './context-scan';
export { entityPhraseScan } from './entity-scan';
export {
  captureClause,
  captureSentence,
  findHeaders,
  matchDelimitedSpan,
  MIN_WORD_LENGTH,
  type HeaderMatch
} from './spans';
