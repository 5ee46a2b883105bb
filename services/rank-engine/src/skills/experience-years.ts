/**
 * Years-of-experience mentions in resume text.
 *
 * @module skills/experience-years
 */

const EXPERIENCE_PATTERNS: readonly RegExp[] = [
  /(\d+(?:\.\d+)?)\+?\s*(?:years?|yrs?)(?:\s+of)?\s+(?:experience|exp)\b/gi,
  /\b(?:experience|exp)(?:\s+of)?\s+(\d+(?:\.\d+)?)\+?\s*(?:years?|yrs?)\b/gi,
  /(\d+(?:\.\d+)?)\+?\s*(?:years?|yrs?)\s+(?:professional|work|industry)\b/gi
];

/**
 * Largest "N years of experience" style figure in the text, or 0 when
 * there is none.
 *
 * @example
 * extractYearsOfExperience('I have 5 years of experience in software development') // 5
 * extractYearsOfExperience('8+ yrs professional experience, 3 years with Go')    // 8
 */
export function extractYearsOfExperience(text: string): number {
  let best = 0;

  for (const pattern of EXPERIENCE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const years = Number(match[1]);
      if (Number.isFinite(years) && years > best) {
        best = years;
      }
    }
  }

  return best;
}
