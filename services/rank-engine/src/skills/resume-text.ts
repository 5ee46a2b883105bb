/**
 * Contact details and embedding-ready text from raw resume text.
 *
 * @module skills/resume-text
 */

import type { ContactInfo } from '../types';

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERN = /[+(]?[1-9][0-9 .\-()]{8,}[0-9]/;
const LINKEDIN_PATTERN = /linkedin\.com\/in\/[\w-]+/;
const GITHUB_PATTERN = /github\.com\/[\w-]+/;

const URLS = /https?:\/\/\S+/g;
const EMAILS = /\S+@\S+/g;
const PHONES = new RegExp(PHONE_PATTERN.source, 'g');
const SPECIAL_CHARACTERS = /[^\p{L}\p{N}_\s.,-]/gu;
const WHITESPACE = /\s+/g;

function firstMatch(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  return match ? match[0].trim() : null;
}

/**
 * First email, phone number, LinkedIn and GitHub profile in the text.
 * Profile paths are lower-cased; missing entries are null.
 */
export function extractContactInfo(text: string): ContactInfo {
  const lower = text.toLowerCase();

  return {
    email: firstMatch(text, EMAIL_PATTERN),
    phone: firstMatch(text, PHONE_PATTERN),
    linkedin: firstMatch(lower, LINKEDIN_PATTERN),
    github: firstMatch(lower, GITHUB_PATTERN)
  };
}

/**
 * Lower-cases the text and strips URLs, email addresses, phone numbers and
 * symbols other than `.`, `,` and `-`, collapsing whitespace. Used for
 * embedding input only; skill extraction reads the raw text.
 *
 * @example
 * cleanText('Reach me at dev@example.com | C++ & Go') // 'reach me at c go'
 */
export function cleanText(text: string): string {
  return text
    .toLowerCase()
    .replace(URLS, '')
    .replace(EMAILS, '')
    .replace(PHONES, '')
    .replace(SPECIAL_CHARACTERS, ' ')
    .replace(WHITESPACE, ' ')
    .trim();
}
