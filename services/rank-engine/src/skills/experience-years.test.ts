import { describe, expect, it } from 'vitest';

import { extractYearsOfExperience } from './experience-years';

describe('extractYearsOfExperience', () => {
  it('reads "N years of experience"', () => {
    expect(extractYearsOfExperience('I have 5 years of experience in software development')).toBe(5);
  });

  it('takes the largest figure mentioned', () => {
    expect(extractYearsOfExperience('8+ yrs professional experience, 3 years with Go')).toBe(8);
  });

  it('reads "experience of N years" with decimals', () => {
    expect(extractYearsOfExperience('Experience of 4.5 years in data science')).toBe(4.5);
  });

  it('returns 0 without a mention', () => {
    expect(extractYearsOfExperience('Backend engineer who enjoys Rust')).toBe(0);
  });
});
