import { describe, expect, it } from 'vitest';
import { estimateYearsOfExperience, experienceScore } from './experience';

describe('estimateYearsOfExperience', () => {
  it('reads "5 years of experience" as 5', () => {
    expect(estimateYearsOfExperience('5 years of experience')).toBe(5);
  });

  it('takes the largest figure mentioned', () => {
    expect(estimateYearsOfExperience('3 years at Acme, then 7+ yrs consulting, 2 year gap')).toBe(7);
  });

  it('is case-insensitive and accepts no space', () => {
    expect(estimateYearsOfExperience('12YEARS in finance')).toBe(12);
  });

  it('ignores digits that belong to a longer number', () => {
    expect(estimateYearsOfExperience('founded in 2019 years ago')).toBe(0);
  });

  it('is 0 when nothing matches', () => {
    expect(estimateYearsOfExperience('Recent graduate')).toBe(0);
  });
});

describe('experienceScore', () => {
  it('saturates at 120% of the requirement', () => {
    expect(experienceScore(6, 5)).toBe(1);
    expect(experienceScore(10, 5)).toBe(1);
  });

  it('scales against the requirement below that', () => {
    expect(experienceScore(3, 5)).toBeCloseTo(0.5, 10);
  });

  it('uses a ten-year scale without a requirement', () => {
    expect(experienceScore(4, 0)).toBeCloseTo(0.4, 10);
    expect(experienceScore(15, 0)).toBe(1);
  });

  it('is 0 with no experience found', () => {
    expect(experienceScore(0, 5)).toBe(0);
  });
});
