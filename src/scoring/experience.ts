const YEARS_PATTERN = /(?<!\d)(\d{1,2})\+?\s*(?:years?|yrs?)\b/gi;

/** Largest "N years" / "N+ yrs" figure in the text, 0 when there is none. */
export function estimateYearsOfExperience(text: string): number {
  let max = 0;
  for (const match of text.matchAll(YEARS_PATTERN)) {
    max = Math.max(max, Number(match[1]));
  }
  return max;
}

/**
 * Experience signal in [0, 1]. Against a stated requirement the resume may
 * exceed it by up to 20% before saturating; without one, ten years saturates.
 */
export function experienceScore(resumeYears: number, requiredYears: number): number {
  if (resumeYears <= 0) return 0;
  if (requiredYears > 0) {
    return Math.min(resumeYears / requiredYears, 1.2) / 1.2;
  }
  return Math.min(resumeYears / 10, 1);
}
