import { stringify } from 'csv-stringify/sync';
import type { ScoreResult } from '../types';

export const CSV_FILE_NAME = 'resume_results.csv';

export const CSV_COLUMNS = [
  'Resume',
  'Composite Score',
  'Similarity',
  'Skill Overlap',
  'Experience (years)',
  'LLM Commentary',
] as const;

/** 0.73456 -> 73.46 */
export function toPercent(value: number): number {
  return Math.round(value * 10_000) / 100;
}

/** Results in the order given (ranking order), scores as percentages. */
export function resultsToCsv(results: ScoreResult[]): string {
  const rows = results.map((r) => [
    r.resumeName,
    toPercent(r.compositeScore),
    toPercent(r.similarity),
    toPercent(r.skills.ratio),
    r.experienceYears,
    r.commentary,
  ]);

  return stringify([[...CSV_COLUMNS], ...rows]);
}
