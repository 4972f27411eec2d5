import type { ScoreBreakdown } from '../types';
import { cosineSimilarity } from './similarity';
import { estimateYearsOfExperience, experienceScore } from './experience';
import { extractSkills, skillOverlap } from './skills';

export const SCORE_WEIGHTS = {
  similarity: 0.55,
  skills: 0.25,
  experience: 0.2,
} as const;

export interface ScoringInput {
  vector: number[];
  text: string;
}

export interface JobProfile {
  vector: number[];
  text: string;
  skills: string[];
  experienceYears: number;
}

export function compositeScore(similarity: number, skillRatio: number, experience: number): number {
  return (
    SCORE_WEIGHTS.similarity * similarity +
    SCORE_WEIGHTS.skills * skillRatio +
    SCORE_WEIGHTS.experience * experience
  );
}

/** Skills and required years are read once per job description. */
export function profileJob(jd: ScoringInput): JobProfile {
  return {
    ...jd,
    skills: extractSkills(jd.text),
    experienceYears: estimateYearsOfExperience(jd.text),
  };
}

export function scoreCandidate(job: JobProfile, resume: ScoringInput): ScoreBreakdown {
  const similarity = cosineSimilarity(job.vector, resume.vector);
  const skills = skillOverlap(job.skills, extractSkills(resume.text));
  const experienceYears = estimateYearsOfExperience(resume.text);
  const experience = experienceScore(experienceYears, job.experienceYears);

  return {
    similarity,
    skills,
    experienceYears,
    experienceScore: experience,
    compositeScore: compositeScore(similarity, skills.ratio, experience),
  };
}

/** Highest composite first; equal scores keep their original order. */
export function rankByComposite<T extends { compositeScore: number }>(results: T[]): T[] {
  return results
    .map((result, order) => ({ result, order }))
    .sort((a, b) => b.result.compositeScore - a.result.compositeScore || a.order - b.order)
    .map(({ result }) => result);
}
