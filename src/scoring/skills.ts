import type { SkillMatch } from '../types';

export const SKILL_DICTIONARY: readonly string[] = [
  'python',
  'java',
  'c++',
  'sql',
  'aws',
  'azure',
  'gcp',
  'docker',
  'kubernetes',
  'pandas',
  'numpy',
  'tensorflow',
  'pytorch',
  'nlp',
  'machine learning',
  'data analysis',
  'react',
  'javascript',
  'django',
  'flask',
  'spark',
  'hadoop',
  'tableau',
];

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const SKILL_PATTERNS = SKILL_DICTIONARY.map((skill) => ({
  skill,
  // not glued to another letter/digit: "java" must not hit "javascript"
  pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegex(skill).replace(/ /g, '\\s+')}(?![\\p{L}\\p{N}])`, 'iu'),
}));

/** Dictionary skills found in `text`, in dictionary order. */
export function extractSkills(text: string): string[] {
  return SKILL_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ skill }) => skill);
}

/**
 * Share of the job description's skills that the resume also mentions.
 * A job description with no recognised skill gives a ratio of 0.
 */
export function skillOverlap(jdSkills: string[], resumeSkills: string[]): SkillMatch {
  const jd = [...new Set(jdSkills)];
  const resume = new Set(resumeSkills);
  const matched = jd.filter((skill) => resume.has(skill));
  const missing = jd.filter((skill) => !resume.has(skill));

  return {
    ratio: jd.length === 0 ? 0 : matched.length / jd.length,
    matched,
    missing,
  };
}
