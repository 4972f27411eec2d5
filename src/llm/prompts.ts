export const CANDIDATE_FEEDBACK_PROMPT = `You are an expert technical recruiter.
Given the job description and a candidate resume, summarize:
1. Key strengths (bullet friendly sentence).
2. Potential weaknesses or red flags.
3. Provide a short reasoning paragraph (2-3 sentences) on overall fit.

Format response as:
Strengths: ...
Weaknesses: ...
Reasoning: ...

Candidate: {candidate_name}
Job Description:
{job_description}

Resume:
{resume_text}`;

/**
 * Fills the candidate feedback template. Placeholders are replaced in a single
 * pass so text inside the JD or resume is never re-expanded.
 */
export function buildCandidatePrompt(candidateName: string, jobDescription: string, resumeText: string): string {
  const values: Record<string, string> = {
    candidate_name: candidateName,
    job_description: jobDescription,
    resume_text: resumeText,
  };
  return CANDIDATE_FEEDBACK_PROMPT.replace(/\{(candidate_name|job_description|resume_text)\}/g, (_m, key: string) => values[key]);
}
