export const MATCH_EXPLANATION_V1_PROMPT = `You explain why a candidate does or does not fit a job.

INPUT:
- candidate: name, skills, experience_years, education
- job_description: the first 500 characters of the posting
- score: deterministic breakdown with final_score, matched_skills, missing_skills,
  experience_years, required_experience, has_required_degree

TASK:
- Write a summary of at most 120 words.
- List exactly 3 key reasons. Reference concrete skills, experience and qualifications.
- Pick one recommendation: "Strong Match", "Good Match", "Moderate Match" or "Weak Match".

OUTPUT STRICT JSON:

{
  "summary": "string, at most 120 words",
  "top_reasons": ["string", "string", "string"],
  "recommendation": "Strong Match | Good Match | Moderate Match | Weak Match"
}

Return ONLY valid JSON.
No markdown.
No commentary.`;

export function buildMatchExplanationV1Prompt(input: {
  candidate: {
    name: string;
    skills: string[];
    experienceYears: number | null;
    education: string[];
  };
  jobDescription: string;
  score: Record<string, unknown>;
}): string {
  return [
    MATCH_EXPLANATION_V1_PROMPT,
    "",
    "Input JSON:",
    JSON.stringify(
      {
        candidate: {
          name: input.candidate.name,
          skills: input.candidate.skills,
          experience_years: input.candidate.experienceYears,
          education: input.candidate.education,
        },
        job_description: input.jobDescription.slice(0, 500),
        score: input.score,
      },
      null,
      2,
    ),
  ].join("\n");
}
