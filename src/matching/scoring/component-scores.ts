import { CandidateProfile, EducationEntry } from "../../shared/types/candidate.types";
import { MatchingVocabulary, resolveDegreeRank } from "../vocabulary";

const EXPERIENCE_BONUS_CAP = 0.2;
const LEXICAL_NO_JOB_WORDS_SCORE = 0.5;
const STOP_WORDS: ReadonlySet<string> = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "but",
  "in",
  "on",
  "at",
  "to",
  "for",
  "of",
  "with",
  "by",
]);

export interface SkillMatchResult {
  score: number;
  matchedSkills: string[];
  missingSkills: string[];
}

export function skillMatchScore(
  candidateSkills: ReadonlyArray<string>,
  requiredSkills: ReadonlyArray<string>,
): SkillMatchResult {
  const required = new Map<string, string>();
  for (const skill of requiredSkills) {
    const key = normalizeSkill(skill);
    if (key && !required.has(key)) {
      required.set(key, skill.trim());
    }
  }
  if (required.size === 0) {
    return { score: 1, matchedSkills: [], missingSkills: [] };
  }

  const candidateKeys = new Set<string>();
  const matchedSkills: string[] = [];
  for (const skill of candidateSkills) {
    const key = normalizeSkill(skill);
    if (!key || candidateKeys.has(key)) {
      continue;
    }
    candidateKeys.add(key);
    if (required.has(key)) {
      matchedSkills.push(skill);
    }
  }

  const missingSkills = Array.from(required.entries())
    .filter(([key]) => !candidateKeys.has(key))
    .map(([, original]) => original);

  return {
    score: matchedSkills.length / required.size,
    matchedSkills,
    missingSkills,
  };
}

/**
 * 1.0 with no requirement, 0.0 with unknown candidate experience, a linear ramp
 * below the requirement and a bonus of at most 0.2 above it.
 */
export function experienceScore(
  candidateYears: number | null | undefined,
  requiredYears: number | null | undefined,
): number {
  if (requiredYears === null || requiredYears === undefined || requiredYears <= 0) {
    return 1;
  }
  if (candidateYears === null || candidateYears === undefined || !Number.isFinite(candidateYears)) {
    return 0;
  }
  if (candidateYears >= requiredYears) {
    const excess = Math.min((candidateYears - requiredYears) / requiredYears, EXPERIENCE_BONUS_CAP);
    return Math.min(1 + EXPERIENCE_BONUS_CAP, 1 + excess);
  }
  return Math.max(0, candidateYears / requiredYears);
}

export function educationScore(
  education: ReadonlyArray<EducationEntry>,
  requiredDegree: string | null | undefined,
  vocabulary: MatchingVocabulary,
): number {
  if (!requiredDegree || !requiredDegree.trim()) {
    return 1;
  }
  const listed = education.filter((entry) => entry.degree.trim().length > 0);
  if (listed.length === 0) {
    return 0;
  }

  const requiredRank = resolveDegreeRank(requiredDegree, vocabulary);
  if (requiredRank === null) {
    // Unknown requirement wording: any listed degree satisfies it.
    return 1;
  }

  const meets = listed.some((entry) => {
    const rank = resolveDegreeRank(entry.degree, vocabulary);
    return rank !== null && rank >= requiredRank;
  });
  return meets ? 1 : 0;
}

/**
 * Jaccard overlap of stop-word-filtered words from the candidate summary and skills
 * against the job text.
 */
export function lexicalSimilarity(candidate: CandidateProfile, jobText: string): number {
  const candidateText = [candidate.summary ?? "", candidate.skills.join(" ")].join(" ");
  const candidateWords = extractWords(candidateText);
  const jobWords = extractWords(jobText);

  if (jobWords.size === 0) {
    return LEXICAL_NO_JOB_WORDS_SCORE;
  }

  let intersection = 0;
  for (const word of candidateWords) {
    if (jobWords.has(word)) {
      intersection += 1;
    }
  }
  const union = candidateWords.size + jobWords.size - intersection;
  if (union === 0) {
    return 0;
  }
  return intersection / union;
}

/**
 * Fixed-order text rendering of a candidate used for embeddings.
 */
export function canonicalCandidateText(candidate: CandidateProfile): string {
  const parts: string[] = [];
  if (candidate.name) {
    parts.push(`Name: ${candidate.name}`);
  }
  if (candidate.summary) {
    parts.push(`Summary: ${candidate.summary}`);
  }
  if (candidate.skills.length > 0) {
    parts.push(`Skills: ${candidate.skills.join(", ")}`);
  }
  if (candidate.experienceYears) {
    parts.push(`Experience: ${candidate.experienceYears} years`);
  }
  for (const entry of candidate.education) {
    parts.push(`Education: ${entry.degree}`);
  }
  return parts.join(" | ");
}

export function normalizeSkill(value: string): string {
  return value.trim().toLowerCase();
}

function extractWords(text: string): Set<string> {
  const words = text.toLowerCase().match(/\w+/g) ?? [];
  return new Set(words.filter((word) => !STOP_WORDS.has(word)));
}
