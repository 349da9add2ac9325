import { fromScoreRecord, toScoreRecord } from "../matching/scoring/score-breakdown";
import { normalizeCandidateProfile } from "../profiles/candidate-profile.normalizer";
import {
  AnalysisInput,
  AnalysisRecord,
  AnalysisStatistics,
} from "../shared/types/analysis.types";
import { isRecord, toStringArray, toText } from "../shared/utils/values";

export const DEFAULT_LIST_LIMIT = 100;

const UNKNOWN_CANDIDATE = "Unknown";
const UNKNOWN_FILENAME = "unknown.pdf";

export function buildAnalysisRecord(input: AnalysisInput, id: string, timestamp: Date): AnalysisRecord {
  const { candidate, breakdown, explanation } = input;
  return {
    id,
    timestamp: timestamp.toISOString(),
    job_description: input.jobDescription,
    candidate_name: candidate.name ?? UNKNOWN_CANDIDATE,
    candidate_email: candidate.email ?? null,
    candidate_phone: candidate.phone ?? null,
    final_score: breakdown.finalScore,
    skill_match_score: breakdown.skillMatchScore,
    experience_score: breakdown.experienceScore,
    education_score: breakdown.educationScore,
    semantic_score: breakdown.semanticSimilarityScore,
    experience_years: breakdown.experienceYears,
    required_experience: breakdown.requiredExperience,
    has_required_degree: breakdown.hasRequiredDegree,
    matched_skills: [...breakdown.matchedSkills],
    missing_skills: [...breakdown.missingSkills],
    resume_data: candidate,
    score_breakdown: toScoreRecord(breakdown),
    explanation_summary: explanation?.summary ?? null,
    explanation_reasons: explanation ? [...explanation.topReasons] : null,
    explanation_recommendation: explanation?.recommendation ?? null,
    filename: candidate.filename ?? UNKNOWN_FILENAME,
  };
}

/**
 * Validates a stored row. Returns null for rows that do not carry a usable score.
 */
export function parseAnalysisRecord(row: unknown): AnalysisRecord | null {
  if (!isRecord(row)) {
    return null;
  }
  const id = typeof row.id === "string" || typeof row.id === "number" ? String(row.id) : "";
  const timestamp = toText(row.timestamp);
  if (!id || !timestamp || Number.isNaN(Date.parse(timestamp))) {
    return null;
  }

  let scoreBreakdown: AnalysisRecord["score_breakdown"];
  try {
    scoreBreakdown = toScoreRecord(fromScoreRecord(row.score_breakdown));
  } catch {
    return null;
  }

  const explanationReasons = Array.isArray(row.explanation_reasons)
    ? toStringArray(row.explanation_reasons)
    : null;

  return {
    id,
    timestamp,
    job_description: typeof row.job_description === "string" ? row.job_description : "",
    candidate_name: toText(row.candidate_name) || UNKNOWN_CANDIDATE,
    candidate_email: toText(row.candidate_email) || null,
    candidate_phone: toText(row.candidate_phone) || null,
    final_score: scoreBreakdown.final_score,
    skill_match_score: scoreBreakdown.skill_match_score,
    experience_score: scoreBreakdown.experience_score,
    education_score: scoreBreakdown.education_score,
    semantic_score: scoreBreakdown.semantic_similarity_score,
    experience_years: scoreBreakdown.experience_years,
    required_experience: scoreBreakdown.required_experience,
    has_required_degree: scoreBreakdown.has_required_degree,
    matched_skills: [...scoreBreakdown.matched_skills],
    missing_skills: [...scoreBreakdown.missing_skills],
    resume_data: normalizeCandidateProfile(row.resume_data),
    score_breakdown: scoreBreakdown,
    explanation_summary: toText(row.explanation_summary) || null,
    explanation_reasons: explanationReasons,
    explanation_recommendation: toText(row.explanation_recommendation) || null,
    filename: toText(row.filename) || UNKNOWN_FILENAME,
  };
}

export function computeStatistics(records: ReadonlyArray<Pick<AnalysisRecord, "final_score">>): AnalysisStatistics {
  if (records.length === 0) {
    return emptyStatistics();
  }
  const scores = records.map((record) => record.final_score);
  return {
    totalAnalyses: scores.length,
    averageScore: scores.reduce((total, score) => total + score, 0) / scores.length,
    strongMatches: scores.filter((score) => score >= 0.8).length,
    goodMatches: scores.filter((score) => score >= 0.6 && score < 0.8).length,
    moderateMatches: scores.filter((score) => score >= 0.4 && score < 0.6).length,
    weakMatches: scores.filter((score) => score < 0.4).length,
  };
}

export function emptyStatistics(): AnalysisStatistics {
  return {
    totalAnalyses: 0,
    averageScore: 0,
    strongMatches: 0,
    goodMatches: 0,
    moderateMatches: 0,
    weakMatches: 0,
  };
}

export function byNewestFirst(left: AnalysisRecord, right: AnalysisRecord): number {
  return Date.parse(right.timestamp) - Date.parse(left.timestamp);
}
