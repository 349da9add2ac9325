import { ScoreBreakdown, ScoreRecord, SemanticSource } from "../../shared/types/scoring.types";
import { isRecord } from "../../shared/utils/values";

export function freezeBreakdown(breakdown: ScoreBreakdown): Readonly<ScoreBreakdown> {
  Object.freeze(breakdown.matchedSkills);
  Object.freeze(breakdown.missingSkills);
  return Object.freeze(breakdown);
}

export function toScoreRecord(breakdown: ScoreBreakdown): ScoreRecord {
  return {
    skill_match_score: breakdown.skillMatchScore,
    experience_score: breakdown.experienceScore,
    education_score: breakdown.educationScore,
    semantic_similarity_score: breakdown.semanticSimilarityScore,
    final_score: breakdown.finalScore,
    matched_skills: [...breakdown.matchedSkills],
    missing_skills: [...breakdown.missingSkills],
    experience_years: breakdown.experienceYears,
    required_experience: breakdown.requiredExperience,
    has_required_degree: breakdown.hasRequiredDegree,
    semantic_source: breakdown.semanticSource,
  };
}

/**
 * Rebuilds a breakdown from its flat record. Throws on records that were not
 * produced by `toScoreRecord`.
 */
export function fromScoreRecord(record: unknown): ScoreBreakdown {
  if (!isRecord(record)) {
    throw new Error("Score record must be an object.");
  }
  return freezeBreakdown({
    skillMatchScore: readNumber(record, "skill_match_score"),
    experienceScore: readNumber(record, "experience_score"),
    educationScore: readNumber(record, "education_score"),
    semanticSimilarityScore: readNumber(record, "semantic_similarity_score"),
    finalScore: readNumber(record, "final_score"),
    matchedSkills: readStringList(record, "matched_skills"),
    missingSkills: readStringList(record, "missing_skills"),
    experienceYears: readNullableNumber(record, "experience_years"),
    requiredExperience: readNullableNumber(record, "required_experience"),
    hasRequiredDegree: readBoolean(record, "has_required_degree"),
    semanticSource: readSemanticSource(record.semantic_source),
  });
}

function readNumber(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Score record field ${key} must be a finite number.`);
  }
  return value;
}

function readNullableNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key];
  if (value === null || value === undefined) {
    return null;
  }
  return readNumber(record, key);
}

function readStringList(record: Record<string, unknown>, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new Error(`Score record field ${key} must be a list of strings.`);
  }
  return value.map((item) => String(item));
}

function readBoolean(record: Record<string, unknown>, key: string): boolean {
  const value = record[key];
  if (typeof value !== "boolean") {
    throw new Error(`Score record field ${key} must be a boolean.`);
  }
  return value;
}

function readSemanticSource(value: unknown): SemanticSource {
  return value === "embedding" ? "embedding" : "lexical";
}
