import { CandidateProfile } from "./candidate.types";

export interface ScoringWeights {
  skill: number;
  experience: number;
  education: number;
  semantic: number;
}

export type SemanticSource = "embedding" | "lexical";

export interface ScoreBreakdown {
  skillMatchScore: number;
  experienceScore: number;
  educationScore: number;
  semanticSimilarityScore: number;
  finalScore: number;
  matchedSkills: string[];
  missingSkills: string[];
  experienceYears: number | null;
  requiredExperience: number | null;
  hasRequiredDegree: boolean;
  semanticSource: SemanticSource;
}

export interface ScoreRecord {
  skill_match_score: number;
  experience_score: number;
  education_score: number;
  semantic_similarity_score: number;
  final_score: number;
  matched_skills: string[];
  missing_skills: string[];
  experience_years: number | null;
  required_experience: number | null;
  has_required_degree: boolean;
  semantic_source: SemanticSource;
}

export interface ScoredCandidate {
  candidate: CandidateProfile;
  breakdown: ScoreBreakdown;
  inputIndex: number;
}
