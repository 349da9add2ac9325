import { MatchExplanation } from "./explanation.types";
import { CandidateProfile } from "./candidate.types";
import { ScoreBreakdown, ScoreRecord } from "./scoring.types";

export interface AnalysisInput {
  jobDescription: string;
  candidate: CandidateProfile;
  breakdown: ScoreBreakdown;
  explanation?: MatchExplanation | null;
}

export interface AnalysisRecord {
  id: string;
  timestamp: string;
  job_description: string;
  candidate_name: string;
  candidate_email: string | null;
  candidate_phone: string | null;
  final_score: number;
  skill_match_score: number;
  experience_score: number;
  education_score: number;
  semantic_score: number;
  experience_years: number | null;
  required_experience: number | null;
  has_required_degree: boolean;
  matched_skills: string[];
  missing_skills: string[];
  resume_data: CandidateProfile;
  score_breakdown: ScoreRecord;
  explanation_summary: string | null;
  explanation_reasons: string[] | null;
  explanation_recommendation: string | null;
  filename: string;
}

export type StoreResult =
  | { ok: true; id: string }
  | { ok: false; id: string; error: string };

export interface AnalysisStatistics {
  totalAnalyses: number;
  averageScore: number;
  strongMatches: number;
  goodMatches: number;
  moderateMatches: number;
  weakMatches: number;
}

export interface AnalysisSink {
  store(input: AnalysisInput): Promise<StoreResult>;
  storeBatch(inputs: ReadonlyArray<AnalysisInput>): Promise<StoreResult[]>;
}

export interface AnalysisQueries {
  listRecent(limit?: number, offset?: number): Promise<AnalysisRecord[]>;
  listByCandidate(candidateName: string): Promise<AnalysisRecord[]>;
  listByScoreRange(minScore: number, maxScore?: number): Promise<AnalysisRecord[]>;
  listByTimeRange(from: Date, to: Date): Promise<AnalysisRecord[]>;
  getStatistics(): Promise<AnalysisStatistics>;
}

export interface AnalysisMaintenance {
  deleteAnalysis(id: string): Promise<boolean>;
  /** Removes analyses stored before the cutoff and returns how many were removed. */
  deleteOlderThan(cutoff: Date): Promise<number>;
}

export type AnalysisStore = AnalysisSink & AnalysisQueries & AnalysisMaintenance;
