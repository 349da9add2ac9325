import { JsonLlmClient } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import { buildMatchExplanationV1Prompt } from "../ai/prompts/matching/match-explanation.v1.prompt";
import { Logger } from "../config/logger";
import { CandidateProfile } from "../shared/types/candidate.types";
import {
  MATCH_RECOMMENDATIONS,
  MatchExplanation,
  MatchRecommendation,
} from "../shared/types/explanation.types";
import { ScoreBreakdown } from "../shared/types/scoring.types";
import { isRecord, toStringArray, toText } from "../shared/utils/values";
import { toScoreRecord } from "./scoring/score-breakdown";

const SUMMARY_MAX_WORDS = 120;
const REASON_PLACEHOLDER = "Additional analysis needed";
const SCHEMA_HINT =
  'Object with "summary" (string), "top_reasons" (array of 3 strings) and "recommendation" (one of "Strong Match", "Good Match", "Moderate Match", "Weak Match").';

interface RawExplanation extends Record<string, unknown> {
  summary: string;
}

export class MatchExplanationService {
  constructor(
    private readonly llmClient: JsonLlmClient | null,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  /**
   * Model-written explanation, or the deterministic fallback when the model is
   * not configured or its output is unusable.
   */
  async explain(
    candidate: CandidateProfile,
    jobText: string,
    breakdown: ScoreBreakdown,
  ): Promise<MatchExplanation> {
    if (!this.llmClient) {
      return buildFallbackExplanation(candidate, breakdown);
    }

    const prompt = buildMatchExplanationV1Prompt({
      candidate: {
        name: candidateName(candidate),
        skills: [...candidate.skills],
        experienceYears: candidate.experienceYears ?? null,
        education: candidate.education.map((entry) => entry.degree),
      },
      jobDescription: jobText,
      score: { ...toScoreRecord(breakdown) },
    });

    const result = await callJsonPromptSafe<RawExplanation>({
      llmClient: this.llmClient,
      prompt,
      maxTokens: 500,
      promptName: "match_explanation_v1",
      schemaHint: SCHEMA_HINT,
      validate: isRawExplanation,
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });

    if (!result.ok) {
      this.logger.warn("Match explanation failed, using fallback", {
        candidate: candidate.name ?? null,
        errorCode: result.error_code,
      });
      return buildFallbackExplanation(candidate, breakdown);
    }
    if (result.repaired) {
      this.logger.info("Match explanation recovered by JSON repair", { candidate: candidate.name ?? null });
    }

    return {
      summary: limitWords(result.data.summary, SUMMARY_MAX_WORDS),
      topReasons: toThreeReasons(toStringArray(result.data.top_reasons)),
      recommendation:
        parseRecommendation(toText(result.data.recommendation)) ?? recommendationForScore(breakdown.finalScore),
    };
  }
}

export function buildFallbackExplanation(
  candidate: CandidateProfile,
  breakdown: ScoreBreakdown,
): MatchExplanation {
  const name = candidateName(candidate);
  const recommendation = recommendationForScore(breakdown.finalScore);
  return {
    summary: fallbackSummary(name, recommendation),
    topReasons: [
      `Skills match: ${breakdown.matchedSkills.length} matched, ${breakdown.missingSkills.length} missing`,
      `Experience: ${breakdown.experienceYears ?? "unknown"} years (required: ${breakdown.requiredExperience ?? "not specified"})`,
      `Education: ${breakdown.hasRequiredDegree ? "Meets" : "Does not meet"} requirements`,
    ],
    recommendation,
  };
}

export function recommendationForScore(finalScore: number): MatchRecommendation {
  if (finalScore >= 0.8) {
    return "Strong Match";
  }
  if (finalScore >= 0.6) {
    return "Good Match";
  }
  if (finalScore >= 0.4) {
    return "Moderate Match";
  }
  return "Weak Match";
}

/** Accepts free-form model wording such as "Good Match - worth an interview". */
export function parseRecommendation(value: string): MatchRecommendation | null {
  const lowered = value.trim().toLowerCase();
  return MATCH_RECOMMENDATIONS.find((item) => lowered.startsWith(item.toLowerCase())) ?? null;
}

export function limitWords(text: string, maxWords: number): string {
  const words = text.trim().split(/\s+/).filter((word) => word.length > 0);
  return words.slice(0, maxWords).join(" ");
}

function toThreeReasons(reasons: string[]): [string, string, string] {
  return [reasons[0] ?? REASON_PLACEHOLDER, reasons[1] ?? REASON_PLACEHOLDER, reasons[2] ?? REASON_PLACEHOLDER];
}

function fallbackSummary(name: string, recommendation: MatchRecommendation): string {
  switch (recommendation) {
    case "Strong Match":
      return `${name} shows strong alignment with the position requirements.`;
    case "Good Match":
      return `${name} demonstrates good fit for the position with some areas for improvement.`;
    case "Moderate Match":
      return `${name} has moderate alignment with some gaps in key requirements.`;
    case "Weak Match":
      return `${name} does not align well with the core position requirements.`;
  }
}

function candidateName(candidate: CandidateProfile): string {
  return candidate.name?.trim() || "Candidate";
}

function isRawExplanation(value: unknown): value is RawExplanation {
  return isRecord(value) && toText(value.summary).length > 0;
}
