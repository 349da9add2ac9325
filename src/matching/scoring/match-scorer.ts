import { Logger, errorMessage, silentLogger } from "../../config/logger";
import { ConfigurationError } from "../../shared/errors";
import { CandidateProfile } from "../../shared/types/candidate.types";
import { JobRequirement, RequirementOverrides } from "../../shared/types/job.types";
import {
  ScoreBreakdown,
  ScoredCandidate,
  ScoringWeights,
  SemanticSource,
} from "../../shared/types/scoring.types";
import { round } from "../../shared/utils/values";
import { SemanticComparator } from "../index/text-similarity.index";
import { clampUnit } from "../index/vector-math";
import { MatchingVocabulary, getDefaultVocabulary } from "../vocabulary";
import {
  canonicalCandidateText,
  educationScore,
  experienceScore,
  lexicalSimilarity,
  skillMatchScore,
} from "./component-scores";
import { deriveJobRequirement } from "./job-requirements";
import { freezeBreakdown } from "./score-breakdown";

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  skill: 0.35,
  experience: 0.25,
  education: 0.15,
  semantic: 0.25,
});

const DEFAULT_BATCH_CONCURRENCY = 4;
const WEIGHT_SUM_TOLERANCE = 1e-9;
const FINAL_SCORE_DIGITS = 6;

export interface MatchScorerOptions {
  weights?: ScoringWeights;
  similarityIndex?: SemanticComparator;
  vocabulary?: MatchingVocabulary;
  logger?: Logger;
  batchConcurrency?: number;
}

/**
 * Four-signal weighted scorer: skills, experience, education and semantic similarity.
 * Stateless between calls; the similarity index is only read.
 */
export class MatchScorer {
  readonly weights: Readonly<ScoringWeights>;
  private readonly similarityIndex?: SemanticComparator;
  private readonly vocabulary: MatchingVocabulary;
  private readonly logger: Logger;
  private readonly batchConcurrency: number;

  constructor(options: MatchScorerOptions = {}) {
    this.weights = Object.freeze(validateWeights(options.weights ?? DEFAULT_SCORING_WEIGHTS));
    this.similarityIndex = options.similarityIndex;
    this.vocabulary = options.vocabulary ?? getDefaultVocabulary();
    this.logger = options.logger ?? silentLogger;

    const concurrency = options.batchConcurrency ?? DEFAULT_BATCH_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Batch concurrency must be a positive integer, got ${concurrency}.`);
    }
    this.batchConcurrency = concurrency;
  }

  async score(
    candidate: CandidateProfile,
    jobText: string,
    overrides?: RequirementOverrides,
  ): Promise<ScoreBreakdown> {
    const requirement = deriveJobRequirement(jobText, this.vocabulary, overrides);
    return this.scoreAgainst(candidate, jobText, requirement);
  }

  /**
   * Scores every candidate against one job and returns them by descending final
   * score. Candidates with equal scores keep their input order.
   */
  async batchScore(
    candidates: ReadonlyArray<CandidateProfile>,
    jobText: string,
    overrides?: RequirementOverrides,
  ): Promise<ScoredCandidate[]> {
    const requirement = deriveJobRequirement(jobText, this.vocabulary, overrides);
    const breakdowns = new Array<ScoreBreakdown | undefined>(candidates.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < candidates.length) {
        const index = nextIndex;
        nextIndex += 1;
        breakdowns[index] = await this.scoreAgainst(candidates[index], jobText, requirement);
      }
    };

    const workerCount = Math.min(this.batchConcurrency, candidates.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const scored: ScoredCandidate[] = [];
    breakdowns.forEach((breakdown, inputIndex) => {
      if (breakdown) {
        scored.push({ candidate: candidates[inputIndex], breakdown, inputIndex });
      }
    });
    scored.sort(
      (left, right) =>
        right.breakdown.finalScore - left.breakdown.finalScore || left.inputIndex - right.inputIndex,
    );

    this.logger.info("Batch scoring completed", {
      candidates: candidates.length,
      requiredSkills: requirement.requiredSkills.length,
      topScore: scored[0]?.breakdown.finalScore ?? null,
    });
    return scored;
  }

  private async scoreAgainst(
    candidate: CandidateProfile,
    jobText: string,
    requirement: JobRequirement,
  ): Promise<ScoreBreakdown> {
    const skills = skillMatchScore(candidate.skills, requirement.requiredSkills);
    const experience = experienceScore(candidate.experienceYears, requirement.requiredExperienceYears);
    const education = educationScore(candidate.education, requirement.requiredDegree, this.vocabulary);
    const semantic = await this.semanticScore(candidate, jobText);

    const finalScore =
      this.weights.skill * skills.score +
      this.weights.experience * experience +
      this.weights.education * education +
      this.weights.semantic * semantic.score;

    return freezeBreakdown({
      skillMatchScore: skills.score,
      experienceScore: experience,
      educationScore: education,
      semanticSimilarityScore: semantic.score,
      finalScore: round(finalScore, FINAL_SCORE_DIGITS),
      matchedSkills: skills.matchedSkills,
      missingSkills: skills.missingSkills,
      experienceYears: candidate.experienceYears ?? null,
      requiredExperience: requirement.requiredExperienceYears ?? null,
      hasRequiredDegree: education === 1,
      semanticSource: semantic.source,
    });
  }

  private async semanticScore(
    candidate: CandidateProfile,
    jobText: string,
  ): Promise<{ score: number; source: SemanticSource }> {
    if (this.similarityIndex) {
      try {
        const similarity = await this.similarityIndex.compare(canonicalCandidateText(candidate), jobText);
        return { score: clampUnit(similarity), source: "embedding" };
      } catch (error) {
        this.logger.warn("Semantic comparison failed, using lexical similarity", {
          candidate: candidate.name ?? candidate.filename ?? null,
          error: errorMessage(error),
        });
      }
    }
    return { score: lexicalSimilarity(candidate, jobText), source: "lexical" };
  }
}

export function validateWeights(weights: ScoringWeights): ScoringWeights {
  const entries = Object.entries(weights);
  for (const [name, value] of entries) {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(`Weight ${name} must be a finite non-negative number, got ${value}.`);
    }
  }
  const total = weights.skill + weights.experience + weights.education + weights.semantic;
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE + WEIGHT_SUM_TOLERANCE * Math.abs(total)) {
    throw new ConfigurationError(`Weights must sum to 1.0, got ${total}.`);
  }
  return { ...weights };
}
