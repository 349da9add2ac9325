import { Logger, errorMessage } from "../config/logger";
import { BiasReport } from "../qa/bias-report";
import { CohortAuditor } from "../qa/cohort-auditor";
import { AnalysisInput, AnalysisSink, StoreResult } from "../shared/types/analysis.types";
import { CandidateProfile } from "../shared/types/candidate.types";
import { MatchExplanation } from "../shared/types/explanation.types";
import { RequirementOverrides } from "../shared/types/job.types";
import { ScoreBreakdown } from "../shared/types/scoring.types";
import { MatchExplanationService, buildFallbackExplanation } from "./match-explanation.service";
import { MatchScorer } from "./scoring/match-scorer";
import { toScoreRecord } from "./scoring/score-breakdown";

export interface ScreeningRequest {
  jobText: string;
  candidates: ReadonlyArray<CandidateProfile>;
  overrides?: RequirementOverrides;
  explain?: boolean;
  persist?: boolean;
}

export interface RankedCandidate {
  rank: number;
  candidate: CandidateProfile;
  breakdown: ScoreBreakdown;
  explanation?: MatchExplanation;
}

export interface ScreeningResult {
  ranked: RankedCandidate[];
  biasReport: BiasReport;
  storage?: StoreResult[];
}

interface ScreeningPipelineDeps {
  scorer: MatchScorer;
  auditor: CohortAuditor;
  logger: Logger;
  explainer?: MatchExplanationService;
  sink?: AnalysisSink;
}

/**
 * Score, audit, explain and store one cohort against one job description.
 */
export class ScreeningPipeline {
  constructor(private readonly deps: ScreeningPipelineDeps) {}

  async run(request: ScreeningRequest): Promise<ScreeningResult> {
    const startedAt = Date.now();
    const scored = await this.deps.scorer.batchScore(request.candidates, request.jobText, request.overrides);

    const ranked: RankedCandidate[] = scored.map((item, index) => ({
      rank: index + 1,
      candidate: item.candidate,
      breakdown: item.breakdown,
    }));

    const biasReport = this.deps.auditor.generateReport(
      ranked.map((item) => item.candidate),
      ranked.map((item) => toScoreRecord(item.breakdown)),
    );

    if (request.explain) {
      for (const item of ranked) {
        item.explanation = this.deps.explainer
          ? await this.deps.explainer.explain(item.candidate, request.jobText, item.breakdown)
          : buildFallbackExplanation(item.candidate, item.breakdown);
      }
    }

    const result: ScreeningResult = { ranked, biasReport };
    if (request.persist) {
      result.storage = await this.persist(request.jobText, ranked);
    }

    this.deps.logger.info("Screening completed", {
      candidates: ranked.length,
      explained: Boolean(request.explain),
      persisted: result.storage?.filter((item) => item.ok).length ?? 0,
      biasFlags: biasReport.flags.length,
      durationMs: Date.now() - startedAt,
    });
    return result;
  }

  private async persist(jobText: string, ranked: ReadonlyArray<RankedCandidate>): Promise<StoreResult[] | undefined> {
    const { sink, logger } = this.deps;
    if (!sink) {
      logger.warn("Persistence requested but no analysis store is configured");
      return undefined;
    }

    const inputs: AnalysisInput[] = ranked.map((item) => ({
      jobDescription: jobText,
      candidate: item.candidate,
      breakdown: item.breakdown,
      explanation: item.explanation ?? null,
    }));
    try {
      return await sink.storeBatch(inputs);
    } catch (error) {
      logger.error("Analysis batch persistence failed", {
        records: inputs.length,
        error: errorMessage(error),
      });
      return inputs.map(() => ({ ok: false as const, id: "", error: errorMessage(error) }));
    }
  }
}
