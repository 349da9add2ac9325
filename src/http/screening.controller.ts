import { Request, Response, Router } from "express";
import { Logger, errorMessage } from "../config/logger";
import { ScreeningPipeline } from "../matching/screening.pipeline";
import { CohortAuditor } from "../qa/cohort-auditor";
import { AnalysisRecord, AnalysisStore } from "../shared/types/analysis.types";
import { toScoreRecord } from "../matching/scoring/score-breakdown";
import {
  AnalysesQuery,
  parseAnalysesQuery,
  parseAuditBody,
  parseScreeningBody,
} from "./screening.requests";

interface ScreeningControllerDeps {
  pipeline: ScreeningPipeline;
  auditor: CohortAuditor;
  logger: Logger;
  analyses?: AnalysisStore;
}

export function buildScreeningController(deps: ScreeningControllerDeps): Router {
  const router = Router();

  router.post("/screenings", async (request: Request, response: Response) => {
    const parsed = parseScreeningBody(request.body);
    if (!parsed.ok) {
      response.status(400).json({ ok: false, error: parsed.error });
      return;
    }

    try {
      const result = await deps.pipeline.run(parsed.value);
      response.status(200).json({
        ok: true,
        ranked: result.ranked.map((item) => ({
          rank: item.rank,
          candidate: item.candidate,
          score: toScoreRecord(item.breakdown),
          explanation: item.explanation
            ? {
                summary: item.explanation.summary,
                top_reasons: item.explanation.topReasons,
                recommendation: item.explanation.recommendation,
              }
            : null,
        })),
        bias_report: result.biasReport.toJSON(),
        storage: result.storage ?? null,
      });
    } catch (error) {
      deps.logger.error("Screening request failed", {
        candidates: parsed.value.candidates.length,
        error: errorMessage(error),
      });
      response.status(500).json({ ok: false, error: "Screening failed" });
    }
  });

  router.post("/audits", (request: Request, response: Response) => {
    const parsed = parseAuditBody(request.body);
    if (!parsed.ok) {
      response.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    try {
      const report = deps.auditor.generateReport(parsed.value.candidates, parsed.value.scores);
      response.status(200).json({ ok: true, report: report.toJSON() });
    } catch (error) {
      deps.logger.error("Audit request failed", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Audit failed" });
    }
  });

  router.get("/analyses/stats", async (_request: Request, response: Response) => {
    if (!deps.analyses) {
      response.status(503).json({ ok: false, error: "Analysis storage is not configured" });
      return;
    }
    try {
      response.status(200).json({ ok: true, statistics: await deps.analyses.getStatistics() });
    } catch (error) {
      deps.logger.error("Analysis statistics request failed", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Failed to load statistics" });
    }
  });

  router.get("/analyses", async (request: Request, response: Response) => {
    const analyses = deps.analyses;
    if (!analyses) {
      response.status(503).json({ ok: false, error: "Analysis storage is not configured" });
      return;
    }
    const parsed = parseAnalysesQuery({ ...request.query });
    if (!parsed.ok) {
      response.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    try {
      const items = await runAnalysesQuery(analyses, parsed.value);
      response.status(200).json({ ok: true, items });
    } catch (error) {
      deps.logger.error("Analyses request failed", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Failed to load analyses" });
    }
  });

  router.delete("/analyses/:id", async (request: Request, response: Response) => {
    if (!deps.analyses) {
      response.status(503).json({ ok: false, error: "Analysis storage is not configured" });
      return;
    }
    try {
      const deleted = await deps.analyses.deleteAnalysis(request.params.id);
      response.status(deleted ? 200 : 404).json({ ok: deleted });
    } catch (error) {
      deps.logger.error("Analysis delete failed", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Failed to delete analysis" });
    }
  });

  return router;
}

function runAnalysesQuery(analyses: AnalysisStore, query: AnalysesQuery): Promise<AnalysisRecord[]> {
  switch (query.kind) {
    case "recent":
      return analyses.listRecent(query.limit, query.offset);
    case "candidate":
      return analyses.listByCandidate(query.candidateName);
    case "score":
      return analyses.listByScoreRange(query.minScore, query.maxScore);
    case "time":
      return analyses.listByTimeRange(query.from, query.to);
  }
}
