import { randomUUID } from "node:crypto";
import { Logger, errorMessage } from "../../config/logger";
import {
  AnalysisInput,
  AnalysisRecord,
  AnalysisStatistics,
  AnalysisStore,
  StoreResult,
} from "../../shared/types/analysis.types";
import {
  DEFAULT_LIST_LIMIT,
  buildAnalysisRecord,
  computeStatistics,
  emptyStatistics,
  parseAnalysisRecord,
} from "../../storage/analysis-records";
import { isRecord } from "../../shared/utils/values";
import { SupabaseFilter, SupabaseRestClient, SupabaseSelectOptions } from "../supabase.client";

const ANALYSES_TABLE = "resume_analyses";

export class AnalysesRepository implements AnalysisStore {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient: SupabaseRestClient,
  ) {}

  async store(input: AnalysisInput): Promise<StoreResult> {
    const record = buildAnalysisRecord(input, randomUUID(), new Date());
    try {
      await this.supabaseClient.insert(ANALYSES_TABLE, { ...record });
      this.logger.debug("Analysis persisted to Supabase", {
        analysisId: record.id,
        candidateName: record.candidate_name,
        finalScore: record.final_score,
      });
      return { ok: true, id: record.id };
    } catch (error) {
      this.logger.error("Failed to persist analysis", {
        analysisId: record.id,
        candidateName: record.candidate_name,
        error: errorMessage(error),
      });
      return { ok: false, id: record.id, error: errorMessage(error) };
    }
  }

  async storeBatch(inputs: ReadonlyArray<AnalysisInput>): Promise<StoreResult[]> {
    const results: StoreResult[] = [];
    for (const input of inputs) {
      results.push(await this.store(input));
    }
    return results;
  }

  async listRecent(limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<AnalysisRecord[]> {
    return this.select("listRecent", {
      order: { column: "timestamp" },
      limit,
      offset,
    });
  }

  async listByCandidate(candidateName: string): Promise<AnalysisRecord[]> {
    return this.select("listByCandidate", {
      filters: [{ column: "candidate_name", operator: "eq", value: candidateName }],
      order: { column: "timestamp" },
    });
  }

  async listByScoreRange(minScore: number, maxScore = 1): Promise<AnalysisRecord[]> {
    return this.select("listByScoreRange", {
      filters: [
        { column: "final_score", operator: "gte", value: minScore },
        { column: "final_score", operator: "lte", value: maxScore },
      ],
      order: { column: "final_score" },
    });
  }

  async listByTimeRange(from: Date, to: Date): Promise<AnalysisRecord[]> {
    return this.select("listByTimeRange", {
      filters: [
        { column: "timestamp", operator: "gte", value: from.toISOString() },
        { column: "timestamp", operator: "lte", value: to.toISOString() },
      ],
      order: { column: "timestamp" },
    });
  }

  async getStatistics(): Promise<AnalysisStatistics> {
    try {
      const rows = await this.supabaseClient.selectMany(ANALYSES_TABLE, {
        columns: "final_score",
      });
      return computeStatistics(
        rows
          .map((row) => ({ final_score: isRecord(row) ? Number(row.final_score) : Number.NaN }))
          .filter((row) => Number.isFinite(row.final_score)),
      );
    } catch (error) {
      this.logger.warn("Failed to load analysis statistics", {
        error: errorMessage(error),
      });
      return emptyStatistics();
    }
  }

  async deleteAnalysis(id: string): Promise<boolean> {
    return this.remove("deleteAnalysis", [{ column: "id", operator: "eq", value: id }]).then(
      (count) => count > 0,
    );
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    return this.remove("deleteOlderThan", [
      { column: "timestamp", operator: "lt", value: cutoff.toISOString() },
    ]);
  }

  private async select(operation: string, options: SupabaseSelectOptions): Promise<AnalysisRecord[]> {
    try {
      const rows = await this.supabaseClient.selectMany(ANALYSES_TABLE, options);
      const records: AnalysisRecord[] = [];
      for (const row of rows) {
        const record = parseAnalysisRecord(row);
        if (record) {
          records.push(record);
        }
      }
      if (records.length < rows.length) {
        this.logger.warn("Skipped invalid analysis rows", {
          operation,
          skipped: rows.length - records.length,
        });
      }
      return records;
    } catch (error) {
      this.logger.warn("Failed to load analyses", {
        operation,
        error: errorMessage(error),
      });
      return [];
    }
  }

  private async remove(operation: string, filters: SupabaseFilter[]): Promise<number> {
    try {
      const removed = await this.supabaseClient.deleteMany(ANALYSES_TABLE, filters);
      this.logger.info("Analyses deleted", { operation, removed });
      return removed;
    } catch (error) {
      this.logger.warn("Failed to delete analyses", {
        operation,
        error: errorMessage(error),
      });
      return 0;
    }
  }
}
