import { randomUUID } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Logger, errorMessage } from "../config/logger";
import {
  AnalysisInput,
  AnalysisRecord,
  AnalysisStatistics,
  AnalysisStore,
  StoreResult,
} from "../shared/types/analysis.types";
import { isRecord } from "../shared/utils/values";
import {
  DEFAULT_LIST_LIMIT,
  buildAnalysisRecord,
  byNewestFirst,
  computeStatistics,
  parseAnalysisRecord,
} from "./analysis-records";

/**
 * Analysis store backed by a single JSON file. Used when Supabase is not configured.
 */
export class AnalysisStorageService implements AnalysisStore {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    filePath: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  async store(input: AnalysisInput): Promise<StoreResult> {
    const record = buildAnalysisRecord(input, randomUUID(), this.now());
    try {
      await this.mutate((items) => [...items, record]);
      return { ok: true, id: record.id };
    } catch (error) {
      this.logger.error("Failed to persist analysis", {
        analysisId: record.id,
        filePath: this.filePath,
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
    const items = await this.readAll();
    return items.sort(byNewestFirst).slice(Math.max(0, offset), Math.max(0, offset) + Math.max(0, limit));
  }

  async listByCandidate(candidateName: string): Promise<AnalysisRecord[]> {
    const items = await this.readAll();
    return items.filter((item) => item.candidate_name === candidateName).sort(byNewestFirst);
  }

  async listByScoreRange(minScore: number, maxScore = 1): Promise<AnalysisRecord[]> {
    const items = await this.readAll();
    return items
      .filter((item) => item.final_score >= minScore && item.final_score <= maxScore)
      .sort((left, right) => right.final_score - left.final_score);
  }

  async listByTimeRange(from: Date, to: Date): Promise<AnalysisRecord[]> {
    const fromMs = from.getTime();
    const toMs = to.getTime();
    const items = await this.readAll();
    return items
      .filter((item) => {
        const at = Date.parse(item.timestamp);
        return at >= fromMs && at <= toMs;
      })
      .sort(byNewestFirst);
  }

  async getStatistics(): Promise<AnalysisStatistics> {
    return computeStatistics(await this.readAll());
  }

  async deleteAnalysis(id: string): Promise<boolean> {
    let removed = false;
    try {
      await this.mutate((items) => {
        const kept = items.filter((item) => item.id !== id);
        removed = kept.length < items.length;
        return kept;
      });
    } catch (error) {
      this.logger.warn("Failed to delete analysis", { analysisId: id, error: errorMessage(error) });
      return false;
    }
    return removed;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const cutoffMs = cutoff.getTime();
    let removed = 0;
    try {
      await this.mutate((items) => {
        const kept = items.filter((item) => Date.parse(item.timestamp) >= cutoffMs);
        removed = items.length - kept.length;
        return kept;
      });
    } catch (error) {
      this.logger.warn("Failed to prune analyses", { error: errorMessage(error) });
      return 0;
    }
    return removed;
  }

  /**
   * Read-modify-write through the write chain. A file that exists but cannot be
   * read back in full rejects the write, so earlier records are never overwritten.
   */
  private mutate(update: (items: AnalysisRecord[]) => AnalysisRecord[]): Promise<void> {
    const run = this.writeChain.then(async () => {
      const loaded = await this.loadRecords();
      if (loaded.skipped > 0) {
        throw new Error(`Analysis storage file has ${loaded.skipped} unreadable record(s); refusing to rewrite it.`);
      }
      await this.writeAll(update(loaded.records));
    });
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async readAll(): Promise<AnalysisRecord[]> {
    try {
      const loaded = await this.loadRecords();
      if (loaded.skipped > 0) {
        this.logger.warn("Skipped unreadable analysis records", {
          filePath: this.filePath,
          skipped: loaded.skipped,
        });
      }
      return loaded.records;
    } catch (error) {
      this.logger.warn("Analysis storage file could not be read", {
        filePath: this.filePath,
        error: errorMessage(error),
      });
      return [];
    }
  }

  /** Missing file = empty store; any other read or parse failure throws. */
  private async loadRecords(): Promise<{ records: AnalysisRecord[]; skipped: number }> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return { records: [], skipped: 0 };
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error("Analysis storage file does not contain a JSON array.");
    }
    const items: unknown[] = parsed;
    const records: AnalysisRecord[] = [];
    for (const item of items) {
      const record = parseAnalysisRecord(item);
      if (record) {
        records.push(record);
      }
    }
    return { records, skipped: items.length - records.length };
  }

  private async writeAll(items: AnalysisRecord[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(items, null, 2), "utf-8");
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}
