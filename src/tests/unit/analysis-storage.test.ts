import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";
import { silentLogger } from "../../config/logger";
import { AnalysesRepository } from "../../db/repositories/analyses.repo";
import { SupabaseFilter, SupabaseRestClient, SupabaseSelectOptions } from "../../db/supabase.client";
import { toScoreRecord } from "../../matching/scoring/score-breakdown";
import { buildAnalysisRecord, parseAnalysisRecord } from "../../storage/analysis-records";
import { AnalysisStorageService } from "../../storage/analysis-storage.service";
import { AnalysisInput } from "../../shared/types/analysis.types";
import { ScoreBreakdown } from "../../shared/types/scoring.types";

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.parse("2026-01-01T00:00:00.000Z");

function breakdown(finalScore: number): ScoreBreakdown {
  return {
    skillMatchScore: 1,
    experienceScore: 1,
    educationScore: 1,
    semanticSimilarityScore: 0.5,
    finalScore,
    matchedSkills: ["Python"],
    missingSkills: [],
    experienceYears: 4,
    requiredExperience: 3,
    hasRequiredDegree: true,
    semanticSource: "lexical",
  };
}

function analysis(name: string, finalScore: number): AnalysisInput {
  return {
    jobDescription: "Python developer",
    candidate: { name, skills: ["Python"], experienceYears: 4, education: [] },
    breakdown: breakdown(finalScore),
  };
}

function dailyClock(): () => Date {
  let calls = 0;
  return () => {
    const now = new Date(START + calls * DAY_MS);
    calls += 1;
    return now;
  };
}

async function tempPath(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "analyses-"));
  return path.join(dir, "nested", "analyses.json");
}

describe("analysis records", () => {
  it("fills defaults for missing candidate fields and copies the explanation", () => {
    const record = buildAnalysisRecord(
      {
        jobDescription: "Python developer",
        candidate: { skills: [], education: [] },
        breakdown: breakdown(0.7),
        explanation: {
          summary: "Solid",
          topReasons: ["a", "b", "c"],
          recommendation: "Good Match",
        },
      },
      "analysis-1",
      new Date(START),
    );

    assert.equal(record.timestamp, "2026-01-01T00:00:00.000Z");
    assert.equal(record.candidate_name, "Unknown");
    assert.equal(record.candidate_email, null);
    assert.equal(record.filename, "unknown.pdf");
    assert.equal(record.semantic_score, 0.5);
    assert.deepEqual(record.explanation_reasons, ["a", "b", "c"]);
    assert.equal(record.explanation_recommendation, "Good Match");
    assert.deepEqual(record.score_breakdown, toScoreRecord(breakdown(0.7)));
  });

  it("rejects rows without an id, timestamp or usable score", () => {
    const valid = buildAnalysisRecord(analysis("Avery Example", 0.9), "analysis-1", new Date(START));
    assert.equal(parseAnalysisRecord({ ...valid, id: undefined }), null);
    assert.equal(parseAnalysisRecord({ ...valid, timestamp: "yesterday" }), null);
    assert.equal(parseAnalysisRecord({ ...valid, score_breakdown: { final_score: 0.9 } }), null);
    assert.equal(parseAnalysisRecord("row"), null);
    assert.equal(parseAnalysisRecord(JSON.parse(JSON.stringify(valid)))?.candidate_name, "Avery Example");
  });
});

describe("AnalysisStorageService", () => {
  it("stores analyses and answers every query shape", async () => {
    const store = new AnalysisStorageService(await tempPath(), silentLogger, dailyClock());
    const results = await store.storeBatch([
      analysis("Avery Example", 0.9),
      analysis("Jordan Sample", 0.5),
      analysis("Riley Placeholder", 0.3),
      analysis("Avery Example", 0.65),
    ]);
    assert.ok(results.every((result) => result.ok && result.id.length > 0));

    const names = (records: Array<{ candidate_name: string }>): string[] =>
      records.map((record) => record.candidate_name);
    const scores = (records: Array<{ final_score: number }>): number[] =>
      records.map((record) => record.final_score);

    assert.deepEqual(names(await store.listRecent(2)), ["Avery Example", "Riley Placeholder"]);
    assert.deepEqual(names(await store.listRecent(2, 2)), ["Jordan Sample", "Avery Example"]);
    assert.deepEqual(scores(await store.listByCandidate("Avery Example")), [0.65, 0.9]);
    assert.deepEqual(scores(await store.listByScoreRange(0.5)), [0.9, 0.65, 0.5]);
    assert.deepEqual(scores(await store.listByScoreRange(0.3, 0.5)), [0.5, 0.3]);
    assert.deepEqual(
      names(await store.listByTimeRange(new Date(START + DAY_MS), new Date(START + 2 * DAY_MS))),
      ["Riley Placeholder", "Jordan Sample"],
    );

    const stats = await store.getStatistics();
    assert.equal(stats.totalAnalyses, 4);
    assert.ok(Math.abs(stats.averageScore - 0.5875) < 1e-12);
    assert.deepEqual(
      [stats.strongMatches, stats.goodMatches, stats.moderateMatches, stats.weakMatches],
      [1, 1, 1, 1],
    );
  });

  it("deletes single analyses and prunes old ones", async () => {
    const store = new AnalysisStorageService(await tempPath(), silentLogger, dailyClock());
    const [first, second] = await store.storeBatch([
      analysis("Avery Example", 0.9),
      analysis("Jordan Sample", 0.5),
      analysis("Riley Placeholder", 0.3),
    ]);

    assert.equal(await store.deleteAnalysis(second.id), true);
    assert.equal(await store.deleteAnalysis(second.id), false);
    assert.equal(await store.deleteOlderThan(new Date(START + 2 * DAY_MS)), 1);

    const remaining = await store.listRecent();
    assert.deepEqual(
      remaining.map((record) => record.candidate_name),
      ["Riley Placeholder"],
    );
    assert.notEqual(remaining[0].id, first.id);
  });

  it("treats a missing or corrupt file as empty", async () => {
    const filePath = await tempPath();
    const store = new AnalysisStorageService(filePath, silentLogger);
    assert.deepEqual(await store.getStatistics(), {
      totalAnalyses: 0,
      averageScore: 0,
      strongMatches: 0,
      goodMatches: 0,
      moderateMatches: 0,
      weakMatches: 0,
    });

    await store.store(analysis("Avery Example", 0.9));
    await writeFile(filePath, "not json", "utf-8");
    assert.deepEqual(await store.listRecent(), []);
  });

  it("leaves an unreadable file untouched and reports the write as failed", async () => {
    const filePath = await tempPath();
    await mkdir(path.dirname(filePath), { recursive: true });
    const truncated = '[{"id":"keep-me"';
    await writeFile(filePath, truncated, "utf-8");
    const store = new AnalysisStorageService(filePath, silentLogger);

    const result = await store.store(analysis("Avery Example", 0.9));
    assert.equal(result.ok, false);
    assert.equal(await store.deleteOlderThan(new Date("2030-01-01T00:00:00.000Z")), 0);
    assert.equal(await store.deleteAnalysis("keep-me"), false);
    assert.equal(await readFile(filePath, "utf-8"), truncated);
  });

  it("refuses to rewrite a file holding records it cannot parse", async () => {
    const filePath = await tempPath();
    await mkdir(path.dirname(filePath), { recursive: true });
    const content = JSON.stringify([{ id: "keep-me" }]);
    await writeFile(filePath, content, "utf-8");
    const store = new AnalysisStorageService(filePath, silentLogger);

    assert.deepEqual(await store.listRecent(), []);
    const result = await store.store(analysis("Avery Example", 0.9));
    assert.equal(result.ok, false);
    assert.equal(await readFile(filePath, "utf-8"), content);
  });
});

class FakeSupabaseClient extends SupabaseRestClient {
  readonly inserted: Array<{ table: string; payload: Record<string, unknown> }> = [];
  readonly selects: SupabaseSelectOptions[] = [];
  readonly deletes: Array<ReadonlyArray<SupabaseFilter>> = [];
  rows: unknown[] = [];
  deletedCount = 0;
  failWith: Error | null = null;

  constructor() {
    super({ url: "http://supabase.test", serviceRoleKey: "test-secret" });
  }

  async insert(table: string, payload: Record<string, unknown>): Promise<void> {
    this.throwIfFailing();
    this.inserted.push({ table, payload });
  }

  async selectMany(_table: string, options: SupabaseSelectOptions = {}): Promise<unknown[]> {
    this.throwIfFailing();
    this.selects.push(options);
    return this.rows;
  }

  async deleteMany(_table: string, filters: ReadonlyArray<SupabaseFilter>): Promise<number> {
    this.throwIfFailing();
    this.deletes.push(filters);
    return this.deletedCount;
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

describe("AnalysesRepository", () => {
  it("inserts one row per analysis into resume_analyses", async () => {
    const client = new FakeSupabaseClient();
    const repo = new AnalysesRepository(silentLogger, client);
    const result = await repo.store(analysis("Avery Example", 0.9));

    assert.equal(result.ok, true);
    assert.equal(client.inserted.length, 1);
    assert.equal(client.inserted[0].table, "resume_analyses");
    assert.equal(client.inserted[0].payload.id, result.id);
    assert.equal(client.inserted[0].payload.candidate_name, "Avery Example");
    assert.equal(client.inserted[0].payload.final_score, 0.9);
  });

  it("reports insert failures per analysis", async () => {
    const client = new FakeSupabaseClient();
    client.failWith = new Error("Supabase insert failed: HTTP 500 - boom");
    const [result] = await new AnalysesRepository(silentLogger, client).storeBatch([analysis("Avery Example", 0.9)]);

    assert.equal(result.ok, false);
    assert.equal(result.ok === false ? result.error : "", "Supabase insert failed: HTTP 500 - boom");
  });

  it("queries by score range and drops invalid rows", async () => {
    const client = new FakeSupabaseClient();
    client.rows = [
      JSON.parse(JSON.stringify(buildAnalysisRecord(analysis("Avery Example", 0.9), "analysis-1", new Date(START)))),
      { id: "broken" },
    ];
    const records = await new AnalysesRepository(silentLogger, client).listByScoreRange(0.8);

    assert.deepEqual(
      records.map((record) => record.id),
      ["analysis-1"],
    );
    assert.deepEqual(client.selects, [
      {
        filters: [
          { column: "final_score", operator: "gte", value: 0.8 },
          { column: "final_score", operator: "lte", value: 1 },
        ],
        order: { column: "final_score" },
      },
    ]);
  });

  it("computes statistics from the stored scores", async () => {
    const client = new FakeSupabaseClient();
    client.rows = [{ final_score: 0.9 }, { final_score: "0.3" }, {}];
    const stats = await new AnalysesRepository(silentLogger, client).getStatistics();

    assert.deepEqual(stats, {
      totalAnalyses: 2,
      averageScore: 0.6,
      strongMatches: 1,
      goodMatches: 0,
      moderateMatches: 0,
      weakMatches: 1,
    });
  });

  it("deletes by id and by cutoff", async () => {
    const client = new FakeSupabaseClient();
    const repo = new AnalysesRepository(silentLogger, client);
    client.deletedCount = 3;

    assert.equal(await repo.deleteOlderThan(new Date(START)), 3);
    assert.equal(await repo.deleteAnalysis("analysis-1"), true);
    assert.deepEqual(client.deletes, [
      [{ column: "timestamp", operator: "lt", value: "2026-01-01T00:00:00.000Z" }],
      [{ column: "id", operator: "eq", value: "analysis-1" }],
    ]);

    client.deletedCount = 0;
    assert.equal(await repo.deleteAnalysis("missing"), false);
  });

  it("degrades to empty results when Supabase fails", async () => {
    const client = new FakeSupabaseClient();
    client.failWith = new Error("Supabase select failed: HTTP 503 - unavailable");
    const repo = new AnalysesRepository(silentLogger, client);

    assert.deepEqual(await repo.listRecent(), []);
    assert.equal((await repo.getStatistics()).totalAnalyses, 0);
    assert.equal(await repo.deleteOlderThan(new Date(START)), 0);
  });
});
