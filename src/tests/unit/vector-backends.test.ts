import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";
import { silentLogger } from "../../config/logger";
import { LocalFileVectorBackend } from "../../matching/index/local-file.backend";
import { MemoryVectorBackend } from "../../matching/index/memory.backend";
import { QdrantVectorBackend } from "../../matching/index/qdrant.backend";
import { clampUnit, cosineSimilarity, euclideanDistance } from "../../matching/index/vector-math";
import {
  QdrantPoint,
  RemoteVectorClient,
  readCollectionInfo,
  readScoredPoints,
  toPointId,
} from "../../matching/qdrant.client";

async function tempFile(name: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "vector-index-"));
  return path.join(dir, name);
}

describe("vector math", () => {
  it("handles empty and zero vectors", () => {
    assert.equal(cosineSimilarity([], [1]), 0);
    assert.equal(cosineSimilarity([0, 0], [1, 1]), 0);
    assert.equal(cosineSimilarity([2, 0], [5, 0]), 1);
  });

  it("pads the shorter vector with zeros for distances", () => {
    assert.equal(euclideanDistance([3], [0, 4]), 5);
  });

  it("clamps into the unit interval", () => {
    assert.equal(clampUnit(Number.NaN), 0);
    assert.equal(clampUnit(-0.3), 0);
    assert.equal(clampUnit(1.7), 1);
    assert.equal(clampUnit(0.42), 0.42);
  });
});

describe("MemoryVectorBackend", () => {
  it("ranks by cosine similarity and honors the limit", async () => {
    const backend = new MemoryVectorBackend();
    await backend.upsert({ id: "a", vector: [1, 0], metadata: { name: "A" } });
    await backend.upsert({ id: "b", vector: [0, 1], metadata: {} });
    await backend.upsert({ id: "c", vector: [1, 1], metadata: {} });

    const hits = await backend.search([1, 0], 5);
    assert.deepEqual(
      hits.map((hit) => hit.id),
      ["a", "c", "b"],
    );
    assert.equal(hits[0].score, 1);
    assert.deepEqual(hits[0].metadata, { name: "A" });
    assert.deepEqual(await backend.search([1, 0], 0), []);
  });

  it("does not leak stored metadata to callers", async () => {
    const backend = new MemoryVectorBackend();
    await backend.upsert({ id: "a", vector: [1], metadata: { name: "A" } });
    const [hit] = await backend.search([1], 1);
    hit.metadata.name = "changed";
    const [again] = await backend.search([1], 1);
    assert.equal(again.metadata.name, "A");
  });

  it("deletes, clears and counts entries", async () => {
    const backend = new MemoryVectorBackend();
    await backend.upsert({ id: "a", vector: [1], metadata: {} });
    await backend.upsert({ id: "b", vector: [2], metadata: {} });
    assert.equal(await backend.delete("a"), "deleted");
    assert.equal(await backend.count(), 1);
    await backend.clear();
    assert.equal(await backend.count(), 0);
  });
});

describe("LocalFileVectorBackend", () => {
  it("starts empty when the file does not exist and persists upserts", async () => {
    const filePath = await tempFile("index.json");
    const backend = await LocalFileVectorBackend.open(filePath, silentLogger);
    assert.equal(await backend.count(), 0);

    await backend.upsert({ id: "a", vector: [1, 0], metadata: { name: "A" } });
    await backend.upsert({ id: "b", vector: [0, 1], metadata: {} });

    const hits = await backend.search([1, 0], 1);
    assert.deepEqual(hits, [{ id: "a", score: 1, metadata: { name: "A" } }]);

    const reopened = await LocalFileVectorBackend.open(filePath, silentLogger);
    assert.equal(await reopened.count(), 2);
    const [, second] = await reopened.search([1, 0], 2);
    assert.equal(second.id, "b");
    assert.equal(second.score, 1 / (1 + Math.SQRT2));
  });

  it("does not support targeted deletion but can be cleared", async () => {
    const filePath = await tempFile("index.json");
    const backend = await LocalFileVectorBackend.open(filePath, silentLogger);
    await backend.upsert({ id: "a", vector: [1], metadata: {} });

    assert.equal(await backend.delete(), "unsupported");
    assert.equal(await backend.count(), 1);

    await backend.clear();
    assert.equal(await backend.count(), 0);
    assert.deepEqual(JSON.parse(await readFile(filePath, "utf8")), { version: 1, entries: [] });
  });

  it("refuses files in an unknown format", async () => {
    const filePath = await tempFile("index.json");
    await writeFile(filePath, JSON.stringify({ version: 2, entries: [] }), "utf8");
    await assert.rejects(LocalFileVectorBackend.open(filePath, silentLogger), /unsupported format/);
  });

  it("keeps the in-process index unchanged when an upsert cannot be written", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "vector-index-"));
    const backend = await LocalFileVectorBackend.open(path.join(dir, "sub", "index.json"), silentLogger);
    await writeFile(path.join(dir, "sub"), "not a directory", "utf8");

    await assert.rejects(backend.upsert({ id: "c1", vector: [1, 0], metadata: {} }));
    assert.deepEqual(await backend.search([1, 0], 5), []);
    assert.equal(await backend.count(), 0);
  });

  it("keeps entries when a clear cannot be written", async () => {
    const filePath = await tempFile("index.json");
    const backend = await LocalFileVectorBackend.open(filePath, silentLogger);
    await backend.upsert({ id: "c1", vector: [1, 0], metadata: {} });
    await rm(filePath);
    await mkdir(filePath);

    await assert.rejects(backend.clear());
    assert.equal(await backend.count(), 1);
    assert.deepEqual(
      (await backend.search([1, 0], 5)).map((hit) => hit.id),
      ["c1"],
    );
  });
});

describe("QdrantVectorBackend", () => {
  it("maps entries to points and results to hits", async () => {
    const upserted: QdrantPoint[] = [];
    const client: RemoteVectorClient = {
      async probe() {},
      async upsertPoint(point) {
        upserted.push(point);
      },
      async deletePoint() {},
      async search() {
        return [{ recordId: "cand-1", score: 0.91, payload: { name: "A" } }];
      },
      async dropCollection() {},
      async countPoints() {
        return null;
      },
    };
    const backend = new QdrantVectorBackend(client);

    await backend.upsert({ id: "cand-1", vector: [0.1, 0.2], metadata: { name: "A" } });
    assert.deepEqual(upserted, [{ recordId: "cand-1", vector: [0.1, 0.2], payload: { name: "A" } }]);
    assert.deepEqual(await backend.search([0.1, 0.2], 3), [
      { id: "cand-1", score: 0.91, metadata: { name: "A" } },
    ]);
    assert.deepEqual(await backend.search([0.1, 0.2], 0), []);
    assert.equal(await backend.delete("cand-1"), "deleted");
    assert.equal(await backend.count(), null);
  });
});

describe("Qdrant response readers", () => {
  it("reads point counts and vector size from collection info", () => {
    assert.deepEqual(
      readCollectionInfo({ result: { points_count: 7, config: { params: { vectors: { size: 64 } } } } }),
      { pointCount: 7, vectorSize: 64 },
    );
    assert.deepEqual(readCollectionInfo({ result: { vectors_count: 3.9 } }), { pointCount: 3, vectorSize: null });
    assert.deepEqual(readCollectionInfo("unavailable"), { pointCount: null, vectorSize: null });
  });

  it("restores record ids from the payload and skips malformed hits", () => {
    assert.deepEqual(
      readScoredPoints({
        result: [
          { id: "a1", score: 0.9, payload: { record_id: "cand-1", name: "Avery" } },
          { id: 5, payload: {} },
          "junk",
        ],
      }),
      [
        { recordId: "cand-1", score: 0.9, payload: { name: "Avery" } },
        { recordId: "5", score: 0, payload: {} },
      ],
    );
    assert.deepEqual(readScoredPoints({ status: "ok" }), []);
  });

  it("reads hits from the query endpoint's nested points list", () => {
    assert.deepEqual(
      readScoredPoints({ result: { points: [{ id: "b2", score: 0.4, payload: { record_id: "cand-2" } }] } }),
      [{ recordId: "cand-2", score: 0.4, payload: {} }],
    );
    assert.deepEqual(readScoredPoints({ result: { points: "none" } }), []);
  });

  it("maps record ids to stable UUID-shaped point ids", () => {
    const id = toPointId("cand-1");
    assert.match(id, /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    assert.equal(toPointId("cand-1"), id);
    assert.notEqual(toPointId("cand-2"), id);
  });
});
