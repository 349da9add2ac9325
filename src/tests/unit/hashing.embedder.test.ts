import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { HashingEmbedder, tokenize } from "../../ai/hashing.embedder";
import { cosineSimilarity } from "../../matching/index/vector-math";

function norm(vector: number[]): number {
  return Math.sqrt(vector.reduce((total, value) => total + value * value, 0));
}

describe("HashingEmbedder", () => {
  it("produces deterministic unit vectors of the configured dimension", async () => {
    const embedder = new HashingEmbedder(64);
    const first = await embedder.embed("Senior Python engineer");
    const second = await embedder.embed("Senior Python engineer");

    assert.equal(embedder.modelName, "feature-hashing-64");
    assert.equal(first.length, 64);
    assert.deepEqual(first, second);
    assert.ok(Math.abs(norm(first) - 1) < 1e-9);
  });

  it("returns a zero vector for text without tokens", () => {
    const vector = new HashingEmbedder(16).embedSync("  !!  ");
    assert.deepEqual(vector, new Array<number>(16).fill(0));
  });

  it("places related texts closer than unrelated ones", () => {
    const embedder = new HashingEmbedder();
    const job = embedder.embedSync("python django backend developer");
    const related = embedder.embedSync("python django backend engineer");
    const unrelated = embedder.embedSync("watercolor painting workshop");
    assert.ok(cosineSimilarity(job, related) > cosineSimilarity(job, unrelated));
  });

  it("rejects a non-positive dimension", () => {
    assert.throws(() => new HashingEmbedder(0), /Invalid embedding dimension: 0/);
  });

  it("keeps + and # inside tokens", () => {
    assert.deepEqual(tokenize("C++ and C# dev!"), ["c++", "and", "c#", "dev"]);
  });
});
