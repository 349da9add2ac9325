import { createHash } from "node:crypto";
import { TextEmbedder } from "./text-embedder";

const DEFAULT_DIMENSION = 384;
const BIGRAM_WEIGHT = 0.5;

/**
 * Local feature-hashing embedder: signed hashed unigrams and bigrams, L2-normalized.
 * Needs no model download or network and is fully deterministic.
 */
export class HashingEmbedder implements TextEmbedder {
  readonly modelName: string;

  constructor(readonly dimension = DEFAULT_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid embedding dimension: ${dimension}`);
    }
    this.modelName = `feature-hashing-${dimension}`;
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = tokenize(text);

    for (let index = 0; index < tokens.length; index += 1) {
      this.accumulate(vector, tokens[index], 1);
      if (index + 1 < tokens.length) {
        this.accumulate(vector, `${tokens[index]} ${tokens[index + 1]}`, BIGRAM_WEIGHT);
      }
    }

    const norm = Math.sqrt(vector.reduce((total, value) => total + value * value, 0));
    if (norm === 0) {
      return vector;
    }
    return vector.map((value) => value / norm);
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const digest = createHash("sha256").update(feature, "utf8").digest();
    const bucket = digest.readUInt32BE(0) % this.dimension;
    const sign = (digest[4] & 1) === 0 ? 1 : -1;
    vector[bucket] += sign * weight;
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9+#]+/g) ?? [];
}
