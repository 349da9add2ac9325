import fetch from "node-fetch";
import { isRecord } from "../shared/utils/values";
import { TextEmbedder } from "./text-embedder";

const MAX_INPUT_CHARS = 6000;
const MAX_CACHE_ENTRIES = 2_000;

/**
 * Remote embeddings over the OpenAI HTTP API. Vectors are cached per process so a
 * given text always maps to the same vector within one run.
 */
export class OpenAiEmbeddingsClient implements TextEmbedder {
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly apiKey: string,
    readonly modelName: string,
    private readonly baseUrl = "https://api.openai.com/v1",
  ) {}

  async embed(text: string): Promise<number[]> {
    const input = text.slice(0, MAX_INPUT_CHARS);
    const cached = this.cache.get(input);
    if (cached) {
      return cached;
    }

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({ model: this.modelName, input }),
    });
    if (!response.ok) {
      throw new Error(`Embeddings API error: HTTP ${response.status} - ${await response.text()}`);
    }

    const vector = extractEmbedding(await response.json());
    if (vector.length === 0) {
      throw new Error("Embeddings API returned empty vector.");
    }
    this.remember(input, vector);
    return vector;
  }

  private remember(input: string, vector: number[]): void {
    if (this.cache.size >= MAX_CACHE_ENTRIES) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(input, vector);
  }
}

export function extractEmbedding(body: unknown): number[] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    return [];
  }
  const first: unknown = body.data[0];
  if (!isRecord(first) || !Array.isArray(first.embedding)) {
    return [];
  }
  const values: unknown[] = first.embedding;
  const vector: number[] = [];
  for (const value of values) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return [];
    }
    vector.push(value);
  }
  return vector;
}
