import { cosineSimilarity } from "./vector-math";
import { SearchHit, VectorBackend, VectorEntry, VectorMetadata } from "./vector-backend";

interface StoredVector {
  vector: number[];
  metadata: VectorMetadata;
}

/**
 * Linear-scan cosine store. Always available, lives only as long as the process.
 */
export class MemoryVectorBackend implements VectorBackend {
  readonly kind = "memory" as const;
  private readonly items = new Map<string, StoredVector>();

  async upsert(entry: VectorEntry): Promise<void> {
    this.items.set(entry.id, {
      vector: [...entry.vector],
      metadata: { ...entry.metadata },
    });
  }

  async search(vector: number[], limit: number): Promise<SearchHit[]> {
    const scored: SearchHit[] = [];
    for (const [id, item] of this.items) {
      const score = cosineSimilarity(vector, item.vector);
      if (Number.isFinite(score)) {
        scored.push({ id, score, metadata: { ...item.metadata } });
      }
    }
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, limit));
  }

  async delete(id: string): Promise<"deleted"> {
    this.items.delete(id);
    return "deleted";
  }

  async clear(): Promise<void> {
    this.items.clear();
  }

  async count(): Promise<number> {
    return this.items.size;
  }
}
