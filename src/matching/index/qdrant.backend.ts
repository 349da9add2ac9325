import { RemoteVectorClient } from "../qdrant.client";
import { SearchHit, VectorBackend, VectorEntry } from "./vector-backend";

export class QdrantVectorBackend implements VectorBackend {
  readonly kind = "remote" as const;

  constructor(private readonly client: RemoteVectorClient) {}

  async upsert(entry: VectorEntry): Promise<void> {
    await this.client.upsertPoint({
      recordId: entry.id,
      vector: entry.vector,
      payload: entry.metadata,
    });
  }

  async search(vector: number[], limit: number): Promise<SearchHit[]> {
    if (limit <= 0) {
      return [];
    }
    const results = await this.client.search({ vector, limit });
    return results.map((item) => ({
      id: item.recordId,
      score: item.score,
      metadata: item.payload,
    }));
  }

  async delete(id: string): Promise<"deleted"> {
    await this.client.deletePoint(id);
    return "deleted";
  }

  async clear(): Promise<void> {
    await this.client.dropCollection();
  }

  async count(): Promise<number | null> {
    return this.client.countPoints();
  }
}
