export type BackendKind = "remote" | "local" | "memory";

export type VectorMetadata = Record<string, unknown>;

export interface VectorEntry {
  id: string;
  vector: number[];
  metadata: VectorMetadata;
}

export interface SearchHit {
  id: string;
  score: number;
  metadata: VectorMetadata;
}

export type DeleteResult = "deleted" | "unsupported" | "failed";

/**
 * Storage contract shared by every index tier. Implementations throw on failure;
 * the similarity index turns failures into degraded results.
 */
export interface VectorBackend {
  readonly kind: BackendKind;
  upsert(entry: VectorEntry): Promise<void>;
  /** Hits ordered by descending score; higher is more similar. */
  search(vector: number[], limit: number): Promise<SearchHit[]>;
  delete(id: string): Promise<Exclude<DeleteResult, "failed">>;
  clear(): Promise<void>;
  count(): Promise<number | null>;
}
