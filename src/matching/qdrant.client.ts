import { createHash } from "node:crypto";
import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { isRecord } from "../shared/utils/values";

export interface QdrantClientConfig {
  baseUrl: string;
  apiKey?: string;
  collection: string;
}

export interface QdrantPoint {
  recordId: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface QdrantSearchResult {
  recordId: string;
  score: number;
  payload: Record<string, unknown>;
}

/**
 * Operations the remote index tier needs. `QdrantClient` is the production
 * implementation; tests substitute in-process doubles.
 */
export interface RemoteVectorClient {
  probe(): Promise<void>;
  upsertPoint(point: QdrantPoint): Promise<void>;
  deletePoint(recordId: string): Promise<void>;
  search(input: { vector: number[]; limit: number }): Promise<QdrantSearchResult[]>;
  dropCollection(): Promise<void>;
  countPoints(): Promise<number | null>;
}

const RECORD_ID_PAYLOAD_KEY = "record_id";

export class QdrantClient implements RemoteVectorClient {
  private collectionReady = false;
  private vectorSize: number | null = null;
  private readonly baseUrl: string;

  constructor(
    private readonly config: QdrantClientConfig,
    private readonly logger: Logger,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  async probe(): Promise<void> {
    const response = await this.request("GET", this.collectionPath());
    if (!response.ok && response.status !== 404) {
      throw new Error(`Qdrant is not reachable: HTTP ${response.status} - ${response.body}`);
    }
  }

  async ensureCollection(vectorSize: number): Promise<void> {
    if (this.collectionReady && this.vectorSize === vectorSize) {
      return;
    }

    const getResponse = await this.request("GET", this.collectionPath());
    if (getResponse.ok) {
      const existingSize = readCollectionInfo(getResponse.data).vectorSize ?? 0;
      if (existingSize > 0 && existingSize !== vectorSize) {
        this.logger.warn("Qdrant collection vector size mismatch, recreating collection", {
          collection: this.config.collection,
          existingSize,
          requestedSize: vectorSize,
        });
        await this.requestVoid("DELETE", this.collectionPath());
      } else {
        this.collectionReady = true;
        this.vectorSize = existingSize || vectorSize;
        return;
      }
    }

    await this.requestVoid("PUT", this.collectionPath(), {
      vectors: {
        size: vectorSize,
        distance: "Cosine",
      },
    });
    this.collectionReady = true;
    this.vectorSize = vectorSize;
    this.logger.info("Qdrant collection is ready", {
      collection: this.config.collection,
      vectorSize,
    });
  }

  async upsertPoint(point: QdrantPoint): Promise<void> {
    if (point.vector.length === 0) {
      throw new Error("Cannot upsert an empty vector.");
    }
    await this.ensureCollection(point.vector.length);
    await this.requestVoid("PUT", `${this.collectionPath()}/points?wait=true`, {
      points: [
        {
          id: toPointId(point.recordId),
          vector: point.vector,
          payload: {
            ...point.payload,
            [RECORD_ID_PAYLOAD_KEY]: point.recordId,
          },
        },
      ],
    });
  }

  async deletePoint(recordId: string): Promise<void> {
    await this.requestVoid("POST", `${this.collectionPath()}/points/delete?wait=true`, {
      points: [toPointId(recordId)],
    });
  }

  async search(input: { vector: number[]; limit: number }): Promise<QdrantSearchResult[]> {
    if (input.vector.length === 0) {
      return [];
    }
    await this.ensureCollection(input.vector.length);

    const limit = Math.max(1, Math.min(input.limit, 200));
    let response = await this.request(
      "POST",
      `${this.collectionPath()}/points/search`,
      {
        vector: input.vector,
        limit,
        with_payload: true,
        with_vector: false,
      },
    );
    if (!response.ok) {
      response = await this.request(
        "POST",
        `${this.collectionPath()}/points/query`,
        {
          query: input.vector,
          limit,
          with_payload: true,
          with_vector: false,
        },
      );
    }

    if (!response.ok) {
      throw new Error(`Qdrant search failed: HTTP ${response.status} - ${response.body}`);
    }
    return readScoredPoints(response.data);
  }

  async dropCollection(): Promise<void> {
    const response = await this.request("DELETE", this.collectionPath());
    if (!response.ok && response.status !== 404) {
      throw new Error(`Qdrant request failed: HTTP ${response.status} - ${response.body}`);
    }
    this.collectionReady = false;
    this.vectorSize = null;
  }

  async countPoints(): Promise<number | null> {
    const response = await this.request("GET", this.collectionPath());
    if (!response.ok) {
      return null;
    }
    return readCollectionInfo(response.data).pointCount;
  }

  private collectionPath(): string {
    return `/collections/${encodeURIComponent(this.config.collection)}`;
  }

  private async request(
    method: "GET" | "POST" | "DELETE",
    path: string,
    body?: Record<string, unknown>,
  ): Promise<{ ok: true; data: unknown } | { ok: false; status: number; body: string }> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        body: await response.text(),
      };
    }

    return {
      ok: true,
      data: await response.json(),
    };
  }

  private async requestVoid(
    method: "POST" | "PUT" | "DELETE",
    path: string,
    body?: Record<string, unknown>,
  ): Promise<void> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body ? JSON.stringify(body) : undefined,
    });
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Qdrant request failed: HTTP ${response.status} - ${text}`);
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.config.apiKey) {
      headers["api-key"] = this.config.apiKey;
    }
    return headers;
  }
}

/**
 * Qdrant accepts unsigned integers or UUIDs as point ids, so record ids are mapped
 * to a deterministic UUID-shaped digest.
 */
export function toPointId(recordId: string): string {
  const hex = createHash("sha256").update(recordId).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${((parseInt(hex.slice(16, 17), 16) & 0x3) | 0x8).toString(16)}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

export function readCollectionInfo(data: unknown): { pointCount: number | null; vectorSize: number | null } {
  const result: Record<string, unknown> = isRecord(data) && isRecord(data.result) ? data.result : {};
  const config: Record<string, unknown> = isRecord(result.config) ? result.config : {};
  const params: Record<string, unknown> = isRecord(config.params) ? config.params : {};
  const vectors: Record<string, unknown> = isRecord(params.vectors) ? params.vectors : {};
  return {
    pointCount: toCount(result.points_count) ?? toCount(result.vectors_count),
    vectorSize: toCount(vectors.size),
  };
}

/** `/points/search` answers `{ result: [...] }`, `/points/query` answers `{ result: { points: [...] } }`. */
export function readScoredPoints(data: unknown): QdrantSearchResult[] {
  if (!isRecord(data)) {
    return [];
  }
  const result = data.result;
  const items: unknown[] = Array.isArray(result)
    ? result
    : isRecord(result) && Array.isArray(result.points)
      ? result.points
      : [];
  return items.filter(isRecord).map((item) => {
    const stored: Record<string, unknown> = isRecord(item.payload) ? item.payload : {};
    const { [RECORD_ID_PAYLOAD_KEY]: storedId, ...payload } = stored;
    return {
      recordId: typeof storedId === "string" ? storedId : String(item.id),
      score: typeof item.score === "number" ? item.score : 0,
      payload,
    };
  });
}

function toCount(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? Math.floor(value) : null;
}
