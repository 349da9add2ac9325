import { Logger, errorMessage } from "../../config/logger";
import { TextEmbedder } from "../../ai/text-embedder";
import { CandidateProfile } from "../../shared/types/candidate.types";
import { canonicalCandidateText } from "../scoring/component-scores";
import { RemoteVectorClient } from "../qdrant.client";
import { LocalFileVectorBackend } from "./local-file.backend";
import { MemoryVectorBackend } from "./memory.backend";
import { QdrantVectorBackend } from "./qdrant.backend";
import { clampUnit, cosineSimilarity } from "./vector-math";
import {
  BackendKind,
  DeleteResult,
  SearchHit,
  VectorBackend,
  VectorMetadata,
} from "./vector-backend";

const DEFAULT_SEARCH_LIMIT = 10;
const STORED_TEXT_MAX_CHARS = 500;

export interface TextSimilarityIndexOptions {
  embedder: TextEmbedder;
  logger: Logger;
  remote?: RemoteVectorClient;
  local?: {
    enabled: boolean;
    filePath: string;
  };
}

export interface SimilarityIndexStats {
  backend: BackendKind;
  model: string;
  dimension: number | null;
  totalVectors: number | null;
}

export interface UpsertItem {
  id: string;
  content: string | CandidateProfile;
  metadata?: VectorMetadata;
}

/**
 * Comparison surface the scorer depends on.
 */
export interface SemanticComparator {
  compare(a: string, b: string): Promise<number>;
}

export class TextSimilarityIndex implements SemanticComparator {
  private writeChain: Promise<void> = Promise.resolve();
  private observedDimension: number | null = null;

  constructor(
    private readonly embedder: TextEmbedder,
    private readonly backend: VectorBackend,
    private readonly logger: Logger,
  ) {}

  /**
   * Picks the first tier that initializes: remote, then local file, then memory.
   */
  static async create(options: TextSimilarityIndexOptions): Promise<TextSimilarityIndex> {
    const backend = await resolveBackend(options);
    options.logger.info("Similarity index initialized", {
      backend: backend.kind,
      model: options.embedder.modelName,
    });
    return new TextSimilarityIndex(options.embedder, backend, options.logger);
  }

  get backendKind(): BackendKind {
    return this.backend.kind;
  }

  async embed(text: string): Promise<number[]> {
    const vector = await this.embedder.embed(text);
    this.observedDimension = vector.length;
    return vector;
  }

  async upsert(
    id: string,
    content: string | CandidateProfile,
    metadata: VectorMetadata = {},
  ): Promise<boolean> {
    return this.serialize(async () => {
      try {
        const text = typeof content === "string" ? content : canonicalCandidateText(content);
        const vector = await this.embed(text);
        await this.backend.upsert({
          id,
          vector,
          metadata: {
            ...(typeof content === "string" ? {} : candidateMetadata(content)),
            ...metadata,
            text: text.slice(0, STORED_TEXT_MAX_CHARS),
          },
        });
        return true;
      } catch (error) {
        this.logger.error("Similarity index upsert failed", {
          id,
          backend: this.backend.kind,
          error: errorMessage(error),
        });
        return false;
      }
    });
  }

  async upsertBatch(items: ReadonlyArray<UpsertItem>): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    for (const item of items) {
      results[item.id] = await this.upsert(item.id, item.content, item.metadata);
    }
    return results;
  }

  async search(query: string, k = DEFAULT_SEARCH_LIMIT): Promise<SearchHit[]> {
    if (k <= 0) {
      return [];
    }
    try {
      const vector = await this.embed(query);
      return await this.backend.search(vector, k);
    } catch (error) {
      this.logger.error("Similarity index search failed", {
        backend: this.backend.kind,
        error: errorMessage(error),
      });
      return [];
    }
  }

  async compare(a: string, b: string): Promise<number> {
    const [left, right] = await Promise.all([this.embed(a), this.embed(b)]);
    return clampUnit(cosineSimilarity(left, right));
  }

  async delete(id: string): Promise<DeleteResult> {
    return this.serialize(async () => {
      try {
        return await this.backend.delete(id);
      } catch (error) {
        this.logger.error("Similarity index delete failed", {
          id,
          backend: this.backend.kind,
          error: errorMessage(error),
        });
        return "failed";
      }
    });
  }

  async clear(): Promise<boolean> {
    return this.serialize(async () => {
      try {
        await this.backend.clear();
        return true;
      } catch (error) {
        this.logger.error("Similarity index clear failed", {
          backend: this.backend.kind,
          error: errorMessage(error),
        });
        return false;
      }
    });
  }

  async stats(): Promise<SimilarityIndexStats> {
    let totalVectors: number | null = null;
    try {
      totalVectors = await this.backend.count();
    } catch (error) {
      this.logger.warn("Similarity index count failed", {
        backend: this.backend.kind,
        error: errorMessage(error),
      });
    }
    return {
      backend: this.backend.kind,
      model: this.embedder.modelName,
      dimension: this.observedDimension,
      totalVectors,
    };
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(task);
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

async function resolveBackend(options: TextSimilarityIndexOptions): Promise<VectorBackend> {
  const { logger } = options;

  if (options.remote) {
    try {
      await options.remote.probe();
      return new QdrantVectorBackend(options.remote);
    } catch (error) {
      logger.warn("Remote vector index unavailable, falling back", {
        error: errorMessage(error),
      });
    }
  }

  if (options.local?.enabled) {
    try {
      return await LocalFileVectorBackend.open(options.local.filePath, logger);
    } catch (error) {
      logger.warn("Local vector index unavailable, falling back to memory", {
        filePath: options.local.filePath,
        error: errorMessage(error),
      });
    }
  }

  return new MemoryVectorBackend();
}

function candidateMetadata(candidate: CandidateProfile): VectorMetadata {
  return {
    name: candidate.name ?? null,
    email: candidate.email ?? null,
    skills: [...candidate.skills],
    experience_years: candidate.experienceYears ?? null,
    education_count: candidate.education.length,
  };
}
