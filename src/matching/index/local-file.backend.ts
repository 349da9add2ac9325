import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Logger } from "../../config/logger";
import { isRecord } from "../../shared/utils/values";
import { euclideanDistance } from "./vector-math";
import { SearchHit, VectorBackend, VectorEntry } from "./vector-backend";

const FILE_FORMAT_VERSION = 1;

interface LocalIndexFile {
  version: number;
  entries: VectorEntry[];
}

/**
 * Flat Euclidean index persisted as one JSON file. Scores are `1 / (1 + distance)`.
 * Targeted deletion is not supported; `clear` rebuilds the index.
 */
export class LocalFileVectorBackend implements VectorBackend {
  readonly kind = "local" as const;

  private constructor(
    private readonly filePath: string,
    private entries: Map<string, VectorEntry>,
    private readonly logger: Logger,
  ) {}

  static async open(filePath: string, logger: Logger): Promise<LocalFileVectorBackend> {
    const resolved = path.resolve(process.cwd(), filePath);
    const entries = await readIndexFile(resolved);
    logger.info("Local vector index loaded", {
      filePath: resolved,
      entries: entries.size,
    });
    return new LocalFileVectorBackend(resolved, entries, logger);
  }

  async upsert(entry: VectorEntry): Promise<void> {
    const next = new Map(this.entries);
    next.set(entry.id, {
      id: entry.id,
      vector: [...entry.vector],
      metadata: { ...entry.metadata },
    });
    await this.commit(next);
  }

  async search(vector: number[], limit: number): Promise<SearchHit[]> {
    const scored = Array.from(this.entries.values()).map((entry) => ({
      id: entry.id,
      score: 1 / (1 + euclideanDistance(vector, entry.vector)),
      metadata: { ...entry.metadata },
    }));
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, limit));
  }

  async delete(): Promise<"unsupported"> {
    this.logger.warn("Local vector index does not support targeted deletion");
    return "unsupported";
  }

  async clear(): Promise<void> {
    await this.commit(new Map());
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  /** The in-process map is replaced only once the file write succeeded. */
  private async commit(next: Map<string, VectorEntry>): Promise<void> {
    const payload: LocalIndexFile = {
      version: FILE_FORMAT_VERSION,
      entries: Array.from(next.values()),
    };
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(payload), "utf8");
    this.entries = next;
  }
}

async function readIndexFile(filePath: string): Promise<Map<string, VectorEntry>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return new Map();
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed) || parsed.version !== FILE_FORMAT_VERSION || !Array.isArray(parsed.entries)) {
    throw new Error(`Local vector index file ${filePath} has an unsupported format.`);
  }

  const entries = new Map<string, VectorEntry>();
  for (const item of parsed.entries) {
    if (
      !isRecord(item) ||
      typeof item.id !== "string" ||
      !Array.isArray(item.vector) ||
      !item.vector.every((value) => typeof value === "number")
    ) {
      throw new Error(`Local vector index file ${filePath} contains an invalid entry.`);
    }
    entries.set(item.id, {
      id: item.id,
      vector: item.vector.map(Number),
      metadata: isRecord(item.metadata) ? item.metadata : {},
    });
  }
  return entries;
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}
