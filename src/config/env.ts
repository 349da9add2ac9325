import dotenv from "dotenv";
import { ConfigurationError } from "../shared/errors";
import { ScoringWeights } from "../shared/types/scoring.types";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey?: string;
  openaiChatModel: string;
  openaiEmbeddingModel: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  qdrantCollection: string;
  localIndexEnabled: boolean;
  localIndexPath: string;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  analysesStoragePath: string;
  vocabularyDir?: string;
  scorerWeights?: ScoringWeights;
  auditMissingFieldThreshold: number;
  auditVarianceThreshold: number;
  auditScoreSpreadThreshold: number;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const localIndexEnabledRaw = source.LOCAL_INDEX_ENABLED ?? "true";
  const missingFieldRaw = source.AUDIT_MISSING_FIELD_THRESHOLD ?? "0.3";
  const varianceRaw = source.AUDIT_VARIANCE_THRESHOLD ?? "0.7";
  const spreadRaw = source.AUDIT_SCORE_SPREAD_THRESHOLD ?? "0.6";

  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`Invalid PORT value: ${portRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    openaiApiKey: getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiEmbeddingModel:
      getOptionalTrimmed(source, "OPENAI_EMBEDDINGS_MODEL") ?? "text-embedding-3-small",
    qdrantUrl: getOptionalTrimmed(source, "QDRANT_URL"),
    qdrantApiKey: getOptionalTrimmed(source, "QDRANT_API_KEY"),
    qdrantCollection: getOptionalTrimmed(source, "QDRANT_COLLECTION") ?? "resume_index_v1",
    localIndexEnabled: parseBoolean(localIndexEnabledRaw),
    localIndexPath: getOptionalTrimmed(source, "LOCAL_INDEX_PATH") ?? "data/index/resume-index.json",
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL")?.replace(/\/+$/, ""),
    supabaseServiceRoleKey: getOptionalTrimmed(source, "SUPABASE_SERVICE_ROLE_KEY"),
    analysesStoragePath:
      getOptionalTrimmed(source, "ANALYSES_STORAGE_PATH") ?? "data/analyses/analyses.json",
    vocabularyDir: getOptionalTrimmed(source, "VOCABULARY_DIR"),
    scorerWeights: parseWeights(getOptionalTrimmed(source, "SCORER_WEIGHTS")),
    auditMissingFieldThreshold: parseFraction("AUDIT_MISSING_FIELD_THRESHOLD", missingFieldRaw),
    auditVarianceThreshold: parsePositive("AUDIT_VARIANCE_THRESHOLD", varianceRaw),
    auditScoreSpreadThreshold: parseFraction("AUDIT_SCORE_SPREAD_THRESHOLD", spreadRaw),
  };
}

function parseWeights(rawValue: string | undefined): ScoringWeights | undefined {
  if (!rawValue) {
    return undefined;
  }
  const values = rawValue.split(",").map((item) => Number(item.trim()));
  if (values.length !== 4 || values.some((value) => !Number.isFinite(value))) {
    throw new ConfigurationError(
      `Invalid SCORER_WEIGHTS value: ${rawValue}. Expected four numbers: skill,experience,education,semantic.`,
    );
  }
  const [skill, experience, education, semantic] = values;
  return { skill, experience, education, semantic };
}

function parseFraction(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigurationError(`Invalid ${name} value: ${value}. Expected number between 0 and 1.`);
  }
  return parsed;
}

function parsePositive(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Invalid ${name} value: ${value}`);
  }
  return parsed;
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new ConfigurationError(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new ConfigurationError(`Invalid LOG_LEVEL value: ${value}`);
}
