import express, { Express, Request, Response } from "express";
import { HashingEmbedder } from "./ai/hashing.embedder";
import { OpenAiEmbeddingsClient } from "./ai/embeddings.client";
import { LlmClient } from "./ai/llm.client";
import { TextEmbedder } from "./ai/text-embedder";
import { EnvConfig } from "./config/env";
import { Logger, withLogContext } from "./config/logger";
import { AnalysesRepository } from "./db/repositories/analyses.repo";
import { SupabaseRestClient } from "./db/supabase.client";
import { buildScreeningController } from "./http/screening.controller";
import { TextSimilarityIndex } from "./matching/index/text-similarity.index";
import { MatchExplanationService } from "./matching/match-explanation.service";
import { QdrantClient } from "./matching/qdrant.client";
import { ScreeningPipeline } from "./matching/screening.pipeline";
import { MatchScorer } from "./matching/scoring/match-scorer";
import { getDefaultVocabulary, loadMatchingVocabulary } from "./matching/vocabulary";
import { CohortAuditor } from "./qa/cohort-auditor";
import { AnalysisStore } from "./shared/types/analysis.types";
import { AnalysisStorageService } from "./storage/analysis-storage.service";

export interface AppServices {
  pipeline: ScreeningPipeline;
  auditor: CohortAuditor;
  similarityIndex: TextSimilarityIndex;
  analyses: AnalysisStore;
}

export interface AppContext {
  app: Express;
  services: AppServices;
}

export async function createServices(env: EnvConfig, logger: Logger): Promise<AppServices> {
  const vocabulary = env.vocabularyDir ? loadMatchingVocabulary(env.vocabularyDir) : getDefaultVocabulary();
  logger.info("Matching vocabulary loaded", {
    skillsVersion: vocabulary.skillsVersion,
    degreesVersion: vocabulary.degreesVersion,
    skills: vocabulary.skills.length,
    degreeLevels: vocabulary.degreeLevels.length,
  });

  const embedder: TextEmbedder = env.openaiApiKey
    ? new OpenAiEmbeddingsClient(env.openaiApiKey, env.openaiEmbeddingModel)
    : new HashingEmbedder();
  const indexLogger = withLogContext(logger, { component: "similarity_index" });
  const similarityIndex = await TextSimilarityIndex.create({
    embedder,
    logger: indexLogger,
    remote: env.qdrantUrl
      ? new QdrantClient(
          {
            baseUrl: env.qdrantUrl,
            apiKey: env.qdrantApiKey,
            collection: env.qdrantCollection,
          },
          indexLogger,
        )
      : undefined,
    local: {
      enabled: env.localIndexEnabled,
      filePath: env.localIndexPath,
    },
  });

  const scorer = new MatchScorer({
    weights: env.scorerWeights,
    similarityIndex,
    vocabulary,
    logger: withLogContext(logger, { component: "scorer" }),
  });
  const auditor = new CohortAuditor({
    missingFieldThreshold: env.auditMissingFieldThreshold,
    varianceThreshold: env.auditVarianceThreshold,
    scoreSpreadThreshold: env.auditScoreSpreadThreshold,
    vocabulary,
    logger: withLogContext(logger, { component: "auditor" }),
  });
  const llmLogger = withLogContext(logger, { component: "explainer" });
  const explainer = new MatchExplanationService(
    env.openaiApiKey ? new LlmClient({ apiKey: env.openaiApiKey, model: env.openaiChatModel }, llmLogger) : null,
    llmLogger,
  );

  const analyses: AnalysisStore =
    env.supabaseUrl && env.supabaseServiceRoleKey
      ? new AnalysesRepository(
          logger,
          new SupabaseRestClient({
            url: env.supabaseUrl,
            serviceRoleKey: env.supabaseServiceRoleKey,
          }),
        )
      : new AnalysisStorageService(env.analysesStoragePath, logger);
  logger.info("Analysis storage selected", {
    backend: analyses instanceof AnalysesRepository ? "supabase" : "local_file",
  });

  const pipeline = new ScreeningPipeline({
    scorer,
    auditor,
    explainer,
    sink: analyses,
    logger,
  });

  return { pipeline, auditor, similarityIndex, analyses };
}

export function buildApp(services: AppServices, logger: Logger): Express {
  const app = express();
  app.use(express.json({ limit: "5mb" }));

  app.get("/health", async (_request: Request, response: Response) => {
    const index = await services.similarityIndex.stats();
    response.status(200).json({ ok: true, similarity_index: index });
  });

  app.use(
    "/api",
    buildScreeningController({
      pipeline: services.pipeline,
      auditor: services.auditor,
      analyses: services.analyses,
      logger,
    }),
  );

  return app;
}

export async function createApp(env: EnvConfig, logger: Logger): Promise<AppContext> {
  const services = await createServices(env, logger);
  return { app: buildApp(services, logger), services };
}
