import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { createLogger, errorMessage } from "./config/logger";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const { app, services } = await createApp(env, logger);

  app.listen(env.port, () => {
    logger.info("Server started", {
      port: env.port,
      nodeEnv: env.nodeEnv,
      similarityBackend: services.similarityIndex.backendKind,
      llmConfigured: Boolean(env.openaiApiKey),
      chatModel: env.openaiChatModel,
    });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
