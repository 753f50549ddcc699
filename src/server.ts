import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, path: "/automation" });
    logger.info("LLM provider configured", {
      provider: env.llmProvider,
      model_name: env.llmModel ?? "default",
      maxRetries: env.maxRetries,
    });
    if (!env.automationSecret) {
      logger.warn("AUTOMATION_SECRET is not set, automation endpoints are unauthenticated");
    }
  });
}

bootstrap();
