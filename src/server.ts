import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger, service } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("Scoring thresholds", { ...service.getConfig() });
    logger.info("DEBUG_MODE", { enabled: env.debugMode });
  });
}

bootstrap();
