import * as dotenv from "dotenv";
import type express from "express";
import { loadConfig, type Config, type Env } from "./config.js";
import { createExpressApp } from "./express-server.js";
import { logger } from "./logger.js";
import { createOperationRegistry } from "./operations.js";
import {
  RetrievalClient,
  createOpenAIBackend,
  createOpenAIClient,
} from "./retrieval-client.js";

export { createExpressApp } from "./express-server.js";
export { loadConfig } from "./config.js";
export { RetrievalClient } from "./retrieval-client.js";
export { OperationRegistry } from "./operation-registry.js";

export interface Application {
  config: Config;
  app: express.Application;
}

/**
 * Wire configuration, upstream client, operations and HTTP app together.
 * Nothing here is created at import time.
 */
export function bootstrap(env: Env = process.env): Application {
  const config = loadConfig(env);
  logger.setLevel(config.logging.level);

  const client = new RetrievalClient(
    createOpenAIBackend(createOpenAIClient(config.openai)),
    config.openai.vectorStoreId
  );
  const registry = createOperationRegistry(client, config.service);

  logger.info(`Using vector store: ${config.openai.vectorStoreId}`);
  return { config, app: createExpressApp({ config, registry }) };
}

async function main(): Promise<void> {
  dotenv.config();

  try {
    const { config, app } = bootstrap();

    logger.info("Starting MCP server application", {
      nodeEnv: config.environment.nodeEnv,
      host: config.api.host,
      port: config.api.port,
      corsOrigins: config.api.corsOrigins,
    });

    const server = app.listen(config.api.port, config.api.host, () => {
      logger.info(`🚀 Server listening on ${config.api.host}:${config.api.port}`, {
        environment: config.environment.nodeEnv,
      });
    });

    const shutdown = () => {
      logger.info("Received shutdown signal, closing server gracefully");
      server.closeAllConnections();
      server.close(() => {
        logger.info("Server closed successfully");
        process.exit(0);
      });
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  } catch (error) {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : "Unknown error",
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    logger.error("Unhandled error in main", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    process.exit(1);
  });
}
