/**
 * Resilience agent
 *
 * Entry point for the HTTP analysis service.
 */

import { createServiceContext } from "./context";
import { withLifecycle } from "./domains/lifecycle";
import { config } from "./lib/config";
import { toError } from "./lib/errors";
import { createLogger } from "./lib/logger";
import { startHttpServer } from "./server";

const main = async (): Promise<void> => {
  const logger = createLogger({ level: config.logging.level });

  logger.info("Resilience agent starting...", { nodeEnv: config.server.nodeEnv });

  const { app, lifecycle } = createServiceContext(config, logger);

  try {
    await withLifecycle(lifecycle, async () => {
      const httpServer = await startHttpServer({
        app,
        port: config.server.port,
        host: config.server.host,
        logger,
      });

      // Serve until a termination signal arrives
      const signal = await new Promise<NodeJS.Signals>((resolve) => {
        process.once("SIGTERM", () => resolve("SIGTERM"));
        process.once("SIGINT", () => resolve("SIGINT"));
      });

      logger.info(`Received ${signal}, initiating graceful shutdown`);
      await httpServer.close();
    });
    logger.info("Graceful shutdown complete");
  } catch (error) {
    logger.error("Fatal error", toError(error));
    process.exit(1);
  }
};

main().catch((error: unknown) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
