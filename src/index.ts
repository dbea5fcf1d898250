import { config } from "./config";
import { logger } from "./observability/logging";
import { Server } from "./server";
import { createServices } from "./services/container";
import { connectDatabase, disconnectDatabase } from "./utils/dbConnection";
import { ensureIndexes } from "./utils/ensureIndexes";

(async () => {
  if (config.db.driver === "mongo") {
    try {
      await connectDatabase();
      await ensureIndexes();
    } catch (err) {
      logger.fatal({ err }, "Database connection error");
      process.exit(1);
    }
  } else {
    logger.warn("STORAGE_DRIVER=memory: data lives in this process only");
  }

  const services = createServices({ driver: config.db.driver, sleepBoundaryHour: config.sleep.boundaryHour });
  const server = new Server(config.port, services, {
    corsOrigins: config.cors.origins,
    rateLimit: config.rateLimit,
  });
  server.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server
      .stop()
      .then(() => disconnectDatabase())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
})().catch((err: unknown) => {
  logger.fatal({ err }, "Boot failed");
  process.exit(1);
});
