import { startRestServer } from "./rest/server.js";
import { logger, pruneOldLogs } from "./logging.js";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";

async function main() {
  logger.info({ port: config.rest.port }, "Volume screener starting");

  // Validate configuration early
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  // Prune old log files (keep 30 days)
  pruneOldLogs();

  const server = await startRestServer();

  // Graceful shutdown
  const shutdown = () => {
    logger.info("Shutting down...");
    server.close((err) => {
      if (err) logger.error({ err }, "HTTP server close failed");
      process.exit(err ? 1 : 0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  // Unhandled rejections are logged; the server keeps running.
  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
