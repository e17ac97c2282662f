import { getConfig } from "./config/env.js";
import { logger } from "./logger.js";
import { createDatabase } from "./database/index.js";
import { createApp } from "./http/app.js";

const config = getConfig();
const db = createDatabase();
const app = createApp({ db, config });

const server = app.listen(config.port, () => {
  logger.info(
    { port: config.port, env: config.nodeEnv, database: config.databasePath },
    "Server started successfully",
  );
});

process.on("SIGTERM", () => {
  logger.info("SIGTERM received, shutting down gracefully");
  server.close(() => {
    db.close();
    logger.info("Server closed");
    process.exit(0);
  });
});
