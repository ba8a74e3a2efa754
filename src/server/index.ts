import { env } from "../core/config";
import { logger } from "../core/logger";
import { buildContainer } from "../app/container";
import { closeDb } from "../db/client";
import { createApp } from "./app";

async function startServer(): Promise<void> {
  const container = await buildContainer();
  const app = createApp(container);

  const server = app.listen(env.API_PORT, env.API_HOST, () => {
    logger.info(`API server listening on http://${env.API_HOST}:${env.API_PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      closeDb();
      process.exit(0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch((error) => {
  logger.fatal({ err: error }, "Server failed to start");
  process.exit(1);
});
