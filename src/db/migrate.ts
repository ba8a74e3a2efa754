import { env } from "../core/config";
import { logger } from "../core/logger";
import { openDatabase } from "./client";
import { runMigrations } from "./migrator";

function main(): void {
  const { sqlite } = openDatabase(env.DATABASE_PATH, { migrate: false });
  try {
    runMigrations(sqlite);
    logger.info("Database schema pushed successfully");
  } catch (error) {
    logger.error({ err: error }, "Database push failed");
    process.exitCode = 1;
  } finally {
    sqlite.close();
  }
}

main();
