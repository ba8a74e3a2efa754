import type { Command } from "commander";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { openDatabase } from "../../db/client";
import { runMigrations } from "../../db/migrator";

export const commands = (program: Command) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate")
    .description("Run database migrations")
    .action(() => {
      const { sqlite } = openDatabase(env.DATABASE_PATH, { migrate: false });
      try {
        const applied = runMigrations(sqlite);
        logger.info({ applied }, "Migrations finished");
      } finally {
        sqlite.close();
      }
    });
};
