import type Database from "better-sqlite3";
import { readFileSync, readdirSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { logger } from "../core/logger";
import { errorMessage } from "../core/errors";

export const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

const IGNORABLE_ERRORS = ["already exists", "duplicate column"];

/** Applies every not-yet-applied `.sql` file in name order. Returns the files applied. */
export function runMigrations(sqlite: Database.Database, migrationsDir: string = MIGRATIONS_DIR): string[] {
  if (!existsSync(migrationsDir)) {
    logger.info({ migrationsDir }, "No migrations directory found");
    return [];
  }

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS __migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    )
  `);

  const appliedRows = sqlite.prepare("SELECT hash FROM __migrations").all();
  const applied = new Set<string>();
  for (const row of appliedRows) {
    if (typeof row === "object" && row !== null && "hash" in row && typeof row.hash === "string") {
      applied.add(row.hash);
    }
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const newlyApplied: string[] = [];
  for (const file of files) {
    if (applied.has(file)) {
      logger.debug({ file }, "Migration already applied, skipping");
      continue;
    }

    const statements = readFileSync(join(migrationsDir, file), "utf-8")
      .split("--> statement-breakpoint")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    logger.info({ file, statements: statements.length }, "Applying migration...");

    const apply = sqlite.transaction(() => {
      for (const statement of statements) {
        try {
          sqlite.exec(statement);
        } catch (error) {
          const message = errorMessage(error);
          if (IGNORABLE_ERRORS.some((fragment) => message.includes(fragment))) {
            logger.debug({ statement: statement.substring(0, 100) }, "Object already exists, continuing");
            continue;
          }
          logger.error({ err: error, statement: statement.substring(0, 200) }, "Statement failed");
          throw error;
        }
      }
      sqlite.prepare("INSERT INTO __migrations (hash, created_at) VALUES (?, ?)").run(file, Date.now());
    });
    apply();
    newlyApplied.push(file);
  }

  logger.info({ applied: newlyApplied.length }, "All migrations completed");
  return newlyApplied;
}
