import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { env } from "../core/config";
import { logger } from "../core/logger";
import * as schema from "./schema";
import { runMigrations } from "./migrator";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
}

export function openDatabase(path: string, options: { migrate?: boolean } = {}): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");

  if (options.migrate ?? true) {
    runMigrations(sqlite);
  }

  return { db: drizzle(sqlite, { schema }), sqlite };
}

let handle: DatabaseHandle | null = null;

export function getDb(): AppDatabase {
  if (!handle) {
    handle = openDatabase(env.DATABASE_PATH);
    logger.info({ path: env.DATABASE_PATH }, "Database connected");
  }
  return handle.db;
}

export function closeDb(): void {
  if (handle) {
    handle.sqlite.close();
    handle = null;
    logger.info("Database connection closed");
  }
}
