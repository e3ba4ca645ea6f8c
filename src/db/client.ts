import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { runMigrations, type MigrationResult } from "./migrate";

export type Db = BetterSQLite3Database;

export interface DbHandle {
  db: Db;
  sqlite: Database.Database;
  migrations: MigrationResult;
}

let handle: DbHandle | null = null;

/** Opens a database file (or ":memory:") and brings its schema up to date. */
export function createDb(path: string): DbHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.pragma("foreign_keys = ON");
  const migrations = runMigrations(sqlite);

  return { db: drizzle(sqlite), sqlite, migrations };
}

/** The process-wide handle on `DATABASE_PATH`, opened (and migrated) on first use. */
export function getDbHandle(): DbHandle {
  if (!handle) {
    handle = createDb(env.DATABASE_PATH);
    logger.info({ path: env.DATABASE_PATH }, "Database connected");
  }
  return handle;
}

export function getDb(): Db {
  return getDbHandle().db;
}

export function closeDb(): void {
  if (handle) {
    handle.sqlite.close();
    handle = null;
    logger.info("Database connection closed");
  }
}
