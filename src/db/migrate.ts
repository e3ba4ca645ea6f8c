import type Database from "better-sqlite3";
import { readFileSync, readdirSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { logger } from "../core/logger";

const AppliedRowsSchema = z.array(z.object({ hash: z.string() }));

export const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function runMigrations(db: Database.Database, migrationsDir: string = MIGRATIONS_DIR): MigrationResult {
  const result: MigrationResult = { applied: [], skipped: [] };

  if (!existsSync(migrationsDir)) {
    logger.info({ migrationsDir }, "No migrations directory found");
    return result;
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    )
  `);

  const appliedRows = AppliedRowsSchema.parse(db.prepare("SELECT hash FROM __drizzle_migrations").all());
  const appliedMigrations = new Set(appliedRows.map((row) => row.hash));

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  for (const file of files) {
    if (appliedMigrations.has(file)) {
      logger.debug({ file }, "Migration already applied, skipping");
      result.skipped.push(file);
      continue;
    }

    const content = readFileSync(join(migrationsDir, file), "utf-8");
    const statements = content
      .split("--> statement-breakpoint")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    logger.info({ file, statements: statements.length }, "Applying migration");

    const apply = db.transaction(() => {
      for (const statement of statements) {
        logger.debug({ statement: statement.substring(0, 200) }, "Executing statement");
        db.exec(statement);
      }
      db.prepare("INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)").run(file, Date.now());
    });

    try {
      apply();
    } catch (error) {
      logger.error({ error, file }, "Migration failed");
      throw error;
    }

    result.applied.push(file);
  }

  if (result.applied.length > 0) {
    logger.info({ applied: result.applied }, "Migrations completed");
  }
  return result;
}
