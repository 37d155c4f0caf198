/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 * `npm run migrate` goes through src/migrateMain.ts.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import type { Logger } from "@/types";
import { openDb, closeDb } from "./connection";

/**
 * Default migrations directory, relative to the working directory
 */
export function getMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
    .all();
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations from the migrations directory
 */
function getPendingMigrations(
  migrationsDir: string,
  appliedMigrations: Set<string>,
): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir);
  } catch (err) {
    throw new Error(
      `Cannot read migrations directory ${migrationsDir}: ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
  }

  const sqlFiles = files.filter((f) => f.endsWith(".sql")).sort();

  return sqlFiles.filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(
  db: Database.Database,
  migrationsDir: string,
  filename: string,
): void {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  // Wrap migration + recording in a transaction
  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Apply every pending migration to an open database
 *
 * @returns Filenames applied, in order
 */
export function applyMigrations(
  db: Database.Database,
  options: { migrationsDir?: string; logger?: Logger } = {},
): string[] {
  const migrationsDir = options.migrationsDir ?? getMigrationsDir();

  ensureMigrationsTable(db);

  const pendingMigrations = getPendingMigrations(
    migrationsDir,
    getAppliedMigrations(db),
  );

  if (pendingMigrations.length === 0) {
    options.logger?.debug("No pending migrations");
    return [];
  }

  options.logger?.info("Applying migrations", {
    count: pendingMigrations.length,
  });

  for (const migration of pendingMigrations) {
    options.logger?.info("Applying migration", { migration });
    applyMigration(db, migrationsDir, migration);
  }

  return pendingMigrations;
}

/**
 * Open the database at `dbPath`, migrate it and close it
 *
 * @returns Filenames applied, in order
 */
export function runMigrations(dbPath: string, logger?: Logger): string[] {
  const db = openDb(dbPath);

  try {
    return applyMigrations(db, { logger });
  } finally {
    closeDb();
  }
}
