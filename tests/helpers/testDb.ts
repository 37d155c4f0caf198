/**
 * Test Database Harness
 *
 * Creates fresh temporary SQLite databases per test.
 * Runs real migrations, provides DB handle, handles cleanup.
 *
 * Usage:
 *   const harness = createTestDb();
 *   // ... use harness.db for repos ...
 *   harness.cleanup();
 */

import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { applyMigrations, setDbForTesting } from "@/db";

export interface TestDbHarness {
  /** The SQLite database connection */
  db: Database.Database;
  /** Path to the temp database file */
  dbPath: string;
  /** Clean up: close connection and delete temp file */
  cleanup: () => void;
}

/**
 * Generate a unique temp file path for a test database
 */
function generateTempDbPath(): string {
  const random = Math.random().toString(36).substring(2, 8);
  const filename = `test-${Date.now()}-${random}.db`;
  const tempDir = join(tmpdir(), "job-alerts-tests");

  mkdirSync(tempDir, { recursive: true });

  return join(tempDir, filename);
}

/**
 * Create a fresh test database with all migrations applied.
 *
 * The harness injects the test DB into the production singleton,
 * so repos work transparently with the test database.
 *
 * IMPORTANT: Always call cleanup() after the test completes.
 */
export function createTestDb(): TestDbHarness {
  const dbPath = generateTempDbPath();

  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  applyMigrations(db);

  setDbForTesting(db);

  const cleanup = () => {
    setDbForTesting(null);

    try {
      db.close();
    } catch {
      // Ignore close errors
    }

    rmSync(dbPath, { force: true });
    rmSync(dbPath + "-wal", { force: true });
    rmSync(dbPath + "-shm", { force: true });
  };

  return { db, dbPath, cleanup };
}
