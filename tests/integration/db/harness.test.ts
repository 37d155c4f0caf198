/**
 * Test DB harness and migration runner
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { applyMigrations } from "@/db";

describe("Test DB harness", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    harness?.cleanup();
    harness = null;
  });

  it("applies every migration in order", () => {
    harness = createTestDb();

    const versions = harness.db
      .prepare<[], { version: string }>(
        "SELECT version FROM schema_migrations ORDER BY id",
      )
      .all()
      .map((row) => row.version);

    expect(versions).toEqual([
      "0001_create_postings.sql",
      "0002_create_run_lock.sql",
      "0003_create_cycle_runs.sql",
    ]);
  });

  it("does nothing when migrations are already applied", () => {
    harness = createTestDb();

    expect(applyMigrations(harness.db)).toEqual([]);
  });

  it("fails loudly on a missing migrations directory", () => {
    const { db } = (harness = createTestDb());

    expect(() =>
      applyMigrations(db, { migrationsDir: "/nonexistent/migrations" }),
    ).toThrow(/^Cannot read migrations directory \/nonexistent\/migrations/);
  });
});
