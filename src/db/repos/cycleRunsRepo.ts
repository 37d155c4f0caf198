/**
 * Cycle runs repository
 *
 * Data access layer for cycle_runs table.
 */

import type { CycleRunRow, CycleRunUpdate } from "@/types";
import { getDb } from "../connection";

/**
 * Create a new cycle run
 * Returns the run id
 */
export function createCycleRun(
  startedAt: string = new Date().toISOString(),
): number {
  const db = getDb();

  const result = db
    .prepare("INSERT INTO cycle_runs (started_at) VALUES (?)")
    .run(startedAt);

  return Number(result.lastInsertRowid);
}

/**
 * Finish a cycle run with its final status and counters
 */
export function finishCycleRun(runId: number, update: CycleRunUpdate): void {
  const db = getDb();

  db.prepare(
    `
    UPDATE cycle_runs SET
      finished_at = ?,
      status = ?,
      collected = ?,
      matched = ?,
      new_postings = ?,
      producer_errors = ?,
      channel_errors = ?,
      marked_notified = ?,
      notes = ?
    WHERE id = ?
  `,
  ).run(
    update.finished_at,
    update.status,
    update.collected ?? null,
    update.matched ?? null,
    update.new_postings ?? null,
    update.producer_errors ?? null,
    update.channel_errors ?? null,
    update.marked_notified ?? null,
    update.notes ?? null,
    runId,
  );
}

/**
 * Get run by id
 */
export function getCycleRunById(id: number): CycleRunRow | undefined {
  const db = getDb();
  return db
    .prepare<[number], CycleRunRow>("SELECT * FROM cycle_runs WHERE id = ?")
    .get(id);
}

/**
 * Most recent cycle run, if any
 */
export function getLatestCycleRun(): CycleRunRow | undefined {
  const db = getDb();
  return db
    .prepare<[], CycleRunRow>("SELECT * FROM cycle_runs ORDER BY id DESC LIMIT 1")
    .get();
}
