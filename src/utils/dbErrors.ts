/**
 * Database error utilities
 */

/**
 * Check if an error is a SQLite UNIQUE constraint violation
 *
 * better-sqlite3 raises SqliteError with code "SQLITE_CONSTRAINT_UNIQUE"
 * (or "SQLITE_CONSTRAINT_PRIMARYKEY") and a message starting with
 * "UNIQUE constraint failed: table.column".
 */
export function isUniqueConstraintError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }

  const code = "code" in err ? err.code : undefined;
  if (
    code === "SQLITE_CONSTRAINT_UNIQUE" ||
    code === "SQLITE_CONSTRAINT_PRIMARYKEY"
  ) {
    return true;
  }

  return err.message.startsWith("UNIQUE constraint failed:");
}

/**
 * Extract a log-friendly message from anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
