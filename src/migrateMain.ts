/**
 * Migration entrypoint
 *
 * Usage:
 *   npm run migrate
 *
 * Migrates the database named by database.path in the config file, or by
 * DB_PATH when set. CONFIG_PATH and LOG_LEVEL work as for `npm start`.
 */

import "dotenv/config";
import { loadConfig } from "@/config";
import { createLogger, parseLogLevel } from "@/logger";
import { runMigrations } from "@/db";
import { errorMessage } from "@/utils";

function main(): void {
  const bootLogger = createLogger({
    level: parseLogLevel(process.env.LOG_LEVEL) ?? "info",
    context: { component: "migrate" },
  });

  try {
    const config = loadConfig({ logger: bootLogger });
    const applied = runMigrations(config.database.path, bootLogger);
    bootLogger.info("Migrations complete", {
      dbPath: config.database.path,
      applied: applied.length,
    });
  } catch (error) {
    console.error(`Fatal error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

main();
