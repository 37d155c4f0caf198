/**
 * Entrypoint
 *
 * Usage:
 *   npm start                          # forever (default)
 *   RUN_MODE=once npm start
 *   RUN_MODE=test-scrape npm start
 *   RUN_MODE=test-notify npm start
 *
 * Environment variables:
 *   - RUN_MODE: once | forever | test-scrape | test-notify
 *   - CONFIG_PATH: JSON config file (defaults to config/config.json)
 *   - LOG_LEVEL: Fallback when the config sets no logging level
 *   - DB_PATH: Overrides database.path
 * Anything the config references as ${VAR} is read from the environment too.
 */

import "dotenv/config";
import type { RunMode } from "@/types";
import { DEFAULT_RUN_MODE, RUN_MODES } from "@/constants";
import { loadConfig } from "@/config";
import { createLogger, parseLogLevel } from "@/logger";
import { applyMigrations, closeDb, openDb } from "@/db";
import {
  createAppContext,
  runForever,
  runOnce,
  testNotify,
  testScrape,
} from "@/orchestration";
import { countChannelErrors, countProducerErrors } from "@/pipeline";
import { errorMessage } from "@/utils";

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

async function run(mode: RunMode): Promise<number> {
  // Used until the config has been read
  const bootLogger = createLogger({
    level: parseLogLevel(process.env.LOG_LEVEL) ?? "info",
  });

  const config = loadConfig({ logger: bootLogger });
  const logger = createLogger({
    level: config.logging.level,
    file: config.logging.file,
  });

  logger.info("Job alerts starting", { mode });

  const db = openDb(config.database.path);
  try {
    applyMigrations(db, { logger });
    const context = createAppContext(config, logger);

    switch (mode) {
      case "test-scrape":
        await testScrape(context);
        return 0;
      case "test-notify": {
        const results = await testNotify(context);
        return results.every((r) => r.ok) ? 0 : 1;
      }
      case "once": {
        const report = await runOnce(context);
        const errors =
          countProducerErrors(report) + countChannelErrors(report);
        return errors > 0 ? 1 : 0;
      }
      case "forever":
        await runForever(context);
        return 0;
    }
  } finally {
    closeDb();
  }
}

async function main() {
  const rawMode = (process.env.RUN_MODE || DEFAULT_RUN_MODE).toLowerCase();

  if (!isRunMode(rawMode)) {
    console.error(`Error: RUN_MODE must be one of ${RUN_MODES.join(", ")}`);
    process.exitCode = 1;
    return;
  }

  try {
    process.exitCode = await run(rawMode);
  } catch (error) {
    console.error(`Fatal error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
