/**
 * Runner constants
 */

export const DEFAULT_POLLING_INTERVAL_MINUTES = 10;

/**
 * Run modes accepted in RUN_MODE
 */
export const RUN_MODES = [
  "once",
  "forever",
  "test-scrape",
  "test-notify",
] as const;

export const DEFAULT_RUN_MODE = "forever";
