/**
 * Runner type definitions
 */

import type { RUN_MODES } from "@/constants/runner";

/**
 * What main does with the process
 *
 * - once: one cycle, then exit
 * - forever: a cycle every polling interval until SIGINT/SIGTERM
 * - test-scrape: print every producer's postings with their verdict
 * - test-notify: send a sample posting through every channel
 */
export type RunMode = (typeof RUN_MODES)[number];
