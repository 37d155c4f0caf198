/**
 * Matching defaults
 */

import type { MatchingMode } from "@/types";

export const MATCHING_MODES: readonly MatchingMode[] = [
  "exact",
  "tokenized",
  "fuzzy",
];

/**
 * Mode used when none is configured, and the fallback for unknown modes
 */
export const DEFAULT_MATCHING_MODE: MatchingMode = "tokenized";

export const DEFAULT_FUZZY_THRESHOLD = 0.85;
