/**
 * Matching type definitions
 */

import type { Logger } from "./logger";

export type MatchingMode = "exact" | "tokenized" | "fuzzy";

/**
 * Canonical experience buckets used for title classification.
 */
export type ExperienceLevel = "intern" | "entry" | "mid" | "senior";

/**
 * Matching criteria as written by the operator (before compilation).
 *
 * `mode` and `experienceLevels` are plain strings here: unknown values are
 * degraded with a warning during compilation rather than rejected.
 */
export type RawMatchCriteria = {
  include?: string[];
  exclude?: string[];
  locations?: string[];
  experienceLevels?: string[];
  mode?: string;
  fuzzyThreshold?: number;
  caseSensitive?: boolean;
};

/**
 * Compiled, frozen criteria used by the matcher.
 *
 * Keyword lists are trimmed, de-duplicated and already case-normalized.
 */
export type MatchCriteria = Readonly<{
  include: readonly string[];
  exclude: readonly string[];
  locations: readonly string[];
  experienceLevels: readonly ExperienceLevel[];
  mode: MatchingMode;
  /** Similarity ratio in [0, 1] */
  fuzzyThreshold: number;
  caseSensitive: boolean;
}>;

/**
 * Token-set similarity function, returns a score in [0, 100].
 */
export type SimilarityFn = (keyword: string, text: string) => number;

/**
 * Collaborators of the matcher. Both are optional.
 */
export type MatchDeps = {
  logger?: Logger;
  similarity?: SimilarityFn;
};

/**
 * Stage at which a posting was rejected, or "accepted".
 * Used for debug logging and diagnostics.
 */
export type MatchVerdict =
  | "accepted"
  | "excluded_keyword"
  | "location_mismatch"
  | "experience_mismatch"
  | "no_include_keyword";
