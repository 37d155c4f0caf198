/**
 * Match criteria compilation
 *
 * Turns operator-written criteria into the frozen form the matcher reads.
 * Bad values inside the matching settings never fail startup: each one is
 * replaced by its documented fallback and logged once, here.
 */

import type {
  ExperienceLevel,
  Logger,
  MatchCriteria,
  MatchingMode,
  RawMatchCriteria,
} from "@/types";
import {
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_MATCHING_MODE,
  MATCHING_MODES,
} from "@/constants/matching";
import { EXPERIENCE_LEVELS } from "@/constants/experienceLevels";
import { normalizeText } from "@/utils";

function isMatchingMode(value: string): value is MatchingMode {
  return MATCHING_MODES.some((mode) => mode === value);
}

function isExperienceLevel(value: string): value is ExperienceLevel {
  return EXPERIENCE_LEVELS.some((level) => level === value);
}

/**
 * Trim, drop empties, normalize case and de-duplicate (first wins).
 */
function compileKeywords(
  keywords: readonly string[] | undefined,
  caseSensitive: boolean,
): readonly string[] {
  const seen = new Set<string>();
  for (const keyword of keywords ?? []) {
    const trimmed = keyword.trim();
    if (trimmed.length > 0) {
      seen.add(normalizeText(trimmed, caseSensitive));
    }
  }
  return Object.freeze([...seen]);
}

function resolveMode(raw: string | undefined, logger?: Logger): MatchingMode {
  if (raw === undefined) {
    return DEFAULT_MATCHING_MODE;
  }

  const candidate = raw.trim().toLowerCase();
  if (isMatchingMode(candidate)) {
    return candidate;
  }

  logger?.warn("Unknown matching mode, falling back", {
    mode: raw,
    fallback: DEFAULT_MATCHING_MODE,
  });
  return DEFAULT_MATCHING_MODE;
}

function resolveThreshold(raw: number | undefined, logger?: Logger): number {
  if (raw === undefined) {
    return DEFAULT_FUZZY_THRESHOLD;
  }

  if (!Number.isFinite(raw)) {
    logger?.warn("Invalid fuzzy threshold, using default", {
      fuzzyThreshold: raw,
      fallback: DEFAULT_FUZZY_THRESHOLD,
    });
    return DEFAULT_FUZZY_THRESHOLD;
  }

  if (raw < 0 || raw > 1) {
    const clamped = Math.min(1, Math.max(0, raw));
    logger?.warn("Fuzzy threshold outside [0, 1], clamping", {
      fuzzyThreshold: raw,
      clamped,
    });
    return clamped;
  }

  return raw;
}

function resolveExperienceLevels(
  raw: readonly string[] | undefined,
  logger?: Logger,
): readonly ExperienceLevel[] {
  const levels = new Set<ExperienceLevel>();

  for (const value of raw ?? []) {
    const candidate = value.trim().toLowerCase();
    if (isExperienceLevel(candidate)) {
      levels.add(candidate);
    } else {
      logger?.warn("Ignoring unknown experience level", { level: value });
    }
  }

  return Object.freeze([...levels]);
}

/**
 * Compile raw criteria.
 *
 * - Unknown mode: warning, `tokenized`
 * - Threshold outside [0, 1]: warning, clamped
 * - Unknown experience level: warning, dropped
 */
export function compileCriteria(
  raw: RawMatchCriteria,
  logger?: Logger,
): MatchCriteria {
  const caseSensitive = raw.caseSensitive ?? false;

  return Object.freeze({
    include: compileKeywords(raw.include, caseSensitive),
    exclude: compileKeywords(raw.exclude, caseSensitive),
    locations: compileKeywords(raw.locations, caseSensitive),
    experienceLevels: resolveExperienceLevels(raw.experienceLevels, logger),
    mode: resolveMode(raw.mode, logger),
    fuzzyThreshold: resolveThreshold(raw.fuzzyThreshold, logger),
    caseSensitive,
  });
}
