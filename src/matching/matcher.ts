/**
 * Posting matcher
 *
 * Pure decision of whether a posting is of interest under compiled criteria.
 * Evaluation short-circuits on the first rejection:
 *
 * 1. No include keywords: accept everything
 * 2. Exclude keyword in title + description: reject
 * 3. Location keywords configured and posting location non-empty:
 *    location must match one of them
 * 4. Experience allow-list: reject only when the title names levels and
 *    none of them is allowed
 * 5. Include keyword in title + description
 */

import type {
  MatchCriteria,
  MatchDeps,
  MatchVerdict,
  MatchingMode,
  Posting,
  SimilarityFn,
} from "@/types";
import { normalizeText, tokenize } from "@/utils";
import { passesExperienceFilter } from "./experienceLevels";
import { tokenSetRatio } from "./similarity";

/**
 * The posting fields the matcher reads.
 */
export type MatchablePosting = Pick<
  Posting,
  "title" | "description" | "location"
>;

/**
 * A text prepared once and probed with many keywords.
 */
type Probe = {
  normalized: string;
  tokens: ReadonlySet<string>;
  /** Tokens joined by single spaces, padded with one space on each side */
  paddedJoined: string;
};

function buildProbe(text: string, caseSensitive: boolean): Probe {
  const normalized = normalizeText(text, caseSensitive);
  const tokens = tokenize(normalized);
  return {
    normalized,
    tokens: new Set(tokens),
    paddedJoined: ` ${tokens.join(" ")} `,
  };
}

/**
 * Title and description joined by one space, skipping empty parts.
 */
export function buildProbeText(posting: MatchablePosting): string {
  return [posting.title, posting.description]
    .filter((part) => part.length > 0)
    .join(" ");
}

/**
 * Tokenized rule: the keyword's tokens appear as a contiguous run of probe
 * tokens, or each of them appears somewhere in the probe. Tokens are
 * compared whole, so "engineer" does not match "engineering".
 */
function matchesTokenized(probe: Probe, keyword: string): boolean {
  const keywordTokens = tokenize(keyword);
  if (keywordTokens.length === 0) {
    return false;
  }

  if (probe.paddedJoined.includes(` ${keywordTokens.join(" ")} `)) {
    return true;
  }

  return keywordTokens.every((token) => probe.tokens.has(token));
}

function matchesKeyword(
  probe: Probe,
  keyword: string,
  mode: MatchingMode,
  fuzzyThreshold: number,
  similarity: SimilarityFn,
): boolean {
  switch (mode) {
    case "exact":
      return probe.normalized.includes(keyword);
    case "tokenized":
      return matchesTokenized(probe, keyword);
    case "fuzzy":
      return (
        matchesTokenized(probe, keyword) ||
        similarity(keyword, probe.normalized) >= fuzzyThreshold * 100
      );
  }
}

function matchesAny(
  probe: Probe,
  keywords: readonly string[],
  criteria: MatchCriteria,
  similarity: SimilarityFn,
): boolean {
  return keywords.some((keyword) =>
    matchesKeyword(
      probe,
      keyword,
      criteria.mode,
      criteria.fuzzyThreshold,
      similarity,
    ),
  );
}

/**
 * Evaluate a posting and report the stage that decided it.
 */
export function evaluatePosting(
  posting: MatchablePosting,
  criteria: MatchCriteria,
  deps: MatchDeps = {},
): MatchVerdict {
  if (criteria.include.length === 0) {
    return "accepted";
  }

  const similarity = deps.similarity ?? tokenSetRatio;
  const probe = buildProbe(buildProbeText(posting), criteria.caseSensitive);

  if (matchesAny(probe, criteria.exclude, criteria, similarity)) {
    return "excluded_keyword";
  }

  const location = posting.location.trim();
  if (criteria.locations.length > 0 && location.length > 0) {
    const locationProbe = buildProbe(location, criteria.caseSensitive);
    if (!matchesAny(locationProbe, criteria.locations, criteria, similarity)) {
      return "location_mismatch";
    }
  }

  if (!passesExperienceFilter(posting.title, criteria.experienceLevels)) {
    return "experience_mismatch";
  }

  if (!matchesAny(probe, criteria.include, criteria, similarity)) {
    return "no_include_keyword";
  }

  return "accepted";
}

/**
 * Boolean match decision.
 */
export function matchesPosting(
  posting: MatchablePosting,
  criteria: MatchCriteria,
  deps: MatchDeps = {},
): boolean {
  return evaluatePosting(posting, criteria, deps) === "accepted";
}

/**
 * Keep accepted postings, in input order. Rejections are logged at debug.
 */
export function filterPostings<T extends MatchablePosting & { url: string }>(
  postings: readonly T[],
  criteria: MatchCriteria,
  deps: MatchDeps = {},
): T[] {
  const accepted: T[] = [];

  for (const posting of postings) {
    const verdict = evaluatePosting(posting, criteria, deps);
    if (verdict === "accepted") {
      accepted.push(posting);
    } else {
      deps.logger?.debug("Posting rejected", {
        url: posting.url,
        title: posting.title,
        verdict,
      });
    }
  }

  return accepted;
}
