/**
 * Experience level detection
 *
 * Classifies a job title into zero or more of the canonical levels by
 * looking for each level's keywords as whole token sequences.
 */

import type { ExperienceLevel } from "@/types";
import {
  EXPERIENCE_LEVELS,
  EXPERIENCE_LEVEL_KEYWORDS,
} from "@/constants/experienceLevels";
import { containsTokenSequence, tokenize } from "@/utils";

/**
 * Keyword token sequences per level, tokenized once at module load.
 */
const LEVEL_KEYWORD_TOKENS: ReadonlyArray<
  readonly [ExperienceLevel, readonly string[][]]
> = EXPERIENCE_LEVELS.map((level) => [
  level,
  EXPERIENCE_LEVEL_KEYWORDS[level].map((keyword) => tokenize(keyword)),
]);

/**
 * Detect experience levels mentioned in a title.
 *
 * The title is lower-cased regardless of the criteria's case flag.
 * Result order follows EXPERIENCE_LEVELS.
 *
 * @example
 * detectExperienceLevels("Senior Director of Engineering") // ["senior"]
 * detectExperienceLevels("Junior / Mid Frontend Developer") // ["entry", "mid"]
 * detectExperienceLevels("Software Engineer")               // []
 */
export function detectExperienceLevels(title: string): ExperienceLevel[] {
  const titleTokens = tokenize(title.toLowerCase());
  if (titleTokens.length === 0) {
    return [];
  }

  const detected: ExperienceLevel[] = [];
  for (const [level, keywordSequences] of LEVEL_KEYWORD_TOKENS) {
    if (
      keywordSequences.some((sequence) =>
        containsTokenSequence(titleTokens, sequence),
      )
    ) {
      detected.push(level);
    }
  }

  return detected;
}

/**
 * Experience-level check of the matcher.
 *
 * Passes when no allow-list is configured, when the title mentions no
 * level at all, or when at least one detected level is allowed.
 */
export function passesExperienceFilter(
  title: string,
  allowed: readonly ExperienceLevel[],
): boolean {
  if (allowed.length === 0) {
    return true;
  }

  const detected = detectExperienceLevels(title);
  if (detected.length === 0) {
    return true;
  }

  return detected.some((level) => allowed.includes(level));
}
