/**
 * Text normalization and tokenization
 *
 * Deterministic, dependency-free helpers shared by the matcher and the
 * experience-level classifier. No stemming, no stopwords, no diacritic
 * folding.
 */

import {
  NON_WORD_PATTERN,
  TRAILING_SUFFIX_PATTERN,
  WHITESPACE_PATTERN,
} from "@/constants/textNormalization";

/**
 * Lower-case unless case sensitivity is requested.
 *
 * Applied symmetrically to probe texts and configured keywords.
 */
export function normalizeText(text: string, caseSensitive: boolean): string {
  return caseSensitive ? text : text.toLowerCase();
}

/**
 * Remove one trailing Roman numeral (I–VIII) or decimal number.
 *
 * @example
 * stripTrailingSuffix("Software Engineer III") // "Software Engineer"
 * stripTrailingSuffix("Analyst 2")             // "Analyst"
 * stripTrailingSuffix("Level V Support")       // unchanged
 */
export function stripTrailingSuffix(text: string): string {
  return text.trim().replace(TRAILING_SUFFIX_PATTERN, "");
}

/**
 * Reduce text to a token list.
 *
 * Steps, in order:
 * 1. Strip the trailing ordinal/numeral suffix
 * 2. Replace every non-word character with whitespace
 * 3. Split on whitespace, dropping empty tokens
 *
 * Case is left untouched; callers normalize first.
 *
 * @example
 * tokenize("Full-Stack Engineer (Chrome Extension) II")
 * // ["Full", "Stack", "Engineer", "Chrome", "Extension"]
 */
export function tokenize(text: string): string[] {
  return stripTrailingSuffix(text)
    .replace(NON_WORD_PATTERN, " ")
    .split(WHITESPACE_PATTERN)
    .filter((token) => token.length > 0);
}

/**
 * Check whether `needle` occurs as a consecutive run inside `haystack`.
 */
export function containsTokenSequence(
  haystack: readonly string[],
  needle: readonly string[],
): boolean {
  if (needle.length === 0 || needle.length > haystack.length) {
    return false;
  }

  for (let start = 0; start + needle.length <= haystack.length; start++) {
    // Quick check: first token must match
    if (haystack[start] !== needle[0]) {
      continue;
    }

    let isMatch = true;
    for (let j = 1; j < needle.length; j++) {
      if (haystack[start + j] !== needle[j]) {
        isMatch = false;
        break;
      }
    }

    if (isMatch) {
      return true;
    }
  }

  return false;
}
