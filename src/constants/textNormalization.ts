/**
 * Text normalization constants
 *
 * Used by the tokenized and fuzzy matching modes and by the
 * experience-level classifier.
 */

/**
 * Trailing ordinal/numeral suffix stripped before tokenizing:
 * a Roman numeral from I to VIII, or a decimal number, at the very end.
 *
 * "Software Engineer III" → "Software Engineer"
 * "Data Analyst 2"        → "Data Analyst"
 */
export const TRAILING_SUFFIX_PATTERN = /\s+(I{1,3}|IV|V|VI{0,3}|[0-9]+)$/i;

/**
 * Anything that is not a letter, digit, underscore or whitespace becomes a
 * space. Unicode-aware so accented titles keep their words intact.
 */
export const NON_WORD_PATTERN = /[^\p{L}\p{N}_\s]/gu;

export const WHITESPACE_PATTERN = /\s+/;
