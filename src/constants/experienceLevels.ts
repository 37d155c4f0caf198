/**
 * Experience level keyword sets
 *
 * Each keyword is matched as a whole token sequence against the tokenized
 * title, so "intern" does not fire on "international" and "sr" does not
 * fire on "srv".
 */

import type { ExperienceLevel } from "@/types";

export const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = [
  "intern",
  "entry",
  "mid",
  "senior",
];

export const EXPERIENCE_LEVEL_KEYWORDS: Record<
  ExperienceLevel,
  readonly string[]
> = {
  intern: [
    "intern",
    "internship",
    "co op",
    "coop",
    "apprentice",
    "apprenticeship",
    "working student",
  ],
  entry: [
    "entry level",
    "entry",
    "junior",
    "jr",
    "graduate",
    "new grad",
    "associate",
  ],
  mid: ["mid level", "mid", "intermediate"],
  senior: [
    "senior",
    "sr",
    "lead",
    "principal",
    "director",
    "manager",
    "staff",
    "head",
  ],
};
