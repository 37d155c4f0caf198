/**
 * Unit tests for token-set similarity
 */

import { describe, it, expect } from "vitest";
import { longestCommonSubsequence, tokenSetRatio } from "@/matching/similarity";

describe("longestCommonSubsequence", () => {
  it("should return 0 when either side is empty", () => {
    expect(longestCommonSubsequence("", "abc")).toBe(0);
    expect(longestCommonSubsequence("abc", "")).toBe(0);
  });

  it("should count a non-contiguous subsequence", () => {
    expect(longestCommonSubsequence("platform", "platfrom")).toBe(7);
    expect(longestCommonSubsequence("abcde", "ace")).toBe(3);
  });
});

describe("tokenSetRatio", () => {
  it("should ignore token order and duplicates", () => {
    expect(tokenSetRatio("software engineer", "engineer software")).toBe(100);
    expect(tokenSetRatio("engineer engineer", "engineer")).toBe(100);
  });

  it("should score a token subset 100", () => {
    expect(
      tokenSetRatio("python developer", "senior python developer"),
    ).toBe(100);
  });

  it("should score 0 when either side has no tokens", () => {
    expect(tokenSetRatio("", "engineer")).toBe(0);
    expect(tokenSetRatio("engineer", "   ")).toBe(0);
  });

  it("should compare leftovers when nothing is shared", () => {
    // LCS("abc", "abd") = 2 over 6 characters
    expect(tokenSetRatio("abc", "abd")).toBeCloseTo(66.667, 2);
  });

  it("should take the best of the three comparisons", () => {
    // sect "engineer" vs "engineer y": 200 * 8 / 18
    expect(tokenSetRatio("senior engineer x", "engineer y")).toBeCloseTo(
      88.889,
      2,
    );
  });

  it("should tolerate a typo in one token", () => {
    // "engineer platform" vs "engineer platfrom": 200 * 16 / 34
    expect(tokenSetRatio("platform engineer", "platfrom engineer")).toBeCloseTo(
      94.118,
      2,
    );
  });

  it("should score unrelated titles low", () => {
    expect(tokenSetRatio("data scientist", "product designer")).toBeLessThan(
      60,
    );
  });
});
