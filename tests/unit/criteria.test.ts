/**
 * Unit tests for criteria compilation
 */

import { describe, it, expect } from "vitest";
import { compileCriteria } from "@/matching/criteria";
import { createCapturingLogger } from "../helpers/fakes";

describe("compileCriteria", () => {
  it("should apply defaults to empty criteria", () => {
    const criteria = compileCriteria({});

    expect(criteria).toEqual({
      include: [],
      exclude: [],
      locations: [],
      experienceLevels: [],
      mode: "tokenized",
      fuzzyThreshold: 0.85,
      caseSensitive: false,
    });
  });

  it("should trim, lowercase and de-duplicate keywords", () => {
    const criteria = compileCriteria({
      include: [" Software Engineer ", "software engineer", "", "   ", "SRE"],
      exclude: ["Manager"],
      locations: ["Remote"],
    });

    expect(criteria.include).toEqual(["software engineer", "sre"]);
    expect(criteria.exclude).toEqual(["manager"]);
    expect(criteria.locations).toEqual(["remote"]);
  });

  it("should keep keyword case when case-sensitive", () => {
    const criteria = compileCriteria({
      include: ["Go", "go"],
      caseSensitive: true,
    });

    expect(criteria.include).toEqual(["Go", "go"]);
  });

  it("should accept a known mode in any case", () => {
    expect(compileCriteria({ mode: " FUZZY " }).mode).toBe("fuzzy");
    expect(compileCriteria({ mode: "exact" }).mode).toBe("exact");
  });

  it("should fall back to tokenized on an unknown mode and warn", () => {
    const logger = createCapturingLogger();

    const criteria = compileCriteria({ mode: "semantic" }, logger);

    expect(criteria.mode).toBe("tokenized");
    expect(logger.entries).toEqual([
      {
        level: "warn",
        message: "Unknown matching mode, falling back",
        meta: { mode: "semantic", fallback: "tokenized" },
      },
    ]);
  });

  it("should clamp a threshold outside [0, 1]", () => {
    const logger = createCapturingLogger();

    expect(compileCriteria({ fuzzyThreshold: 1.5 }, logger).fuzzyThreshold).toBe(
      1,
    );
    expect(
      compileCriteria({ fuzzyThreshold: -0.2 }, logger).fuzzyThreshold,
    ).toBe(0);
    expect(logger.messages("warn")).toEqual([
      "Fuzzy threshold outside [0, 1], clamping",
      "Fuzzy threshold outside [0, 1], clamping",
    ]);
  });

  it("should use the default threshold when it is not a number", () => {
    const logger = createCapturingLogger();

    expect(compileCriteria({ fuzzyThreshold: NaN }, logger).fuzzyThreshold).toBe(
      0.85,
    );
    expect(logger.messages("warn")).toEqual([
      "Invalid fuzzy threshold, using default",
    ]);
  });

  it("should drop unknown experience levels", () => {
    const logger = createCapturingLogger();

    const criteria = compileCriteria(
      { experienceLevels: ["Senior", "guru", "senior", "mid"] },
      logger,
    );

    expect(criteria.experienceLevels).toEqual(["senior", "mid"]);
    expect(logger.entries).toEqual([
      {
        level: "warn",
        message: "Ignoring unknown experience level",
        meta: { level: "guru" },
      },
    ]);
  });

  it("should freeze the compiled criteria", () => {
    const criteria = compileCriteria({ include: ["engineer"] });

    expect(Object.isFrozen(criteria)).toBe(true);
    expect(Object.isFrozen(criteria.include)).toBe(true);
  });
});
