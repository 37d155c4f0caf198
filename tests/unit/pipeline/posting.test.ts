/**
 * Unit tests for posting construction
 */

import { describe, expect, it } from "vitest";
import { createPosting, readPostingInput } from "@/pipeline";

describe("createPosting", () => {
  it("trims fields and defaults missing ones to empty strings", () => {
    const posting = createPosting({
      url: " https://jobs.example.com/7 ",
      company: "Acme ",
      title: "  Platform Engineer",
      location: null,
    });

    expect(posting).toEqual({
      url: "https://jobs.example.com/7",
      company: "Acme",
      title: "Platform Engineer",
      location: "",
      employmentType: "",
      description: "",
      firstSeenAt: null,
      notified: false,
    });
  });

  it("returns a frozen value", () => {
    const posting = createPosting({
      url: "https://jobs.example.com/7",
      company: "Acme",
      title: "Engineer",
    });

    expect(Object.isFrozen(posting)).toBe(true);
  });

  it("rejects a blank URL or title", () => {
    expect(
      createPosting({ url: "  ", company: "Acme", title: "Engineer" }),
    ).toBeNull();
    expect(
      createPosting({
        url: "https://jobs.example.com/7",
        company: "Acme",
        title: "",
      }),
    ).toBeNull();
  });

  it("keeps a posting without company", () => {
    expect(
      createPosting({
        url: "https://jobs.example.com/7",
        company: "",
        title: "Engineer",
      })?.company,
    ).toBe("");
  });
});

describe("readPostingInput", () => {
  it("should reject items that are not objects", () => {
    expect(readPostingInput(null)).toBeNull();
    expect(readPostingInput(42)).toBeNull();
    expect(readPostingInput("https://jobs.example.com/1")).toBeNull();
  });

  it("should treat non-string fields as missing", () => {
    expect(
      readPostingInput({ url: 7, title: "Engineer", company: "Acme", location: 3 }),
    ).toEqual({
      url: "",
      company: "Acme",
      title: "Engineer",
      location: null,
      employmentType: null,
      description: null,
    });
  });
});
