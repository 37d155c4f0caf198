/**
 * Unit tests for CareersPageProducer and anchor extraction
 */

import { beforeEach, describe, expect, it } from "vitest";
import { CareersPageProducer } from "@/producers/careersPage/careersPageProducer";
import {
  extractAnchors,
  resolveHref,
} from "@/producers/careersPage/htmlAnchors";
import { createSilentLogger } from "@/logger";
import { createMockHttp, loadFixtureText } from "../../helpers/mockHttp";

const PAGE_URL = "https://careers.initech.example/careers";

describe("extractAnchors", () => {
  it("extracts href and collapsed text across lines", () => {
    const html = `<a href="/a">One</a>
      <a data-x="1" href='/b'>
        Two <em>parts</em>
      </a>`;

    expect(extractAnchors(html)).toEqual([
      { href: "/a", text: "One" },
      { href: "/b", text: "Two parts" },
    ]);
  });

  it("decodes entities and drops empty anchors", () => {
    const html = `<a href="/x?a=1&amp;b=2">R&amp;D</a><a href="/y"> </a>`;

    expect(extractAnchors(html)).toEqual([{ href: "/x?a=1&b=2", text: "R&D" }]);
  });
});

describe("resolveHref", () => {
  it("resolves relative links and drops the fragment", () => {
    expect(resolveHref("/jobs/1#apply", PAGE_URL)).toBe(
      "https://careers.initech.example/jobs/1",
    );
  });

  it("rejects non-http targets", () => {
    expect(resolveHref("mailto:jobs@initech.example", PAGE_URL)).toBeNull();
    expect(resolveHref("javascript:void(0)", PAGE_URL)).toBeNull();
  });
});

describe("CareersPageProducer", () => {
  const mockHttp = createMockHttp();

  beforeEach(() => {
    mockHttp.reset();
  });

  function createProducer(linkPattern?: string): CareersPageProducer {
    return new CareersPageProducer(
      {
        type: "careers-page",
        name: "initech",
        company: "Initech",
        url: PAGE_URL,
        ...(linkPattern !== undefined ? { linkPattern } : {}),
      },
      { logger: createSilentLogger(), httpRequest: mockHttp.request },
    );
  }

  it("keeps listing links matching the configured pattern", async () => {
    mockHttp.on("GET", PAGE_URL, loadFixtureText("careersPage/listing.html"));

    const postings = await createProducer("/jobs/\\d+").fetchPostings();

    expect(postings).toEqual([
      {
        url: "https://careers.initech.example/jobs/101",
        company: "Initech",
        title: "Senior Software Engineer",
        location: "",
        employmentType: "",
        description: "",
      },
      {
        url: "https://careers.initech.example/jobs/102",
        company: "Initech",
        title: "Site Reliability Engineer",
        location: "",
        employmentType: "",
        description: "",
      },
      {
        url: "https://careers.initech.example/jobs/104",
        company: "Initech",
        title: "R&D Engineer",
        location: "",
        employmentType: "",
        description: "",
      },
    ]);
    expect(mockHttp.getRecordedRequests()[0].responseType).toBe("text");
  });

  it("uses the default pattern when none is configured", () => {
    const postings = createProducer().extractPostings(
      loadFixtureText("careersPage/listing.html"),
    );

    expect(postings.map((p) => p.url)).toEqual([
      "https://careers.initech.example/jobs",
      "https://careers.initech.example/jobs/101",
      "https://careers.initech.example/jobs/102",
      "https://careers.initech.example/jobs/104",
    ]);
  });

  it("rejects a non-text body", async () => {
    mockHttp.on("GET", PAGE_URL, { unexpected: "json" });

    await expect(createProducer().fetchPostings()).rejects.toThrow(
      `Careers page ${PAGE_URL} did not return HTML`,
    );
  });
});
