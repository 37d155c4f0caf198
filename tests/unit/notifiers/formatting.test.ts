/**
 * Unit tests for notification message formatting
 */

import { describe, it, expect } from "vitest";
import {
  escapeHtml,
  formatDigestHtml,
  formatDigestSubject,
  formatDigestText,
  formatPostingEmailHtml,
  formatPostingHtml,
  formatPostingSubject,
  formatPostingText,
} from "@/notifiers/formatting";
import { makePosting } from "../../helpers/fakes";

const RULE = "=".repeat(40);
const THIN_RULE = "-".repeat(40);

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`C++ <Dev> & "Ops"`)).toBe(
      "C++ &lt;Dev&gt; &amp; &quot;Ops&quot;",
    );
    expect(escapeHtml("O'Reilly")).toBe("O&#039;Reilly");
  });
});

describe("formatPostingHtml", () => {
  it("renders every present field", () => {
    expect(formatPostingHtml(makePosting())).toBe(
      [
        "🚀 <b>New job alert</b>",
        "",
        "<b>Software Engineer</b>",
        "🏢 Acme",
        "📍 Remote",
        "💼 Full-time",
        "",
        '🔗 <a href="https://jobs.example.com/1">Apply here</a>',
      ].join("\n"),
    );
  });

  it("omits empty optional fields and escapes values", () => {
    const posting = makePosting({
      title: "R&D <Lead>",
      location: "",
      employmentType: "",
    });

    expect(formatPostingHtml(posting)).toBe(
      [
        "🚀 <b>New job alert</b>",
        "",
        "<b>R&amp;D &lt;Lead&gt;</b>",
        "🏢 Acme",
        "",
        '🔗 <a href="https://jobs.example.com/1">Apply here</a>',
      ].join("\n"),
    );
  });
});

describe("formatPostingText", () => {
  it("renders a plain-text body", () => {
    const posting = makePosting({ location: "", employmentType: "" });

    expect(formatPostingText(posting)).toBe(
      [
        "NEW JOB ALERT",
        RULE,
        "",
        "Title: Software Engineer",
        "Company: Acme",
        "",
        "Apply: https://jobs.example.com/1",
        "",
        THIN_RULE,
        "Sent by job-alerts",
      ].join("\n"),
    );
  });
});

describe("formatPostingEmailHtml", () => {
  it("escapes the link target", () => {
    const html = formatPostingEmailHtml(
      makePosting({ url: "https://jobs.example.com/1?a=1&b=2" }),
    );

    expect(html).toContain(
      '<p><a href="https://jobs.example.com/1?a=1&amp;b=2">Apply now</a></p>',
    );
  });
});

describe("digests", () => {
  const postings = [
    makePosting(),
    makePosting({
      url: "https://jobs.example.com/2",
      title: "Data Engineer",
      company: "Globex",
      location: "",
    }),
  ];

  it("numbers each posting in the text digest", () => {
    expect(formatDigestText(postings)).toBe(
      [
        "2 NEW JOB ALERTS",
        RULE,
        "",
        "1. Software Engineer\n   Acme\n   Remote\n   https://jobs.example.com/1",
        "",
        "2. Data Engineer\n   Globex\n   https://jobs.example.com/2",
        "",
        THIN_RULE,
        "Sent by job-alerts",
      ].join("\n"),
    );
  });

  it("lists each posting in the HTML digest", () => {
    const html = formatDigestHtml(postings);

    expect(html).toContain("<h1>2 new job alerts</h1>");
    expect(html).toContain(
      '<li><a href="https://jobs.example.com/2">Data Engineer</a><br>Globex</li>',
    );
    expect(html).toContain(
      '<li><a href="https://jobs.example.com/1">Software Engineer</a><br>Acme · Remote</li>',
    );
  });
});

describe("subjects", () => {
  it("names the posting", () => {
    expect(formatPostingSubject(makePosting())).toBe(
      "New job: Software Engineer at Acme",
    );
  });

  it("pluralizes the digest subject", () => {
    expect(formatDigestSubject(1)).toBe("1 new job alert");
    expect(formatDigestSubject(3)).toBe("3 new job alerts");
  });
});
