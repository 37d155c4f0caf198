/**
 * Notification message formatting
 *
 * Pure functions shared by the channels. Every posting field is escaped
 * before it lands in HTML.
 */

import type { Posting } from "@/types";
import { MESSAGE_SIGNATURE } from "@/constants";

const RULE = "=".repeat(40);
const THIN_RULE = "-".repeat(40);

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/**
 * Telegram message (HTML parse mode)
 *
 * @example
 * // 🚀 <b>New job alert</b>
 * //
 * // <b>Backend Engineer</b>
 * // 🏢 Acme
 * // 📍 Berlin
 * //
 * // 🔗 <a href="https://jobs.example.com/1">Apply here</a>
 */
export function formatPostingHtml(posting: Posting): string {
  const lines = [
    "🚀 <b>New job alert</b>",
    "",
    `<b>${escapeHtml(posting.title)}</b>`,
    `🏢 ${escapeHtml(posting.company)}`,
  ];

  if (posting.location) {
    lines.push(`📍 ${escapeHtml(posting.location)}`);
  }
  if (posting.employmentType) {
    lines.push(`💼 ${escapeHtml(posting.employmentType)}`);
  }

  lines.push("", `🔗 <a href="${escapeHtml(posting.url)}">Apply here</a>`);

  return lines.join("\n");
}

/**
 * Plain-text single-posting email body
 */
export function formatPostingText(posting: Posting): string {
  const lines = [
    "NEW JOB ALERT",
    RULE,
    "",
    `Title: ${posting.title}`,
    `Company: ${posting.company}`,
  ];

  if (posting.location) {
    lines.push(`Location: ${posting.location}`);
  }
  if (posting.employmentType) {
    lines.push(`Type: ${posting.employmentType}`);
  }

  lines.push("", `Apply: ${posting.url}`, "", THIN_RULE, MESSAGE_SIGNATURE);

  return lines.join("\n");
}

/**
 * HTML single-posting email body
 */
export function formatPostingEmailHtml(posting: Posting): string {
  const details = [
    `<p>🏢 <strong>${escapeHtml(posting.company)}</strong></p>`,
    posting.location ? `<p>📍 ${escapeHtml(posting.location)}</p>` : "",
    posting.employmentType
      ? `<p>💼 ${escapeHtml(posting.employmentType)}</p>`
      : "",
  ].filter((line) => line.length > 0);

  return [
    "<html><body>",
    "<h1>New job alert</h1>",
    `<h2>${escapeHtml(posting.title)}</h2>`,
    ...details,
    `<p><a href="${escapeHtml(posting.url)}">Apply now</a></p>`,
    "<hr>",
    `<p><small>${escapeHtml(MESSAGE_SIGNATURE)}</small></p>`,
    "</body></html>",
  ].join("\n");
}

/**
 * Plain-text digest, one numbered block per posting
 */
export function formatDigestText(postings: readonly Posting[]): string {
  const blocks = postings.map((posting, index) => {
    const lines = [`${index + 1}. ${posting.title}`, `   ${posting.company}`];
    if (posting.location) {
      lines.push(`   ${posting.location}`);
    }
    lines.push(`   ${posting.url}`);
    return lines.join("\n");
  });

  return [
    `${postings.length} NEW JOB ALERTS`,
    RULE,
    "",
    blocks.join("\n\n"),
    "",
    THIN_RULE,
    MESSAGE_SIGNATURE,
  ].join("\n");
}

/**
 * HTML digest, one list item per posting
 */
export function formatDigestHtml(postings: readonly Posting[]): string {
  const items = postings.map((posting) => {
    const location = posting.location
      ? ` · ${escapeHtml(posting.location)}`
      : "";
    return (
      `<li><a href="${escapeHtml(posting.url)}">${escapeHtml(posting.title)}</a>` +
      `<br>${escapeHtml(posting.company)}${location}</li>`
    );
  });

  return [
    "<html><body>",
    `<h1>${postings.length} new job alerts</h1>`,
    "<ul>",
    ...items,
    "</ul>",
    "<hr>",
    `<p><small>${escapeHtml(MESSAGE_SIGNATURE)}</small></p>`,
    "</body></html>",
  ].join("\n");
}

export function formatPostingSubject(posting: Posting): string {
  return `New job: ${posting.title} at ${posting.company}`;
}

export function formatDigestSubject(count: number): string {
  return count === 1 ? "1 new job alert" : `${count} new job alerts`;
}
