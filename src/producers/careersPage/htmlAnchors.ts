/**
 * HTML anchor extraction utilities
 *
 * Deterministic, regex-based extraction of anchor links from HTML.
 * Does not execute JavaScript or build a DOM.
 */

import { decodeHtmlEntities } from "@/utils";

export type AnchorCandidate = {
  href: string;
  text: string;
};

/**
 * Extract all anchor links from HTML using regex
 *
 * Matches <a href="...">text</a> and <a href='...'>text</a>, across
 * line breaks. Inner tags are stripped and whitespace collapsed.
 * Anchors with an empty href or empty text are dropped.
 */
export function extractAnchors(html: string): AnchorCandidate[] {
  const anchors: AnchorCandidate[] = [];

  // Non-greedy so adjacent anchors stay separate
  const anchorPattern =
    /<a\s+[^>]*?href\s*=\s*["']([^"']+)["'][^>]*>([\s\S]*?)<\/a>/gi;

  let match: RegExpExecArray | null;
  while ((match = anchorPattern.exec(html)) !== null) {
    const href = decodeHtmlEntities(match[1].trim());
    const text = decodeHtmlEntities(match[2].replace(/<[^>]+>/g, " "))
      .replace(/\s+/g, " ")
      .trim();

    if (href && text) {
      anchors.push({ href, text });
    }
  }

  return anchors;
}

/**
 * Resolve an href against the page URL, keeping http(s) targets only
 *
 * @returns Absolute URL without fragment, or null
 */
export function resolveHref(href: string, pageUrl: string): string | null {
  let resolved: URL;
  try {
    resolved = new URL(href, pageUrl);
  } catch {
    return null;
  }

  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return null;
  }

  resolved.hash = "";
  return resolved.toString();
}
