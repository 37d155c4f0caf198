/**
 * HTML to plain text (regex based, no DOM)
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

/**
 * Decode the handful of entities job boards actually emit.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(
    /&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi,
    (entity: string, body: string) => {
      if (body[0] === "#") {
        const codePoint =
          body[1] === "x" || body[1] === "X"
            ? parseInt(body.slice(2), 16)
            : parseInt(body.slice(1), 10);
        return Number.isFinite(codePoint) && codePoint > 0
          ? String.fromCodePoint(codePoint)
          : entity;
      }
      return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
    },
  );
}

/**
 * Strip tags and collapse whitespace.
 *
 * Entity-escaped markup (Greenhouse sends `&lt;p&gt;`) is decoded first so
 * the tags it hides are stripped too.
 */
export function htmlToText(html: string): string {
  const decoded = decodeHtmlEntities(html);
  const withoutTags = decoded
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<[^>]+>/g, " ");
  return decodeHtmlEntities(withoutTags).replace(/\s+/g, " ").trim();
}

/**
 * Cut text to `maxChars`, on a character boundary.
 */
export function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}
