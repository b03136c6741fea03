/**
 * Whitespace normalization for extracted text
 */

import { decodeHTML } from "entities";

/**
 * Canonicalize extractor output.
 *
 * Order matters: whitespace rules only see markup-origin whitespace, so
 * entity decoding runs after them and may leave e.g. a decoded `&nbsp;` in place.
 */
export function normalizeWhitespace(text: string): string {
  const collapsed = text
    .replace(/\n{4,}/g, "\n\n\n")
    .replace(/ {2,}/g, " ")
    .replace(/^ +/gm, "");

  return decodeHTML(collapsed).trim();
}
