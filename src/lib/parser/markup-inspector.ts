/**
 * Document-level facts read from raw article markup
 */

import * as cheerio from "cheerio";

const VIDEO_HOSTS = ["youtube.com", "vimeo.com"];

export interface MarkupProfile {
  hasImages: boolean;
  hasVideos: boolean;
  headingCount: number;
  /** Title to fall back on when the article record carries none */
  fallbackTitle: string;
}

/**
 * Extract title from markup: first h1, then the title element
 */
function extractTitle($: cheerio.CheerioAPI): string {
  const h1 = $("h1").first().text().trim();
  if (h1) {
    return h1;
  }

  const titleTag = $("title").first().text().trim();
  if (titleTag) {
    return titleTag;
  }

  return "Untitled";
}

function hasEmbeddedVideo($: cheerio.CheerioAPI, markup: string): boolean {
  if ($("video").length > 0) {
    return true;
  }
  return VIDEO_HOSTS.some((host) => markup.includes(host));
}

/**
 * Inspect raw markup for metadata that the text extraction drops
 */
export function inspectMarkup(markup: string): MarkupProfile {
  const $ = cheerio.load(markup);

  return {
    hasImages: $("img").length > 0,
    hasVideos: hasEmbeddedVideo($, markup),
    headingCount: $("h1, h2, h3, h4, h5, h6").length,
    fallbackTitle: extractTitle($),
  };
}
