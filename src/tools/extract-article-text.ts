/**
 * MCP Tool: extract_article_text
 * Convert article markup into normalized, structure-preserving text
 */

import type { ErrorPayload } from "../types.js";
import { extractText, inspectMarkup, splitWords } from "../lib/parser/index.js";
import { describeError, internalError, invalidInputError } from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";

interface ExtractArticleTextInput {
  html: string;
}

export interface ExtractArticleTextResult {
  text: string;
  word_count: number;
  has_images: boolean;
  has_videos: boolean;
}

/**
 * Extract text from a piece of article markup
 *
 * @param args - The markup to convert
 * @returns Extracted text with basic facts, or error payload
 */
export async function extractArticleText(
  args: ExtractArticleTextInput
): Promise<ExtractArticleTextResult | ErrorPayload> {
  try {
    if (typeof args.html !== "string") {
      return invalidInputError("html", args.html, "must be a string");
    }

    logger.logToolInvocation("extract_article_text", { chars: args.html.length });

    const text = extractText(args.html);
    const profile = inspectMarkup(args.html);

    return {
      text,
      word_count: splitWords(text).length,
      has_images: profile.hasImages,
      has_videos: profile.hasVideos,
    };
  } catch (error) {
    logger.error("Error in extract_article_text", { error: describeError(error) });
    return internalError("Failed to extract article text", {
      error: describeError(error),
    });
  }
}
