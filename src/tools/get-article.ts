/**
 * MCP Tool: get_article
 * Load a stored article and describe its prepared document
 */

import type { ArticleSource, DocumentMetadata, ErrorPayload } from "../types.js";
import { prepareArticle } from "../lib/pipeline/index.js";
import {
  PipelineError,
  describeError,
  errorToPayload,
  internalError,
  invalidInputError,
} from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";
import { getPipelineOptions, requireSource } from "./pipeline-options.js";

interface GetArticleInput {
  slug: string;
}

export interface ArticleDetails {
  doc_id: string;
  slug: string;
  title: string;
  summary: string;
  url: string;
  locale: string;
  products: string[];
  topics: string[];
  text: string;
  chunk_count: number;
  metadata: DocumentMetadata;
}

/**
 * Get a stored article with its extracted text
 *
 * @param args - Article lookup parameters
 * @param source - The configured article source, if any
 * @returns Article details or error payload
 */
export async function getArticle(
  args: GetArticleInput,
  source: ArticleSource | null
): Promise<ArticleDetails | ErrorPayload> {
  try {
    if (!args.slug || typeof args.slug !== "string") {
      return invalidInputError("slug", args.slug, "must be a non-empty string");
    }

    logger.logToolInvocation("get_article", args);

    const record = await requireSource(source, "get_article").fetchArticle(args.slug);
    const { document, passages } = prepareArticle(record, getPipelineOptions());

    return {
      doc_id: document.doc_id,
      slug: document.slug,
      title: document.title,
      summary: document.summary,
      url: document.url,
      locale: document.locale,
      products: [...document.products],
      topics: [...document.topics],
      text: document.extracted_text,
      chunk_count: passages.length,
      metadata: document.metadata,
    };
  } catch (error) {
    if (error instanceof PipelineError) {
      return errorToPayload(error);
    }
    logger.error("Error in get_article", { error: describeError(error), args });
    return internalError("Failed to get article", {
      slug: args.slug,
      error: describeError(error),
    });
  }
}
