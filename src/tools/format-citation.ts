/**
 * MCP Tool: format_citation
 * Render a cited answer snippet for one passage of a stored article
 */

import type { ArticleSource, ErrorPayload } from "../types.js";
import { formatCitation as renderCitation, prepareArticle, toPassageRecord } from "../lib/pipeline/index.js";
import {
  PipelineError,
  describeError,
  errorToPayload,
  internalError,
  invalidInputError,
} from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";
import { getPipelineOptions, requireSource } from "./pipeline-options.js";

interface FormatCitationInput {
  slug: string;
  chunk_index?: number;
}

export interface FormatCitationResult {
  chunk_id: string;
  total_chunks: number;
  text: string;
}

/**
 * Format the citation block for a passage
 *
 * @param args - Article slug and passage index (default 0)
 * @param source - The configured article source, if any
 * @returns Rendered citation or error payload
 */
export async function formatCitation(
  args: FormatCitationInput,
  source: ArticleSource | null
): Promise<FormatCitationResult | ErrorPayload> {
  try {
    if (!args.slug || typeof args.slug !== "string") {
      return invalidInputError("slug", args.slug, "must be a non-empty string");
    }
    const chunkIndex = args.chunk_index ?? 0;
    if (!Number.isInteger(chunkIndex) || chunkIndex < 0) {
      return invalidInputError("chunk_index", chunkIndex, "must be a non-negative integer");
    }

    logger.logToolInvocation("format_citation", args);

    const record = await requireSource(source, "format_citation").fetchArticle(args.slug);
    const { passages } = prepareArticle(record, getPipelineOptions());

    const passage = passages[chunkIndex];
    if (!passage) {
      return invalidInputError(
        "chunk_index",
        chunkIndex,
        `article has ${passages.length} passages`
      );
    }

    return {
      chunk_id: passage.chunk_id,
      total_chunks: passage.total_chunks,
      text: renderCitation(toPassageRecord(passage)),
    };
  } catch (error) {
    if (error instanceof PipelineError) {
      return errorToPayload(error);
    }
    logger.error("Error in format_citation", { error: describeError(error), args });
    return internalError("Failed to format citation", {
      slug: args.slug,
      error: describeError(error),
    });
  }
}
