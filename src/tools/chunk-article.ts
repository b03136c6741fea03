/**
 * MCP Tool: chunk_article
 * Prepare one article supplied inline and return its passage records
 */

import { ZodError } from "zod";

import type { ArticleRecord, ErrorPayload, PassageRecord } from "../types.js";
import { parseArticleRecord, prepareArticle, toPassageRecord } from "../lib/pipeline/index.js";
import {
  PipelineError,
  describeError,
  errorToPayload,
  internalError,
  invalidInputError,
} from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";
import { getPipelineOptions } from "./pipeline-options.js";
import type { ChunkingOverrides } from "./pipeline-options.js";

interface ChunkArticleInput extends ChunkingOverrides {
  slug: string;
  title: string;
  html: string;
  summary?: string;
  url?: string;
  products?: string[];
  topics?: string[];
}

/**
 * Chunk an article into passages
 *
 * @param args - The article and optional window settings
 * @returns Passage records or error payload
 */
export async function chunkArticle(
  args: ChunkArticleInput
): Promise<PassageRecord[] | ErrorPayload> {
  try {
    const { chunk_size, chunk_overlap, ...article } = args;
    logger.logToolInvocation("chunk_article", {
      slug: article.slug,
      chunk_size,
      chunk_overlap,
    });

    let record: ArticleRecord;
    try {
      record = parseArticleRecord(article);
    } catch (error) {
      if (error instanceof ZodError) {
        const issue = error.issues[0];
        return invalidInputError(
          issue ? issue.path.join(".") : "article",
          undefined,
          issue?.message
        );
      }
      throw error;
    }

    const { passages } = prepareArticle(record, getPipelineOptions({ chunk_size, chunk_overlap }));
    return passages.map(toPassageRecord);
  } catch (error) {
    if (error instanceof PipelineError) {
      return errorToPayload(error);
    }
    logger.error("Error in chunk_article", { error: describeError(error), slug: args.slug });
    return internalError("Failed to chunk article", {
      slug: args.slug,
      error: describeError(error),
    });
  }
}
