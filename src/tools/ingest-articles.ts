/**
 * MCP Tool: ingest_articles
 * Prepare every stored article and write its passages to a JSONL file
 */

import { getConfig } from "../config.js";
import type { ArticleSource, ErrorPayload, IngestSummary, PassageSink } from "../types.js";
import { ingestArticles as runIngest } from "../lib/pipeline/index.js";
import { JsonlPassageSink } from "../lib/sinks/index.js";
import {
  PipelineError,
  describeError,
  errorToPayload,
  internalError,
  invalidInputError,
} from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";
import { getPipelineOptions, requireSource } from "./pipeline-options.js";
import type { ChunkingOverrides } from "./pipeline-options.js";

interface IngestArticlesInput extends ChunkingOverrides {
  output_path?: string;
}

export interface IngestArticlesResult extends IngestSummary {
  output_path: string;
}

export type SinkFactory = (outputPath: string) => PassageSink & { filePath?: string };

const defaultSinkFactory: SinkFactory = (outputPath) => new JsonlPassageSink(outputPath);

/**
 * Ingest all stored articles
 *
 * @param args - Output location and optional window settings
 * @param source - The configured article source, if any
 * @param createSink - Builds the sink for the output path
 * @returns Ingest summary or error payload
 */
export async function ingestArticles(
  args: IngestArticlesInput,
  source: ArticleSource | null,
  createSink: SinkFactory = defaultSinkFactory
): Promise<IngestArticlesResult | ErrorPayload> {
  try {
    if (args.output_path !== undefined && args.output_path.trim() === "") {
      return invalidInputError("output_path", args.output_path, "must not be empty");
    }

    logger.logToolInvocation("ingest_articles", args);

    const articleSource = requireSource(source, "ingest_articles");
    const options = getPipelineOptions(args);
    const outputPath = args.output_path ?? getConfig().outputPath;
    const sink = createSink(outputPath);

    const summary = await runIngest(articleSource, sink, options);

    return {
      ...summary,
      output_path: sink.filePath ?? outputPath,
    };
  } catch (error) {
    if (error instanceof PipelineError) {
      return errorToPayload(error);
    }
    logger.error("Error in ingest_articles", { error: describeError(error), args });
    return internalError("Failed to ingest articles", {
      output_path: args.output_path,
      error: describeError(error),
    });
  }
}
