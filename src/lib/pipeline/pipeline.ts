/**
 * Article preparation pipeline: markup -> text -> passages -> sink
 */

import type {
  ArticleRecord,
  ArticleSource,
  DocumentRecord,
  IndexEntry,
  IngestSummary,
  Passage,
  PassageSink,
} from "../../types.js";
import { chunkDocument, validateChunkingOptions } from "../parser/chunker.js";
import type { ChunkingOptions } from "../parser/chunker.js";
import { buildDocument } from "./document-builder.js";
import type { DocumentBuildOptions } from "./document-builder.js";
import { toPassageRecord } from "./passage-record.js";
import { PipelineError, describeError, sinkError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export type PipelineOptions = DocumentBuildOptions & ChunkingOptions;

export interface PreparedArticle {
  document: DocumentRecord;
  passages: Passage[];
}

/**
 * Prepare one article: extract, normalize, chunk
 */
export function prepareArticle(record: ArticleRecord, options: PipelineOptions): PreparedArticle {
  validateChunkingOptions(options);
  const document = buildDocument(record, options);
  const passages = chunkDocument(document, options);
  return { document, passages };
}

function indexEntryFor(document: DocumentRecord, chunkCount: number): IndexEntry {
  return {
    slug: document.slug,
    doc_id: document.doc_id,
    title: document.title,
    url: document.url,
    products: [...document.products],
    topics: [...document.topics],
    summary: document.summary,
    chunk_count: chunkCount,
    word_count: document.metadata.word_count,
  };
}

/**
 * Feed every article of a source through the pipeline into a sink.
 *
 * Articles are handled strictly one at a time; only the current document's
 * markup, text and passages are held in memory. Sink failures abort the run.
 * Entries the source rejected are listed under `invalid`.
 */
export async function ingestArticles(
  source: ArticleSource,
  sink: PassageSink,
  options: PipelineOptions
): Promise<IngestSummary> {
  validateChunkingOptions(options);

  const summary: IngestSummary = {
    documents: 0,
    passages: 0,
    skipped: 0,
    invalid: [],
    index: [],
  };

  try {
    for await (const record of source.articles()) {
      const { document, passages } = prepareArticle(record, options);
      summary.documents++;
      summary.index.push(indexEntryFor(document, passages.length));

      if (passages.length === 0) {
        summary.skipped++;
        logger.warn("Article produced no text", { slug: record.slug });
        continue;
      }

      try {
        await sink.accept(passages.map(toPassageRecord));
      } catch (error) {
        throw new PipelineError(
          sinkError("accept", describeError(error), {
            slug: record.slug,
            passages: passages.length,
          })
        );
      }
      summary.passages += passages.length;
    }
  } catch (error) {
    // The run's own failure is what gets reported
    try {
      await sink.close?.();
    } catch (closeError) {
      logger.error("Failed to close sink after an aborted ingest", {
        error: describeError(closeError),
      });
    }
    throw error;
  }

  try {
    await sink.close?.();
  } catch (error) {
    throw new PipelineError(sinkError("close", describeError(error)));
  }

  summary.invalid = [...(source.rejectedEntries?.() ?? [])];

  logger.info("Ingest complete", {
    documents: summary.documents,
    passages: summary.passages,
    skipped: summary.skipped,
    invalid: summary.invalid.length,
  });

  return summary;
}
