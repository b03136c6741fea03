/**
 * Passage chunker: splits a document's text into overlapping word windows
 */

import type { Citation, Passage, PassagePosition } from "../../types.js";
import { ConfigurationError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 100;

export interface ChunkingOptions {
  /** Window size in words */
  chunkSize: number;
  /** Words shared by consecutive windows */
  chunkOverlap: number;
}

/**
 * The slice of a document the chunker needs
 */
export interface ChunkableDocument {
  doc_id: string;
  slug: string;
  title: string;
  extracted_text: string;
  citation: Citation;
}

/**
 * Reject window settings that would stall or reverse the sliding window
 */
export function validateChunkingOptions(options: ChunkingOptions): void {
  const { chunkSize, chunkOverlap } = options;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError("chunk_size", chunkSize, "must be a positive integer");
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError("chunk_overlap", chunkOverlap, "must be a non-negative integer");
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      "chunk_overlap",
      chunkOverlap,
      `must be smaller than chunk_size (${chunkSize})`
    );
  }
}

/**
 * Split text into whitespace-delimited words
 */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function chunkId(docId: string, index: number): string {
  return `${docId}_chunk_${index}`;
}

export function continuationPrefix(title: string): string {
  return `[Continued from ${title}] `;
}

function copyCitation(citation: Citation): Citation {
  return Object.freeze({
    ...citation,
    products: Object.freeze([...citation.products]),
    topics: Object.freeze([...citation.topics]),
  });
}

function positionOf(index: number, total: number): PassagePosition {
  if (index === total - 1) {
    return "end";
  }
  return index === 0 ? "beginning" : "middle";
}

interface WordWindow {
  text: string;
  wordCount: number;
}

/**
 * Chunk a document's extracted text into passages.
 *
 * A document that fits in one window becomes a single passage holding the
 * whole text. Longer documents are cut into windows of `chunkSize` words
 * that start `chunkSize - chunkOverlap` words apart; the last window is the
 * first one that reaches the final word.
 */
export function chunkDocument(document: ChunkableDocument, options: ChunkingOptions): Passage[] {
  validateChunkingOptions(options);
  const { chunkSize, chunkOverlap } = options;

  const words = splitWords(document.extracted_text);
  if (words.length === 0) {
    logger.logChunking(document.doc_id, { chunk_count: 0, reason: "empty text" });
    return [];
  }

  const windows: WordWindow[] = [];
  if (words.length <= chunkSize) {
    windows.push({ text: document.extracted_text, wordCount: words.length });
  } else {
    const step = chunkSize - chunkOverlap;
    for (let start = 0; ; start += step) {
      const end = Math.min(start + chunkSize, words.length);
      const body = words.slice(start, end).join(" ");
      windows.push({
        text: start === 0 ? body : `${continuationPrefix(document.title)}${body}`,
        wordCount: end - start,
      });
      if (end >= words.length) {
        break;
      }
    }
  }

  // Totals and positions are only known once every window exists
  const total = windows.length;
  const passages = windows.map((window, index): Passage =>
    Object.freeze({
      chunk_id: chunkId(document.doc_id, index),
      doc_id: document.doc_id,
      chunk_index: index,
      text: window.text,
      word_count: window.wordCount,
      total_chunks: total,
      position: positionOf(index, total),
      slug: document.slug,
      citation: copyCitation(document.citation),
    })
  );

  logger.logChunking(document.doc_id, {
    chunk_count: total,
    word_count: words.length,
    chunk_size: chunkSize,
    chunk_overlap: chunkOverlap,
  });

  return passages;
}

/**
 * Number of passages a document of `wordCount` words yields
 */
export function expectedChunkCount(wordCount: number, options: ChunkingOptions): number {
  validateChunkingOptions(options);
  if (wordCount === 0) {
    return 0;
  }
  if (wordCount <= options.chunkSize) {
    return 1;
  }
  return Math.ceil(
    (wordCount - options.chunkOverlap) / (options.chunkSize - options.chunkOverlap)
  );
}
