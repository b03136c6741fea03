/**
 * Parser module exports
 */

export { scanMarkup, collectMarkupEvents, getAttribute } from "./markup-scanner.js";
export type { MarkupAttribute, MarkupEvent, MarkupEventHandler } from "./markup-scanner.js";
export {
  StructuralTextExtractor,
  DEFAULT_EXTRACTOR_OPTIONS,
  extractRawText,
  extractText,
} from "./text-extractor.js";
export type { ExtractorOptions } from "./text-extractor.js";
export { normalizeWhitespace } from "./normalizer.js";
export { inspectMarkup } from "./markup-inspector.js";
export type { MarkupProfile } from "./markup-inspector.js";
export {
  chunkDocument,
  chunkId,
  continuationPrefix,
  expectedChunkCount,
  splitWords,
  validateChunkingOptions,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
} from "./chunker.js";
export type { ChunkableDocument, ChunkingOptions } from "./chunker.js";
