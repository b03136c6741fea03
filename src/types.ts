/**
 * Core type definitions for the SUMO knowledge-base MCP server
 */

/**
 * Where a passage sits inside its parent document
 */
export type PassagePosition = "beginning" | "middle" | "end";

/**
 * Article record as delivered by the knowledge-base API or a local export.
 * The markup lives under `html` (API responses) or `raw_markup` (exports).
 */
export interface ArticleRecord {
  slug: string;
  title: string;
  summary: string;
  url?: string;
  products: string[];
  topics: string[];
  html?: string;
  raw_markup?: string;
}

/**
 * Attribution copied onto every passage of a document
 */
export interface Citation {
  readonly title: string;
  readonly url: string;
  readonly source: string;
  readonly locale: string;
  readonly products: readonly string[];
  readonly topics: readonly string[];
}

/**
 * Facts about a document gathered while it was prepared
 */
export interface DocumentMetadata {
  readonly char_count: number;
  readonly word_count: number;
  readonly has_images: boolean;
  readonly has_videos: boolean;
  readonly heading_count: number;
  readonly extraction_method: string;
  /** Url the record carried, typically its API endpoint */
  readonly api_url?: string;
}

/**
 * One knowledge-base article with its extracted text
 */
export interface DocumentRecord {
  readonly doc_id: string;
  readonly slug: string;
  readonly title: string;
  readonly summary: string;
  /** Canonical citation link */
  readonly url: string;
  readonly locale: string;
  readonly products: readonly string[];
  readonly topics: readonly string[];
  readonly raw_markup: string;
  /** Pure function of raw_markup */
  readonly extracted_text: string;
  readonly citation: Citation;
  readonly metadata: DocumentMetadata;
}

/**
 * A bounded excerpt of a document, the unit handed to a retrieval index
 */
export interface Passage {
  readonly chunk_id: string;
  readonly doc_id: string;
  readonly chunk_index: number;
  /** Window text, prefixed with a continuation marker after the first passage */
  readonly text: string;
  readonly word_count: number;
  readonly total_chunks: number;
  readonly position: PassagePosition;
  readonly slug: string;
  readonly citation: Citation;
}

/**
 * Wire shape of a passage for the indexing sink
 */
export interface PassageRecord {
  chunk_id: string;
  doc_id: string;
  chunk_index: number;
  text: string;
  citation: {
    title: string;
    url: string;
    source: string;
    locale: string;
    products: string;
    topics: string;
  };
  metadata: {
    chunk_words: number;
    total_chunks: number;
    position: PassagePosition;
    slug: string;
    title: string;
  };
}

/**
 * Per-document entry of an ingest run (the "master index")
 */
export interface IndexEntry {
  slug: string;
  doc_id: string;
  title: string;
  url: string;
  products: string[];
  topics: string[];
  summary: string;
  chunk_count: number;
  word_count: number;
}

/**
 * Result of ingesting a batch of articles
 */
export interface IngestSummary {
  documents: number;
  passages: number;
  /** Documents whose extracted text was empty */
  skipped: number;
  /** Source entries rejected before they became documents */
  invalid: string[];
  index: IndexEntry[];
}

/**
 * Standardized error payload
 */
export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  retryable?: boolean;
}

/**
 * Supplies article records one at a time
 */
export interface ArticleSource {
  /**
   * Iterate over every article the source holds
   */
  articles(): AsyncIterable<ArticleRecord>;

  /**
   * Load a single article by slug
   */
  fetchArticle(slug: string): Promise<ArticleRecord>;

  /**
   * Entries the last pass of articles() could not read or validate
   */
  rejectedEntries?(): readonly string[];
}

/**
 * Accepts passages for indexing. The pipeline keeps no handle to what it hands over.
 */
export interface PassageSink {
  accept(records: PassageRecord[]): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Configuration object for the MCP server
 */
export interface ServerConfig {
  baseUrl: string;
  locale: string;
  chunkSize: number;
  chunkOverlap: number;
  articlesDir?: string;
  outputPath: string;
  logLevel: "debug" | "info" | "warn" | "error";
}
