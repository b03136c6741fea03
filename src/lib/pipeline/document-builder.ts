/**
 * Builds immutable document records from raw article records
 */

import { createHash } from "node:crypto";
import * as z from "zod";

import type { ArticleRecord, Citation, DocumentRecord } from "../../types.js";
import { inspectMarkup } from "../parser/markup-inspector.js";
import { splitWords } from "../parser/chunker.js";
import { extractText } from "../parser/text-extractor.js";
import type { ExtractorOptions } from "../parser/text-extractor.js";
import { logger } from "../utils/logger.js";

export const CITATION_SOURCE = "Mozilla Support (SUMO)";
export const EXTRACTION_METHOD = "StructuralTextExtractor";

/**
 * Schema for an article record; either `html` or `raw_markup` carries the markup
 */
export const articleRecordSchema = z.object({
  slug: z.string().trim().min(1),
  title: z.string().default(""),
  summary: z.string().default(""),
  url: z.string().optional(),
  products: z.array(z.string()).default([]),
  topics: z.array(z.string()).default([]),
  html: z.string().optional(),
  raw_markup: z.string().optional(),
});

/**
 * Validate an untrusted value as an article record
 */
export function parseArticleRecord(value: unknown): ArticleRecord {
  return articleRecordSchema.parse(value);
}

export interface DocumentBuildOptions {
  baseUrl: string;
  locale: string;
  extractor?: Partial<ExtractorOptions>;
}

/**
 * Stable document ID: first 12 hex digits of md5("{slug}_{locale}")
 */
export function documentId(slug: string, locale: string): string {
  return createHash("md5").update(`${slug}_${locale}`).digest("hex").slice(0, 12);
}

/**
 * Canonical knowledge-base link for an article
 */
export function articleUrl(baseUrl: string, locale: string, slug: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${locale}/kb/${slug}`;
}

function markupOf(record: ArticleRecord): string {
  return record.html ?? record.raw_markup ?? "";
}

/**
 * Extract text from an article and assemble its document record.
 *
 * Citations always link the canonical article page; a url carried by the
 * record (usually the API endpoint it came from) is kept as `metadata.api_url`.
 */
export function buildDocument(record: ArticleRecord, options: DocumentBuildOptions): DocumentRecord {
  const rawMarkup = markupOf(record);
  logger.logParsing("Extracting article text", { slug: record.slug, chars: rawMarkup.length });

  const extractedText = extractText(rawMarkup, options.extractor);
  const profile = inspectMarkup(rawMarkup);

  const title = record.title.trim() || profile.fallbackTitle;
  const url = articleUrl(options.baseUrl, options.locale, record.slug);
  const products = Object.freeze([...record.products]);
  const topics = Object.freeze([...record.topics]);

  const citation: Citation = Object.freeze({
    title,
    url,
    source: CITATION_SOURCE,
    locale: options.locale,
    products,
    topics,
  });

  const document: DocumentRecord = Object.freeze({
    doc_id: documentId(record.slug, options.locale),
    slug: record.slug,
    title,
    summary: record.summary,
    url,
    locale: options.locale,
    products,
    topics,
    raw_markup: rawMarkup,
    extracted_text: extractedText,
    citation,
    metadata: Object.freeze({
      char_count: extractedText.length,
      word_count: splitWords(extractedText).length,
      has_images: profile.hasImages,
      has_videos: profile.hasVideos,
      heading_count: profile.headingCount,
      extraction_method: EXTRACTION_METHOD,
      ...(record.url ? { api_url: record.url } : {}),
    }),
  });

  logger.debug("Built document record", {
    doc_id: document.doc_id,
    slug: document.slug,
    word_count: document.metadata.word_count,
  });

  return document;
}
