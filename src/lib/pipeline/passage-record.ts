/**
 * Wire format of passages and chatbot-style citation rendering
 */

import type { Passage, PassageRecord } from "../../types.js";

const EXCERPT_LENGTH = 200;

/**
 * Convert a passage to the record handed to the indexing sink
 */
export function toPassageRecord(passage: Passage): PassageRecord {
  return {
    chunk_id: passage.chunk_id,
    doc_id: passage.doc_id,
    chunk_index: passage.chunk_index,
    text: passage.text,
    citation: {
      title: passage.citation.title,
      url: passage.citation.url,
      source: passage.citation.source,
      locale: passage.citation.locale,
      products: passage.citation.products.join(", "),
      topics: passage.citation.topics.join(", "),
    },
    metadata: {
      chunk_words: passage.word_count,
      total_chunks: passage.total_chunks,
      position: passage.position,
      slug: passage.slug,
      title: passage.citation.title,
    },
  };
}

/**
 * Render an answer snippet that cites the passage's source article.
 * The excerpt is the first 200 characters of the passage, always followed by `...`.
 */
export function formatCitation(record: PassageRecord): string {
  const excerpt = `${record.text.slice(0, EXCERPT_LENGTH)}...`;
  const { title, url, products, topics } = record.citation;

  return [
    "Based on Mozilla Support documentation:",
    "",
    excerpt,
    "",
    `**Source:** [${title}](${url})`,
    `**Products:** ${products}`,
    `**Topics:** ${topics}`,
    "",
    "For more details, please visit the full article at:",
    url,
  ].join("\n");
}
