/**
 * Pipeline module exports
 */

export {
  articleRecordSchema,
  articleUrl,
  buildDocument,
  documentId,
  parseArticleRecord,
  CITATION_SOURCE,
  EXTRACTION_METHOD,
} from "./document-builder.js";
export type { DocumentBuildOptions } from "./document-builder.js";
export { toPassageRecord, formatCitation } from "./passage-record.js";
export { prepareArticle, ingestArticles } from "./pipeline.js";
export type { PipelineOptions, PreparedArticle } from "./pipeline.js";
