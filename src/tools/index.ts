/**
 * MCP Tools module exports
 */

export { extractArticleText } from "./extract-article-text.js";
export { chunkArticle } from "./chunk-article.js";
export { getArticle } from "./get-article.js";
export { ingestArticles } from "./ingest-articles.js";
export { formatCitation } from "./format-citation.js";
