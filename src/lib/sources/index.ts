/**
 * Article source exports
 */

export { LocalArticleSource } from "./local-source.js";
