/**
 * Pipeline options derived from the server configuration
 */

import { getConfig } from "../config.js";
import type { PipelineOptions } from "../lib/pipeline/index.js";
import type { ArticleSource } from "../types.js";
import { ConfigurationError } from "../lib/utils/errors.js";

export interface ChunkingOverrides {
  chunk_size?: number;
  chunk_overlap?: number;
}

export function getPipelineOptions(overrides: ChunkingOverrides = {}): PipelineOptions {
  const config = getConfig();
  return {
    baseUrl: config.baseUrl,
    locale: config.locale,
    chunkSize: overrides.chunk_size ?? config.chunkSize,
    chunkOverlap: overrides.chunk_overlap ?? config.chunkOverlap,
  };
}

/**
 * Tools that read stored articles need a configured source
 */
export function requireSource(source: ArticleSource | null, tool: string): ArticleSource {
  if (!source) {
    throw new ConfigurationError("SUMO_ARTICLES_DIR", undefined, `must be set to use ${tool}`);
  }
  return source;
}
