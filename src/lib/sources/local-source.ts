/**
 * Article source that reads exported article JSON files from the file system
 */

import { readFile, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { ZodError } from "zod";

import type { ArticleRecord, ArticleSource } from "../../types.js";
import { parseArticleRecord } from "../pipeline/document-builder.js";
import { PipelineError, articleNotFoundError, describeError, sourceError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

/**
 * Aggregate files written next to the per-article exports
 */
const AGGREGATE_FILES = new Set(["all_documents.json", "index.json", "master_index.json"]);

const SLUG_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Local article source
 *
 * Expects one `{slug}.json` file per article in a flat directory.
 */
export class LocalArticleSource implements ArticleSource {
  readonly directory: string;
  private rejected: string[] = [];

  constructor(directory: string) {
    if (!directory) {
      throw new Error("LocalArticleSource requires SUMO_ARTICLES_DIR to be set");
    }
    this.directory = resolve(directory);
  }

  /**
   * Article files in name order, so every run sees the same sequence
   */
  async listArticleFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      return entries
        .filter(
          (entry) =>
            entry.isFile() && entry.name.endsWith(".json") && !AGGREGATE_FILES.has(entry.name)
        )
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      throw new PipelineError(
        sourceError("local", `Failed to list articles in ${this.directory}`, {
          directory: this.directory,
          error: describeError(error),
        })
      );
    }
  }

  /**
   * Read and validate one article file
   */
  private async readArticleFile(fileName: string): Promise<ArticleRecord> {
    const filePath = join(this.directory, fileName);
    const content = await readFile(filePath, "utf-8");
    const record = parseArticleRecord(JSON.parse(content));
    logger.debug("Read article from local source", { filePath, slug: record.slug });
    return record;
  }

  /**
   * Yield articles one at a time; unreadable or invalid files are logged and skipped
   */
  async *articles(): AsyncGenerator<ArticleRecord> {
    this.rejected = [];
    for (const fileName of await this.listArticleFiles()) {
      let record: ArticleRecord;
      try {
        record = await this.readArticleFile(fileName);
      } catch (error) {
        this.rejected.push(fileName);
        logger.warn("Skipping unreadable article file", {
          fileName,
          error: error instanceof ZodError ? error.issues : describeError(error),
        });
        continue;
      }
      yield record;
    }
  }

  /**
   * Load a single article by slug
   */
  async fetchArticle(slug: string): Promise<ArticleRecord> {
    if (!SLUG_PATTERN.test(slug)) {
      throw new PipelineError(articleNotFoundError(slug, { reason: "invalid slug" }));
    }

    const fileName = `${slug}.json`;
    let content: string;
    try {
      content = await readFile(join(this.directory, fileName), "utf-8");
    } catch (error) {
      throw new PipelineError(
        articleNotFoundError(slug, {
          directory: this.directory,
          error: describeError(error),
        })
      );
    }

    try {
      return parseArticleRecord(JSON.parse(content));
    } catch (error) {
      throw new PipelineError(
        sourceError("local", `Invalid article file: ${fileName}`, {
          slug,
          error: error instanceof ZodError ? error.issues : describeError(error),
        })
      );
    }
  }

  /**
   * File names skipped by the last pass of articles()
   */
  rejectedEntries(): readonly string[] {
    return [...this.rejected];
  }
}
