#!/usr/bin/env node
/**
 * Main MCP server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ErrorCode as McpErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod";
import { initializeConfig } from "./config.js";
import { LocalArticleSource } from "./lib/sources/index.js";
import { ErrorCode, isErrorPayload } from "./lib/utils/errors.js";
import { logger } from "./lib/utils/logger.js";
import type { ArticleSource, ErrorPayload } from "./types.js";

// Tool handlers
import {
  chunkArticle,
  extractArticleText,
  formatCitation,
  getArticle,
  ingestArticles,
} from "./tools/index.js";

const SERVER_VERSION = "0.1.0";

/**
 * Convert ErrorPayload to throwable error for MCP
 */
function throwMcpError(error: ErrorPayload): never {
  const codeMap: Record<string, number> = {
    [ErrorCode.INVALID_INPUT]: McpErrorCode.InvalidParams,
    [ErrorCode.ARTICLE_NOT_FOUND]: McpErrorCode.InvalidParams,
    [ErrorCode.CONFIGURATION_ERROR]: McpErrorCode.InvalidParams,
    [ErrorCode.SOURCE_ERROR]: -32000,
    [ErrorCode.SINK_ERROR]: -32000,
    [ErrorCode.INTERNAL_ERROR]: McpErrorCode.InternalError,
  };

  throw new McpError(codeMap[error.code] ?? McpErrorCode.InternalError, error.message, error.details);
}

/**
 * Wrap a tool result as MCP text content, or raise its error payload
 */
function toToolResult(result: unknown): CallToolResult {
  if (isErrorPayload(result)) {
    throwMcpError(result);
  }

  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

const chunkingShape = {
  chunk_size: z.number().int().positive().optional().describe("Window size in words (default: SUMO_CHUNK_SIZE)"),
  chunk_overlap: z.number().int().min(0).optional().describe("Words shared by consecutive windows (default: SUMO_CHUNK_OVERLAP)"),
};

/**
 * Initialize and start the MCP server
 */
async function main(): Promise<void> {
  let server: McpServer | null = null;

  try {
    const config = await initializeConfig();
    logger.info("SUMO knowledge-base MCP server starting...", {
      version: SERVER_VERSION,
      locale: config.locale,
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      articlesDir: config.articlesDir,
    });

    const source: ArticleSource | null = config.articlesDir
      ? new LocalArticleSource(config.articlesDir)
      : null;
    if (!source) {
      logger.warn("SUMO_ARTICLES_DIR not set; get_article, ingest_articles and format_citation are unavailable");
    }

    server = new McpServer({
      name: "sumo-kb",
      version: SERVER_VERSION,
    });

    server.registerTool(
      "extract_article_text",
      {
        title: "Extract Article Text",
        description: "Convert knowledge-base article markup into structure-preserving plain text (headings, lists, code, emphasis, notes).",
        inputSchema: {
          html: z.string().describe("Article markup"),
        },
      },
      async ({ html }) => toToolResult(await extractArticleText({ html }))
    );

    server.registerTool(
      "chunk_article",
      {
        title: "Chunk Article",
        description: "Extract an article's text and split it into overlapping word-window passages stamped with citation metadata.",
        inputSchema: {
          slug: z.string().describe("Article slug (stable identifier)"),
          title: z.string().describe("Article title"),
          html: z.string().describe("Article markup"),
          summary: z.string().optional().describe("Article summary"),
          url: z.string().optional().describe("URL the record came from; kept as metadata.api_url, citations link the canonical article page"),
          products: z.array(z.string()).optional().describe("Products the article applies to"),
          topics: z.array(z.string()).optional().describe("Topics the article belongs to"),
          ...chunkingShape,
        },
      },
      async (args) => toToolResult(await chunkArticle(args))
    );

    server.registerTool(
      "get_article",
      {
        title: "Get Article",
        description: "Load a stored article by slug and return its extracted text and metadata.",
        inputSchema: {
          slug: z.string().describe("Article slug"),
        },
      },
      async ({ slug }) => toToolResult(await getArticle({ slug }, source))
    );

    server.registerTool(
      "ingest_articles",
      {
        title: "Ingest Articles",
        description: "Prepare every stored article and write its passages as JSON lines for indexing. Returns per-article counts.",
        inputSchema: {
          output_path: z.string().optional().describe("Output JSONL file (default: SUMO_OUTPUT_PATH)"),
          ...chunkingShape,
        },
      },
      async (args) => toToolResult(await ingestArticles(args, source))
    );

    server.registerTool(
      "format_citation",
      {
        title: "Format Citation",
        description: "Render a cited answer snippet for one passage of a stored article.",
        inputSchema: {
          slug: z.string().describe("Article slug"),
          chunk_index: z.number().int().min(0).optional().describe("Passage index (default: 0)"),
        },
      },
      async ({ slug, chunk_index }) => toToolResult(await formatCitation({ slug, chunk_index }, source))
    );

    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down gracefully...`);

      if (server) {
        try {
          await server.close();
        } catch (error) {
          logger.error("Error closing server", { error });
        }
      }

      process.exit(0);
    };

    process.on("SIGINT", () => void shutdown("SIGINT"));
    process.on("SIGTERM", () => void shutdown("SIGTERM"));

    const transport = new StdioServerTransport();
    await server.connect(transport);

    logger.info("MCP server started and connected to stdio transport");
  } catch (error) {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

main().catch((error) => {
  logger.error("Unhandled error in main", { error });
  process.exit(1);
});
