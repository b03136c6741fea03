/**
 * Configuration module for reading and validating environment variables
 */

import { stat } from "node:fs/promises";
import { resolve } from "node:path";

import type { ServerConfig } from "./types.js";
import { ConfigurationError, describeError } from "./lib/utils/errors.js";

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: ServerConfig = {
  baseUrl: "https://support.mozilla.org",
  locale: "en-US",
  chunkSize: 500,
  chunkOverlap: 100,
  outputPath: "./passages.jsonl",
  logLevel: "info",
};

/**
 * Valid log levels
 */
const VALID_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

function isLogLevel(value: string): value is ServerConfig["logLevel"] {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse an integer setting, rejecting anything that is not a plain base-10 integer
 */
function readInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigurationError(name, raw, "must be an integer");
  }
  return Number.parseInt(raw, 10);
}

/**
 * Read and validate configuration from environment variables
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<ServerConfig> {
  const baseUrl = env.SUMO_BASE_URL ?? DEFAULT_CONFIG.baseUrl;
  const locale = env.SUMO_LOCALE ?? DEFAULT_CONFIG.locale;
  const chunkSize = readInteger("SUMO_CHUNK_SIZE", env.SUMO_CHUNK_SIZE, DEFAULT_CONFIG.chunkSize);
  const chunkOverlap = readInteger(
    "SUMO_CHUNK_OVERLAP",
    env.SUMO_CHUNK_OVERLAP,
    DEFAULT_CONFIG.chunkOverlap
  );
  const articlesDir = env.SUMO_ARTICLES_DIR;
  const outputPath = env.SUMO_OUTPUT_PATH ?? DEFAULT_CONFIG.outputPath;
  const logLevel = env.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel;

  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      "LOG_LEVEL",
      logLevel,
      `must be one of: ${VALID_LOG_LEVELS.join(", ")}`
    );
  }

  if (!isValidUrl(baseUrl)) {
    throw new ConfigurationError("SUMO_BASE_URL", baseUrl, "must be an http(s) URL");
  }

  if (locale.trim() === "") {
    throw new ConfigurationError("SUMO_LOCALE", locale, "must not be empty");
  }

  if (chunkSize <= 0) {
    throw new ConfigurationError("SUMO_CHUNK_SIZE", chunkSize, "must be positive");
  }
  if (chunkOverlap < 0) {
    throw new ConfigurationError("SUMO_CHUNK_OVERLAP", chunkOverlap, "must not be negative");
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      "SUMO_CHUNK_OVERLAP",
      chunkOverlap,
      `must be smaller than SUMO_CHUNK_SIZE (${chunkSize})`
    );
  }

  // Validate articles directory if provided
  if (articlesDir) {
    const resolvedPath = resolve(articlesDir);
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(resolvedPath)).isDirectory();
    } catch (error) {
      throw new ConfigurationError(
        "SUMO_ARTICLES_DIR",
        resolvedPath,
        `not readable: ${describeError(error)}`
      );
    }
    if (!isDirectory) {
      throw new ConfigurationError("SUMO_ARTICLES_DIR", resolvedPath, "is not a directory");
    }
  }

  return {
    baseUrl: baseUrl.replace(/\/+$/, ""),
    locale: locale.trim(),
    chunkSize,
    chunkOverlap,
    articlesDir: articlesDir ? resolve(articlesDir) : undefined,
    outputPath,
    logLevel,
  };
}

/**
 * Validate that a string is a valid URL
 */
function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Get the current configuration
 * (Cached after first load)
 */
let cachedConfig: ServerConfig | null = null;

/**
 * Set cached config directly (for testing only)
 * @internal
 */
export function _setCachedConfigForTesting(config: ServerConfig | null): void {
  cachedConfig = config;
}

/**
 * Get the server configuration, which must already have been loaded
 */
export function getConfig(): ServerConfig {
  if (!cachedConfig) {
    throw new Error(
      "Configuration not loaded. Call initializeConfig() first (it's async for file system validation)."
    );
  }
  return cachedConfig;
}

/**
 * Load and cache configuration
 */
export async function initializeConfig(): Promise<ServerConfig> {
  if (!cachedConfig) {
    cachedConfig = await loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration. The logger re-reads its level lazily.
 */
export function resetConfig(): void {
  cachedConfig = null;
}
