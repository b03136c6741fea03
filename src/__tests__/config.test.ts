/**
 * Unit tests for configuration loading
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import {
  _setCachedConfigForTesting,
  getConfig,
  loadConfig,
  resetConfig,
} from "../config.js";
import { ConfigurationError } from "../lib/utils/errors.js";

vi.mock("node:fs/promises");

describe("loadConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should apply defaults", async () => {
    expect(await loadConfig({})).toEqual({
      baseUrl: "https://support.mozilla.org",
      locale: "en-US",
      chunkSize: 500,
      chunkOverlap: 100,
      articlesDir: undefined,
      outputPath: "./passages.jsonl",
      logLevel: "info",
    });
  });

  it("should read every variable", async () => {
    vi.mocked(stat).mockResolvedValueOnce({ isDirectory: () => true } as any);

    const config = await loadConfig({
      SUMO_BASE_URL: "https://support.example.org/",
      SUMO_LOCALE: "de",
      SUMO_CHUNK_SIZE: "300",
      SUMO_CHUNK_OVERLAP: "50",
      SUMO_ARTICLES_DIR: "articles",
      SUMO_OUTPUT_PATH: "out/passages.jsonl",
      LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      baseUrl: "https://support.example.org",
      locale: "de",
      chunkSize: 300,
      chunkOverlap: 50,
      articlesDir: resolve("articles"),
      outputPath: "out/passages.jsonl",
      logLevel: "debug",
    });
  });

  it("should treat blank numbers as unset", async () => {
    const config = await loadConfig({ SUMO_CHUNK_SIZE: " ", SUMO_CHUNK_OVERLAP: "" });

    expect(config.chunkSize).toBe(500);
    expect(config.chunkOverlap).toBe(100);
  });

  it("should reject overlap that is not smaller than the chunk size", async () => {
    await expect(
      loadConfig({ SUMO_CHUNK_SIZE: "200", SUMO_CHUNK_OVERLAP: "200" })
    ).rejects.toMatchObject({
      payload: {
        code: "CONFIGURATION_ERROR",
        details: { setting: "SUMO_CHUNK_OVERLAP", value: 200 },
      },
    });
  });

  it("should reject non-integer window settings", async () => {
    await expect(loadConfig({ SUMO_CHUNK_SIZE: "12.5" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(loadConfig({ SUMO_CHUNK_OVERLAP: "ten" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it("should reject non-positive chunk sizes and negative overlaps", async () => {
    await expect(loadConfig({ SUMO_CHUNK_SIZE: "0" })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadConfig({ SUMO_CHUNK_OVERLAP: "-1" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it("should reject an unknown log level", async () => {
    await expect(loadConfig({ LOG_LEVEL: "verbose" })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("should reject a base URL that is not http(s)", async () => {
    await expect(loadConfig({ SUMO_BASE_URL: "ftp://support.example.org" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(loadConfig({ SUMO_BASE_URL: "not a url" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it("should reject an articles path that is not a directory", async () => {
    vi.mocked(stat).mockResolvedValueOnce({ isDirectory: () => false } as any);

    await expect(loadConfig({ SUMO_ARTICLES_DIR: "passages.jsonl" })).rejects.toMatchObject({
      payload: { details: { setting: "SUMO_ARTICLES_DIR", reason: "is not a directory" } },
    });
  });

  it("should reject an unreadable articles path", async () => {
    vi.mocked(stat).mockRejectedValueOnce(new Error("ENOENT"));

    await expect(loadConfig({ SUMO_ARTICLES_DIR: "missing" })).rejects.toMatchObject({
      payload: { details: { setting: "SUMO_ARTICLES_DIR", reason: "not readable: ENOENT" } },
    });
  });
});

describe("getConfig", () => {
  afterEach(() => {
    resetConfig();
  });

  it("should throw before configuration is loaded", () => {
    resetConfig();
    expect(() => getConfig()).toThrow("Configuration not loaded");
  });

  it("should return the cached configuration", async () => {
    const config = await loadConfig({});
    _setCachedConfigForTesting(config);

    expect(getConfig()).toBe(config);
  });
});
