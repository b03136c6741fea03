/**
 * Unit tests for chunker module
 */

import { describe, it, expect, vi } from "vitest";
import {
  chunkDocument,
  chunkId,
  continuationPrefix,
  expectedChunkCount,
  splitWords,
  validateChunkingOptions,
} from "../chunker.js";
import type { ChunkableDocument } from "../chunker.js";
import { ConfigurationError } from "../../utils/errors.js";

// Mock logger
vi.mock("../../utils/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    logChunking: vi.fn(),
  },
}));

const DEFAULTS = { chunkSize: 500, chunkOverlap: 100 };

function makeDocument(text: string, title = "Test Article"): ChunkableDocument {
  return {
    doc_id: "abc123def456",
    slug: "test-article",
    title,
    extracted_text: text,
    citation: {
      title,
      url: "https://support.example.org/en-US/kb/test-article",
      source: "Mozilla Support (SUMO)",
      locale: "en-US",
      products: ["firefox"],
      topics: ["settings"],
    },
  };
}

function words(count: number, from = 0): string {
  return Array.from({ length: count }, (_, i) => `w${i + from}`).join(" ");
}

function stripPrefix(text: string, title: string): string {
  const prefix = continuationPrefix(title);
  return text.startsWith(prefix) ? text.slice(prefix.length) : text;
}

describe("chunkDocument", () => {
  describe("empty content", () => {
    it("should return empty array for empty string", () => {
      expect(chunkDocument(makeDocument(""), DEFAULTS)).toEqual([]);
    });

    it("should return empty array for whitespace-only string", () => {
      expect(chunkDocument(makeDocument("   \n\n  "), DEFAULTS)).toEqual([]);
    });
  });

  describe("short documents", () => {
    it("should return the whole text as a single passage", () => {
      const text = "Just a few\n\nwords here.";
      const passages = chunkDocument(makeDocument(text), DEFAULTS);

      expect(passages).toHaveLength(1);
      expect(passages[0]).toMatchObject({
        chunk_id: "abc123def456_chunk_0",
        doc_id: "abc123def456",
        chunk_index: 0,
        text,
        word_count: 5,
        total_chunks: 1,
        position: "end",
        slug: "test-article",
      });
    });

    it("should keep a document of exactly chunkSize words in one passage", () => {
      const passages = chunkDocument(makeDocument(words(500)), DEFAULTS);

      expect(passages).toHaveLength(1);
      expect(passages[0].word_count).toBe(500);
    });
  });

  describe("long documents", () => {
    it("should split 650 words into two overlapping passages", () => {
      const passages = chunkDocument(makeDocument(words(650)), DEFAULTS);

      expect(passages).toHaveLength(2);
      expect(passages[0].text).toBe(words(500));
      expect(passages[0].word_count).toBe(500);
      expect(passages[0].position).toBe("beginning");
      expect(passages[1].text).toBe(`[Continued from Test Article] ${words(250, 400)}`);
      expect(passages[1].word_count).toBe(250);
      expect(passages[1].position).toBe("end");
      expect(passages.map((p) => p.total_chunks)).toEqual([2, 2]);
    });

    it("should mark middle passages", () => {
      const passages = chunkDocument(makeDocument("a b c d e f g", "T"), {
        chunkSize: 3,
        chunkOverlap: 1,
      });

      expect(passages.map((p) => p.text)).toEqual([
        "a b c",
        "[Continued from T] c d e",
        "[Continued from T] e f g",
      ]);
      expect(passages.map((p) => p.position)).toEqual(["beginning", "middle", "end"]);
      expect(passages.map((p) => p.chunk_id)).toEqual([
        "abc123def456_chunk_0",
        "abc123def456_chunk_1",
        "abc123def456_chunk_2",
      ]);
    });

    it("should collapse whitespace inside windows of a multi-passage document", () => {
      const passages = chunkDocument(makeDocument("a\n\nb  c\td e", "T"), {
        chunkSize: 3,
        chunkOverlap: 1,
      });

      expect(passages[0].text).toBe("a b c");
    });

    it("should produce ceil((N - overlap) / (size - overlap)) passages", () => {
      for (const count of [501, 850, 851, 900, 901, 1234]) {
        const passages = chunkDocument(makeDocument(words(count)), DEFAULTS);
        expect(passages).toHaveLength(Math.ceil((count - 100) / 400));
        expect(passages).toHaveLength(expectedChunkCount(count, DEFAULTS));
      }
    });

    it("should cover every word in order", () => {
      const text = words(1234);
      const passages = chunkDocument(makeDocument(text), DEFAULTS);

      const rebuilt = passages.flatMap((passage, index) => {
        const windowWords = splitWords(stripPrefix(passage.text, "Test Article"));
        return index === 0 ? windowWords : windowWords.slice(DEFAULTS.chunkOverlap);
      });

      expect(rebuilt).toEqual(splitWords(text));
    });

    it("should share exactly chunkOverlap words between consecutive passages", () => {
      const passages = chunkDocument(makeDocument(words(900)), DEFAULTS);

      for (let i = 1; i < passages.length; i++) {
        const previous = splitWords(stripPrefix(passages[i - 1].text, "Test Article"));
        const current = splitWords(stripPrefix(passages[i].text, "Test Article"));
        expect(current.slice(0, 100)).toEqual(previous.slice(-100));
      }
    });

    it("should stamp every passage with the citation", () => {
      const document = makeDocument(words(900));
      const passages = chunkDocument(document, DEFAULTS);

      for (const passage of passages) {
        expect(passage.citation).toEqual(document.citation);
        expect(passage.citation).not.toBe(document.citation);
      }
    });
  });

  it("should return frozen passages", () => {
    const [passage] = chunkDocument(makeDocument("some text"), DEFAULTS);

    expect(Object.isFrozen(passage)).toBe(true);
    expect(Object.isFrozen(passage.citation)).toBe(true);
  });

  it("should be deterministic", () => {
    const document = makeDocument(words(777));

    expect(chunkDocument(document, DEFAULTS)).toEqual(chunkDocument(document, DEFAULTS));
  });

  it("should reject invalid options before chunking", () => {
    expect(() =>
      chunkDocument(makeDocument(words(10)), { chunkSize: 100, chunkOverlap: 100 })
    ).toThrow(ConfigurationError);
  });
});

describe("validateChunkingOptions", () => {
  it("should accept overlap smaller than size", () => {
    expect(() => validateChunkingOptions({ chunkSize: 500, chunkOverlap: 499 })).not.toThrow();
    expect(() => validateChunkingOptions({ chunkSize: 1, chunkOverlap: 0 })).not.toThrow();
  });

  it("should reject overlap equal to size", () => {
    expect(() => validateChunkingOptions({ chunkSize: 500, chunkOverlap: 500 })).toThrow(
      ConfigurationError
    );
  });

  it("should reject overlap larger than size", () => {
    expect(() => validateChunkingOptions({ chunkSize: 100, chunkOverlap: 200 })).toThrow(
      ConfigurationError
    );
  });

  it("should reject non-positive sizes", () => {
    expect(() => validateChunkingOptions({ chunkSize: 0, chunkOverlap: 0 })).toThrow(
      ConfigurationError
    );
    expect(() => validateChunkingOptions({ chunkSize: -5, chunkOverlap: 0 })).toThrow(
      ConfigurationError
    );
  });

  it("should reject negative and fractional values", () => {
    expect(() => validateChunkingOptions({ chunkSize: 500, chunkOverlap: -1 })).toThrow(
      ConfigurationError
    );
    expect(() => validateChunkingOptions({ chunkSize: 2.5, chunkOverlap: 1 })).toThrow(
      ConfigurationError
    );
  });

  it("should carry a configuration error payload", () => {
    try {
      validateChunkingOptions({ chunkSize: 100, chunkOverlap: 100 });
      expect.fail("expected a ConfigurationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.payload.code).toBe("CONFIGURATION_ERROR");
        expect(error.payload.details).toEqual({
          setting: "chunk_overlap",
          value: 100,
          reason: "must be smaller than chunk_size (100)",
        });
      }
    }
  });
});

describe("expectedChunkCount", () => {
  it("should return 0 for no words and 1 for a single window", () => {
    expect(expectedChunkCount(0, DEFAULTS)).toBe(0);
    expect(expectedChunkCount(1, DEFAULTS)).toBe(1);
    expect(expectedChunkCount(500, DEFAULTS)).toBe(1);
  });

  it("should apply the window formula to longer documents", () => {
    expect(expectedChunkCount(650, DEFAULTS)).toBe(2);
    expect(expectedChunkCount(901, DEFAULTS)).toBe(3);
  });
});

describe("helpers", () => {
  it("should split on any whitespace", () => {
    expect(splitWords("  one\ttwo\n\nthree ")).toEqual(["one", "two", "three"]);
  });

  it("should build chunk ids from the document id", () => {
    expect(chunkId("abc", 3)).toBe("abc_chunk_3");
  });

  it("should build the continuation prefix from the title", () => {
    expect(continuationPrefix("Clear the cache")).toBe("[Continued from Clear the cache] ");
  });
});
