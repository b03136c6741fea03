/**
 * Unit tests for markup inspection
 */

import { describe, it, expect } from "vitest";
import { inspectMarkup } from "../markup-inspector.js";

describe("inspectMarkup", () => {
  it("should detect images", () => {
    expect(inspectMarkup('<p><img src="a.png" alt="A"></p>').hasImages).toBe(true);
    expect(inspectMarkup("<p>No pictures</p>").hasImages).toBe(false);
  });

  it("should detect video elements", () => {
    expect(inspectMarkup('<video src="clip.webm"></video>').hasVideos).toBe(true);
  });

  it("should detect embedded players by host", () => {
    const markup = '<iframe src="https://www.youtube.com/embed/placeholder"></iframe>';

    expect(inspectMarkup(markup).hasVideos).toBe(true);
  });

  it("should report no videos for plain markup", () => {
    expect(inspectMarkup("<p>Text</p>").hasVideos).toBe(false);
  });

  it("should count headings of every level", () => {
    const markup = "<h1>A</h1><h2>B</h2><p>x</p><h3>C</h3><h6>D</h6>";

    expect(inspectMarkup(markup).headingCount).toBe(4);
  });

  describe("fallbackTitle", () => {
    it("should prefer the first h1", () => {
      const markup = "<title>Page</title><h1> First heading </h1><h1>Second</h1>";

      expect(inspectMarkup(markup).fallbackTitle).toBe("First heading");
    });

    it("should fall back to the title element", () => {
      const markup = "<html><head><title>Page title</title></head><body><p>x</p></body></html>";

      expect(inspectMarkup(markup).fallbackTitle).toBe("Page title");
    });

    it("should default to Untitled", () => {
      expect(inspectMarkup("<p>x</p>").fallbackTitle).toBe("Untitled");
    });
  });
});
