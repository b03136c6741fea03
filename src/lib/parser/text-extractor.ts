/**
 * Structure-preserving text extraction from article markup.
 *
 * The extractor consumes scanner events in a single forward pass and renders
 * headings, lists, code, emphasis, links, tables and callouts as lightweight
 * markers. All state lives on the instance so a run can be inspected or
 * resumed event by event.
 */

import { getAttribute, scanMarkup } from "./markup-scanner.js";
import { normalizeWhitespace } from "./normalizer.js";
import type { MarkupAttribute, MarkupEvent, MarkupEventHandler } from "./markup-scanner.js";

export interface ExtractorOptions {
  /** Tags whose content never reaches the output */
  skipTags: readonly string[];
  /** Class names that mark a container as a callout */
  calloutClasses: readonly string[];
  /** Tags that may carry a callout class */
  calloutTags: readonly string[];
  bulletGlyph: string;
  codeTags: readonly string[];
  boldTags: readonly string[];
  italicTags: readonly string[];
}

export const DEFAULT_EXTRACTOR_OPTIONS: ExtractorOptions = {
  skipTags: ["script", "style", "meta", "link", "noscript"],
  calloutClasses: ["warning", "note", "tip", "caution"],
  calloutTags: ["div", "section", "aside"],
  bulletGlyph: "•",
  codeTags: ["code", "tt"],
  boldTags: ["strong", "b"],
  italicTags: ["em", "i"],
};

type TagClass =
  | "paragraph"
  | "break"
  | "list"
  | "item"
  | "code"
  | "pre"
  | "quote"
  | "bold"
  | "italic"
  | "rule"
  | "link"
  | "image"
  | "table";

const HEADING_PATTERN = /^h([1-6])$/;

const FIXED_TAGS: Record<string, TagClass> = {
  p: "paragraph",
  br: "break",
  ul: "list",
  ol: "list",
  li: "item",
  pre: "pre",
  blockquote: "quote",
  hr: "rule",
  a: "link",
  img: "image",
  table: "table",
};

export class StructuralTextExtractor implements MarkupEventHandler {
  private readonly options: ExtractorOptions;
  private readonly tagClasses: Map<string, TagClass>;

  private output: string[] = [];
  /** Trimmed text runs waiting for the next structural boundary */
  private pendingText: string[] = [];
  /** Whitespace seen after the last run in pendingText */
  private pendingTrailingSpace = false;
  /** Whitespace separates the last emitted fragment from what comes next */
  private spaceBeforeNext = false;

  /** Open skip tags by name; content is discarded while any count is positive */
  private skipCounts = new Map<string, number>();
  private skipDepth = 0;
  /** Open structural tags by name, so stray closes leave state alone */
  private openCounts = new Map<string, number>();
  private listDepth = 0;
  private codeDepth = 0;
  private preDepth = 0;
  /** One entry per open link: whether its open emitted a bracket */
  private linkStack: boolean[] = [];

  constructor(options: Partial<ExtractorOptions> = {}) {
    this.options = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };
    this.tagClasses = new Map<string, TagClass>(Object.entries(FIXED_TAGS));
    for (const tag of this.options.codeTags) {
      this.tagClasses.set(tag, "code");
    }
    for (const tag of this.options.boldTags) {
      this.tagClasses.set(tag, "bold");
    }
    for (const tag of this.options.italicTags) {
      this.tagClasses.set(tag, "italic");
    }
  }

  handleEvent(event: MarkupEvent): void {
    switch (event.type) {
      case "open":
        this.handleOpen(event.name, event.attributes);
        break;
      case "close":
        this.handleClose(event.name);
        break;
      case "text":
        this.handleText(event.text);
        break;
    }
  }

  /**
   * Current list nesting depth (0 outside any list)
   */
  getListDepth(): number {
    return this.listDepth;
  }

  /**
   * Whether content is currently being discarded
   */
  isSkipping(): boolean {
    return this.skipDepth > 0;
  }

  /**
   * Flush pending text and return everything emitted so far, unnormalized
   */
  getRawText(): string {
    this.flush();
    return this.output.join("");
  }

  private handleOpen(name: string, attributes: MarkupAttribute[]): void {
    if (this.options.skipTags.includes(name)) {
      this.skipCounts.set(name, (this.skipCounts.get(name) ?? 0) + 1);
      this.skipDepth++;
      return;
    }
    if (this.skipDepth > 0) {
      return;
    }

    const headingMatch = HEADING_PATTERN.exec(name);
    if (headingMatch) {
      this.trackOpen(name);
      this.flush();
      this.emitBlock(`\n\n${"#".repeat(Number(headingMatch[1]))} `);
      return;
    }

    const tagClass = this.tagClasses.get(name);
    if (tagClass === undefined) {
      if (this.isCallout(name, attributes)) {
        this.flush();
        this.emitBlock("\n**Note:** ");
      }
      return;
    }

    switch (tagClass) {
      case "paragraph":
        this.trackOpen(name);
        this.flush();
        this.emitBlock("\n\n");
        break;
      case "break":
        this.flush();
        this.emitBlock("\n");
        break;
      case "list":
        this.trackOpen(name);
        this.flush();
        this.listDepth++;
        break;
      case "item": {
        this.trackOpen(name);
        this.flush();
        const indent = "  ".repeat(Math.max(0, this.listDepth - 1));
        this.emitBlock(`\n${indent}${this.options.bulletGlyph} `);
        break;
      }
      case "code":
        this.trackOpen(name);
        this.flush();
        if (this.codeDepth++ === 0) {
          this.emitInline("`");
        }
        break;
      case "pre":
        this.trackOpen(name);
        this.flush();
        if (this.preDepth++ === 0) {
          this.emitBlock("\n```\n");
        }
        break;
      case "quote":
        this.trackOpen(name);
        this.flush();
        this.emitBlock("\n> ");
        break;
      case "bold":
        this.trackOpen(name);
        this.flush();
        this.emitInline("**");
        break;
      case "italic":
        this.trackOpen(name);
        this.flush();
        this.emitInline("*");
        break;
      case "rule":
        this.flush();
        this.emitBlock("\n---\n");
        break;
      case "link":
        this.openLink(name, attributes);
        break;
      case "image": {
        const alt = getAttribute(attributes, "alt");
        if (alt) {
          this.flush();
          this.emitInline(`[${alt}]`);
        }
        break;
      }
      case "table":
        this.trackOpen(name);
        this.flush();
        this.emitBlock("\n[Table]\n");
        break;
    }
  }

  private handleClose(name: string): void {
    if (this.options.skipTags.includes(name)) {
      const count = this.skipCounts.get(name) ?? 0;
      if (count > 0) {
        this.skipCounts.set(name, count - 1);
        this.skipDepth--;
      }
      return;
    }
    if (this.skipDepth > 0) {
      return;
    }

    // Void tags and transparent tags have nothing to close
    if (!this.trackClose(name)) {
      return;
    }

    if (HEADING_PATTERN.test(name)) {
      this.flush();
      this.emitBlock("\n");
      return;
    }

    switch (this.tagClasses.get(name)) {
      case "list":
        this.flush();
        this.listDepth = Math.max(0, this.listDepth - 1);
        if (this.listDepth === 0) {
          this.emitBlock("\n");
        }
        break;
      case "code":
        this.flush();
        if (--this.codeDepth === 0) {
          this.emitClosing("`");
        }
        break;
      case "pre":
        this.flush();
        if (--this.preDepth === 0) {
          this.emitBlock("\n```\n");
        }
        break;
      case "bold":
        this.flush();
        this.emitClosing("**");
        break;
      case "italic":
        this.flush();
        this.emitClosing("*");
        break;
      case "link":
        if (this.linkStack.pop()) {
          this.flush();
          this.emitClosing("]");
        }
        break;
      default:
        this.flush();
        break;
    }
  }

  private handleText(data: string): void {
    if (this.skipDepth > 0) {
      return;
    }

    if (this.preDepth > 0 || this.codeDepth > 0) {
      this.flush();
      this.output.push(data);
      this.spaceBeforeNext = false;
      return;
    }

    const text = data.trim();
    if (!text) {
      if (data.length > 0) {
        this.markSpace();
      }
      return;
    }

    if (/^\s/.test(data)) {
      this.markSpace();
    }
    this.pendingText.push(text);
    this.pendingTrailingSpace = /\s$/.test(data);
  }

  private openLink(name: string, attributes: MarkupAttribute[]): void {
    const href = getAttribute(attributes, "href");
    const resolvable = href !== undefined && href.trim() !== "" && !href.startsWith("#");
    this.trackOpen(name);
    this.linkStack.push(resolvable);
    if (resolvable) {
      this.flush();
      this.emitInline("[");
    }
  }

  private isCallout(name: string, attributes: MarkupAttribute[]): boolean {
    if (!this.options.calloutTags.includes(name)) {
      return false;
    }
    const classNames = (getAttribute(attributes, "class") ?? "").split(/\s+/);
    return classNames.some((cls) => this.options.calloutClasses.includes(cls));
  }

  private trackOpen(name: string): void {
    this.openCounts.set(name, (this.openCounts.get(name) ?? 0) + 1);
  }

  /**
   * Record a close; false when there is no matching open
   */
  private trackClose(name: string): boolean {
    const count = this.openCounts.get(name) ?? 0;
    if (count === 0) {
      return false;
    }
    this.openCounts.set(name, count - 1);
    return true;
  }

  private markSpace(): void {
    if (this.pendingText.length > 0) {
      this.pendingTrailingSpace = true;
    } else {
      this.spaceBeforeNext = true;
    }
  }

  /**
   * Move pending text runs to the output, joined with single spaces
   */
  private flush(): void {
    if (this.pendingText.length === 0) {
      return;
    }
    this.emitInline(this.pendingText.join(" "));
    this.pendingText = [];
    this.spaceBeforeNext = this.pendingTrailingSpace;
    this.pendingTrailingSpace = false;
  }

  /**
   * Emit a fragment that attaches to what follows it (text, opening markers)
   */
  private emitInline(fragment: string): void {
    if (this.spaceBeforeNext && this.endsWithWord() && !/^\s/.test(fragment)) {
      this.output.push(" ");
    }
    this.spaceBeforeNext = false;
    this.output.push(fragment);
  }

  /**
   * Emit a closing marker; any pending separator still applies after it
   */
  private emitClosing(marker: string): void {
    this.output.push(marker);
  }

  private emitBlock(marker: string): void {
    this.spaceBeforeNext = false;
    this.output.push(marker);
  }

  private endsWithWord(): boolean {
    const last = this.output[this.output.length - 1];
    return last !== undefined && last.length > 0 && !/\s$/.test(last);
  }
}

/**
 * Extract unnormalized structural text from markup
 */
export function extractRawText(markup: string, options?: Partial<ExtractorOptions>): string {
  const extractor = new StructuralTextExtractor(options);
  scanMarkup(markup, extractor);
  return extractor.getRawText();
}

/**
 * Extract normalized structural text from markup
 */
export function extractText(markup: string, options?: Partial<ExtractorOptions>): string {
  return normalizeWhitespace(extractRawText(markup, options));
}
