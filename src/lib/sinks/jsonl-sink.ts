/**
 * Passage sink that appends one JSON object per line to a file
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import type { PassageRecord, PassageSink } from "../../types.js";
import { logger } from "../utils/logger.js";

export interface JsonlSinkOptions {
  /** Truncate an existing file on the first accept() (default: true) */
  overwrite?: boolean;
}

export class JsonlPassageSink implements PassageSink {
  readonly filePath: string;
  private readonly overwrite: boolean;
  private opened = false;
  private written = 0;

  constructor(filePath: string, options: JsonlSinkOptions = {}) {
    this.filePath = resolve(filePath);
    this.overwrite = options.overwrite ?? true;
  }

  /**
   * Create the parent directory, and truncate the file if asked to
   */
  private async open(): Promise<void> {
    if (this.opened) {
      return;
    }
    await mkdir(dirname(this.filePath), { recursive: true });
    if (this.overwrite) {
      await writeFile(this.filePath, "", "utf-8");
    }
    this.opened = true;
  }

  async accept(records: PassageRecord[]): Promise<void> {
    await this.open();
    if (records.length === 0) {
      return;
    }
    const lines = records.map((record) => `${JSON.stringify(record)}\n`).join("");
    await appendFile(this.filePath, lines, "utf-8");
    this.written += records.length;
    logger.logSinkWrite("jsonl", records.length, { filePath: this.filePath });
  }

  /**
   * Nothing is created or truncated unless accept() ran at least once
   */
  async close(): Promise<void> {
    logger.debug("Closed JSONL sink", { filePath: this.filePath, written: this.written });
  }

  getWrittenCount(): number {
    return this.written;
  }
}
