/**
 * In-memory passage sink
 */

import type { PassageRecord, PassageSink } from "../../types.js";
import { logger } from "../utils/logger.js";

export class MemoryPassageSink implements PassageSink {
  readonly records: PassageRecord[] = [];
  private closed = false;

  async accept(records: PassageRecord[]): Promise<void> {
    if (this.closed) {
      throw new Error("MemoryPassageSink is closed");
    }
    this.records.push(...records);
    logger.logSinkWrite("memory", records.length);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
