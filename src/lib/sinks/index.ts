/**
 * Passage sink exports
 */

export { MemoryPassageSink } from "./memory-sink.js";
export { JsonlPassageSink } from "./jsonl-sink.js";
export type { JsonlSinkOptions } from "./jsonl-sink.js";
