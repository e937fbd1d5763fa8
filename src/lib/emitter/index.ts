/**
 * Emitter module - writes normalized records to files, streams or MongoDB
 */
export * from "./types.js";
export * from "./mongo-inserter.js";
export * from "./ndjson-writer.js";
export * from "./output-writer.js";
