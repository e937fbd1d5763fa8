/**
 * RecordShift: batch migration of user and dependant records into one canonical schema
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/dataset/index.js";
export * from "./lib/sources/index.js";
export * from "./lib/mapper/index.js";
export * from "./lib/normalizer/index.js";
export * from "./lib/exporter/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/pipeline/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
