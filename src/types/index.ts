// Core re-exports for the RecordShift type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/sources/types.js";
export * from "../lib/normalizer/types.js";
export * from "../lib/emitter/types.js";
export * from "../lib/reporter/types.js";
