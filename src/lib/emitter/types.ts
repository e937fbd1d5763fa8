/**
 * Emitter module types
 */

import type { OutputFormat } from "../../types/config.js";
import type { DataRecord } from "../../types/data-model.js";

export interface EmitterOptions {
  format: OutputFormat;
  /** Directory for output files; stdout when omitted */
  dir?: string;
}

export interface EmittedFile {
  source: string;
  dataset: "users" | "dependants";
  path: string;
  records: number;
}

/**
 * Insertion result metrics for one collection
 */
export interface InsertionMetrics {
  collection: string;
  totalDocuments: number;
  insertedDocuments: number;
  failedInserts: number;
  durationMs: number;
}

/**
 * Destination for normalized records, one collection at a time
 */
export interface RecordSink {
  insertRecords(collection: string, records: readonly DataRecord[]): Promise<InsertionMetrics>;
  close(): Promise<void>;
}
