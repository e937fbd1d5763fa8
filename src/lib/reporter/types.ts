/**
 * Reporter module types
 */

import type { SourceKind } from "../../types/config.js";
import type { InsertionMetrics } from "../emitter/types.js";

export interface InputArtifact {
  path: string;
  hash: string;
}

export interface SourceReport {
  source: string;
  kind: SourceKind;
  status: "success" | "error";
  users: number;
  dependants: number;
  durationMs: number;
  inputs: InputArtifact[];
  /** Target inserts, one entry per collection written */
  insertions: InsertionMetrics[];
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * MigrationReport - audit record of one CLI run
 */
export interface MigrationReport {
  tool: {
    name: string;
    version: string;
  };
  run: {
    id: string;
    startedAt: string;
    durationMs: number;
  };
  sources: SourceReport[];
  summary: {
    succeeded: number;
    failed: number;
    users: number;
    dependants: number;
    failedInserts: number;
  };
}
