/**
 * Reporter module - run reports for auditability
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { InputArtifact, MigrationReport, SourceReport } from "./types.js";
import type { MigrationOutcome } from "../pipeline/index.js";
import type { InsertionMetrics } from "../emitter/types.js";
import { logger } from "../../utils/logger.js";

export type { InputArtifact, MigrationReport, SourceReport } from "./types.js";

/**
 * SHA-256 of a file's contents
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  const fileBuffer = await fs.readFile(filePath);
  return crypto.createHash("sha256").update(fileBuffer).digest("hex");
}

/**
 * MigrationReporter collects per-source outcomes and input hashes for one run
 */
export class MigrationReporter {
  private readonly startedAt: Date;
  private readonly runId: string;
  private readonly sources: SourceReport[] = [];

  constructor(
    private readonly version: string = "0.1.0",
    now: Date = new Date(),
  ) {
    this.startedAt = now;
    this.runId = crypto.randomBytes(8).toString("hex");
  }

  /**
   * Hash the input files that still exist; a missing one is skipped
   */
  async hashInputs(files: readonly string[]): Promise<InputArtifact[]> {
    const artifacts: InputArtifact[] = [];
    for (const file of files) {
      try {
        artifacts.push({ path: file, hash: await calculateFileHash(file) });
      } catch (error) {
        logger.debug("Input not hashed", { path: file, error: String(error) });
      }
    }
    return artifacts;
  }

  async record(
    outcome: MigrationOutcome,
    inputFiles: readonly string[] = [],
    insertions: readonly InsertionMetrics[] = [],
  ): Promise<SourceReport> {
    const inputs = await this.hashInputs(inputFiles);

    const report: SourceReport =
      outcome.status === "success"
        ? {
            source: outcome.result.source,
            kind: outcome.result.kind,
            status: "success",
            users: outcome.result.users.rowCount,
            dependants: outcome.result.dependants.rowCount,
            durationMs: outcome.result.durationMs,
            inputs,
            insertions: [...insertions],
          }
        : {
            source: outcome.source,
            kind: outcome.kind,
            status: "error",
            users: 0,
            dependants: 0,
            durationMs: outcome.durationMs,
            inputs,
            insertions: [...insertions],
            error: {
              code: outcome.error.code,
              message: outcome.error.message,
              ...(outcome.error.details ? { details: outcome.error.details } : {}),
            },
          };

    this.sources.push(report);
    return report;
  }

  getReport(now: Date = new Date()): MigrationReport {
    const succeeded = this.sources.filter((source) => source.status === "success");
    return {
      tool: { name: "recordshift", version: this.version },
      run: {
        id: this.runId,
        startedAt: this.startedAt.toISOString(),
        durationMs: now.getTime() - this.startedAt.getTime(),
      },
      sources: [...this.sources],
      summary: {
        succeeded: succeeded.length,
        failed: this.sources.length - succeeded.length,
        users: succeeded.reduce((total, source) => total + source.users, 0),
        dependants: succeeded.reduce((total, source) => total + source.dependants, 0),
        failedInserts: this.sources.reduce(
          (total, source) =>
            total + source.insertions.reduce((sum, insertion) => sum + insertion.failedInserts, 0),
          0,
        ),
      },
    };
  }

  /**
   * Save the report as JSON
   */
  async save(reportPath: string): Promise<void> {
    await fs.mkdir(path.dirname(reportPath), { recursive: true });
    await fs.writeFile(reportPath, JSON.stringify(this.getReport(), null, 2));
    logger.info("Migration report saved", { path: reportPath });
  }
}
