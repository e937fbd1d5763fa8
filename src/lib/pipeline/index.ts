/**
 * Migration pipeline - load → map → normalize → export, one source at a time
 */

import { SourceMappings } from "../../types/data-model.js";
import { SourceKind } from "../../types/config.js";
import { RecordShiftError, toRecordShiftError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { RecordExporter } from "../exporter/index.js";
import { mapDatasets } from "../mapper/index.js";
import { NormalizerOptions, normalize } from "../normalizer/index.js";
import { SourceAdapter } from "../sources/types.js";

export interface MigrationOptions {
  mappings: SourceMappings;
  normalizer?: NormalizerOptions;
}

export interface MigrationResult {
  source: string;
  kind: SourceKind;
  users: RecordExporter;
  dependants: RecordExporter;
  durationMs: number;
}

/**
 * A source to run together with its resolved mapping tables
 */
export interface MigrationJob {
  adapter: SourceAdapter;
  options: MigrationOptions;
}

export type MigrationOutcome =
  | { status: "success"; result: MigrationResult }
  | { status: "error"; source: string; kind: SourceKind; error: RecordShiftError; durationMs: number };

/**
 * Run one source end to end. Any failure propagates to the caller.
 */
export async function migrateSource(
  adapter: SourceAdapter,
  options: MigrationOptions,
): Promise<MigrationResult> {
  const startTime = Date.now();
  logger.info("Migrating source", { source: adapter.name, kind: adapter.kind });

  const loaded = await adapter.load();
  const mapped = mapDatasets(loaded, options.mappings);
  const normalized = normalize(mapped, options.normalizer);

  const result: MigrationResult = {
    source: adapter.name,
    kind: adapter.kind,
    users: new RecordExporter(normalized.users),
    dependants: new RecordExporter(normalized.dependants),
    durationMs: Date.now() - startTime,
  };

  logger.info("Source migrated", {
    source: result.source,
    users: result.users.rowCount,
    dependants: result.dependants.rowCount,
    durationMs: result.durationMs,
  });

  return result;
}

/**
 * Delivers one outcome (writes, inserts). Returning an outcome replaces the
 * one passed in, so a source that ran but could not be delivered is reported
 * as failed.
 */
export type OutcomeHandler = (
  outcome: MigrationOutcome,
  job: MigrationJob,
) => Promise<MigrationOutcome | void>;

function failedOutcome(
  adapter: SourceAdapter,
  error: unknown,
  startTime: number,
  stage: string,
): MigrationOutcome {
  const failure = toRecordShiftError(error);
  logger.error(`Source ${stage} failed`, {
    source: adapter.name,
    code: failure.code,
    message: failure.message,
  });
  return {
    status: "error",
    source: adapter.name,
    kind: adapter.kind,
    error: failure,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Run every job in order. A source that fails while migrating or while
 * `onOutcome` delivers it is recorded as an error and the next one still
 * runs; nothing is shared between runs.
 */
export async function migrateAll(
  jobs: readonly MigrationJob[],
  onOutcome?: OutcomeHandler,
): Promise<MigrationOutcome[]> {
  const outcomes: MigrationOutcome[] = [];

  for (const job of jobs) {
    const { adapter, options } = job;
    const startTime = Date.now();
    let outcome: MigrationOutcome;
    try {
      outcome = { status: "success", result: await migrateSource(adapter, options) };
    } catch (error) {
      outcome = failedOutcome(adapter, error, startTime, "migration");
    }

    if (onOutcome) {
      try {
        const delivered = await onOutcome(outcome, job);
        if (delivered) {
          outcome = delivered;
        }
      } catch (error) {
        outcome = failedOutcome(adapter, error, startTime, "delivery");
      }
    }
    outcomes.push(outcome);
  }

  return outcomes;
}
