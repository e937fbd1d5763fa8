/**
 * Migrate CLI command - runs every configured source and writes the results
 */

import { Command } from "commander";
import { MigrationConfig, TargetConfig } from "../../types/config.js";
import { toRecordShiftError } from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";
import { createMongoInserter } from "../../lib/emitter/mongo-inserter.js";
import type { InsertionMetrics, RecordSink } from "../../lib/emitter/types.js";
import { emitResult } from "../../lib/emitter/output-writer.js";
import { MigrationJob, MigrationOutcome, migrateAll } from "../../lib/pipeline/index.js";
import { MigrationReporter } from "../../lib/reporter/index.js";
import { createSourceAdapter, resolveMappings } from "../../lib/sources/index.js";
import { parseConfigFile } from "../config/parser.js";
import { mergeMigrateConfig, selectSources } from "../config/merge.js";
import { GlobalOptions, MigrateCommandOptions } from "../config/types.js";
import { PACKAGE_INFO } from "../version.js";
import { EXIT_FAILURE, EXIT_OK, exitCodeFor } from "./exit-codes.js";

export function buildJobs(config: MigrationConfig, names?: readonly string[]): MigrationJob[] {
  return selectSources(config.sources, names).map((source) => ({
    adapter: createSourceAdapter(source),
    options: {
      mappings: resolveMappings(source),
      normalizer: config.normalization,
    },
  }));
}

interface Delivery {
  outcome: MigrationOutcome;
  insertions: InsertionMetrics[];
}

/**
 * Write one successful source to the output and the target. A failure here
 * turns the outcome into an error for that source only.
 */
export async function deliverOutcome(
  outcome: MigrationOutcome,
  config: MigrationConfig,
  sink?: RecordSink,
): Promise<Delivery> {
  const insertions: InsertionMetrics[] = [];
  if (outcome.status === "error") {
    return { outcome, insertions };
  }

  const { result } = outcome;
  try {
    await emitResult(result, config.output);

    if (sink && config.target) {
      insertions.push(await sink.insertRecords(config.target.usersCollection, result.users.toRecords()));
      if (result.dependants.isPresent) {
        insertions.push(
          await sink.insertRecords(config.target.dependantsCollection, result.dependants.toRecords()),
        );
      }
    }
  } catch (error) {
    return {
      outcome: {
        status: "error",
        source: result.source,
        kind: result.kind,
        error: toRecordShiftError(error),
        durationMs: result.durationMs,
      },
      insertions,
    };
  }

  return { outcome, insertions };
}

export interface MigrateDeps {
  createSink?: (target: TargetConfig) => Promise<RecordSink>;
}

/**
 * Run the migration for a parsed configuration. Returns the process exit code:
 * failure when any source failed or any target insert was rejected.
 */
export async function runMigrate(
  options: MigrateCommandOptions,
  globals: GlobalOptions = {},
  deps: MigrateDeps = {},
): Promise<number> {
  const config = mergeMigrateConfig(options, parseConfigFile(options.config));
  if (!isLogLevel(globals.logLevel) && config.logLevel) {
    logger.setLevel(config.logLevel);
  }

  const jobs = buildJobs(config, options.source);
  const reporter = new MigrationReporter(PACKAGE_INFO.version);
  const createSink = deps.createSink ?? createMongoInserter;
  const sink = config.target ? await createSink(config.target) : undefined;

  let outcomes: MigrationOutcome[];
  try {
    outcomes = await migrateAll(jobs, async (outcome, job) => {
      const delivery = await deliverOutcome(outcome, config, sink);
      if (delivery.outcome.status === "error") {
        const { error, source } = delivery.outcome;
        console.error(JSON.stringify(error.toResponse(`migration:${source}`), null, 2));
      }
      await reporter.record(delivery.outcome, job.adapter.inputFiles(), delivery.insertions);
      return delivery.outcome;
    });
  } finally {
    await sink?.close();
  }

  if (options.report) {
    await reporter.save(options.report);
  }

  const { summary } = reporter.getReport();
  logger.info("Migration finished", summary);

  const allSucceeded = outcomes.every((outcome) => outcome.status === "success");
  return allSucceeded && summary.failedInserts === 0 ? EXIT_OK : EXIT_FAILURE;
}

export function createMigrateCommand(): Command {
  return new Command("migrate")
    .description("Normalize every configured source into the canonical user/dependant schema")
    .requiredOption("--config <path>", "Path to the migration config (.json, .yaml, .yml)")
    .option("--source <name...>", "Only run the named sources")
    .option("--format <format>", "Output format: csv, json, ndjson")
    .option("--output-dir <dir>", "Write one file per dataset here instead of stdout")
    .option("--report <path>", "Write a JSON run report to this path")
    .option("--target-uri <uri>", "MongoDB URI to insert normalized records into")
    .option("--target-db <database>", "Target MongoDB database name")
    .option("--region <code>", "Default phone region for numbers without a country code")
    .option("--day-first", "Read ambiguous NN/NN/YYYY dates as day/month")
    .action(async (options: MigrateCommandOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      try {
        process.exitCode = await runMigrate(options, globals);
      } catch (error) {
        const failure = toRecordShiftError(error);
        console.error(JSON.stringify(failure.toResponse("migration"), null, 2));
        process.exitCode = exitCodeFor(failure);
      }
    });
}
