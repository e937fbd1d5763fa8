/**
 * Check CLI command - validates a config file and prints the resolved mappings
 */

import { Command } from "commander";
import { toRecordShiftError } from "../../utils/errors.js";
import { resolveMappings } from "../../lib/sources/mappings.js";
import { parseConfigFile } from "../config/parser.js";
import { CheckCommandOptions } from "../config/types.js";
import { EXIT_OK, exitCodeFor } from "./exit-codes.js";

export function describeConfig(configPath: string) {
  const config = parseConfigFile(configPath);
  return {
    status: "success",
    phase: "check",
    sources: config.sources.map((source) => ({
      name: source.name,
      kind: source.kind,
      mapping: resolveMappings(source),
    })),
    normalization: config.normalization,
    output: config.output,
    hasTarget: config.target !== undefined,
  };
}

export function createCheckCommand(): Command {
  return new Command("check")
    .description("Validate a migration config and show the mapping each source will use")
    .requiredOption("--config <path>", "Path to the migration config (.json, .yaml, .yml)")
    .action((options: CheckCommandOptions) => {
      try {
        console.log(JSON.stringify(describeConfig(options.config), null, 2));
        process.exitCode = EXIT_OK;
      } catch (error) {
        const failure = toRecordShiftError(error);
        console.error(JSON.stringify(failure.toResponse("check"), null, 2));
        process.exitCode = exitCodeFor(failure);
      }
    });
}
