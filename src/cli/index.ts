#!/usr/bin/env node

/**
 * RecordShift CLI - batch migration of user and dependant records
 */

import { Command } from "commander";
import { createMigrateCommand } from "./commands/migrate.js";
import { createCheckCommand } from "./commands/check.js";
import { isLogLevel, logger } from "../utils/logger.js";
import { PACKAGE_INFO } from "./version.js";

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(PACKAGE_INFO.name)
    .description(PACKAGE_INFO.description)
    .version(PACKAGE_INFO.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug");

  program.hook("preAction", (thisCommand) => {
    const { logLevel } = thisCommand.opts<{ logLevel?: string }>();
    if (logLevel !== undefined) {
      if (!isLogLevel(logLevel)) {
        throw new Error(`Invalid log level: ${logLevel}`);
      }
      logger.setLevel(logLevel);
    }
  });

  program.addCommand(createMigrateCommand());
  program.addCommand(createCheckCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
