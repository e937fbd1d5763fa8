/**
 * Merge CLI options over the config file. Precedence: CLI > file > defaults.
 */

import {
  MigrationConfig,
  SourceConfig,
  normalizationConfigSchema,
  outputFormatSchema,
  targetConfigSchema,
} from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { parseWithSchema } from "./parser.js";
import { MigrateCommandOptions } from "./types.js";

export function mergeMigrateConfig(
  options: MigrateCommandOptions,
  fileConfig: MigrationConfig,
): MigrationConfig {
  const format = options.format
    ? parseWithSchema(outputFormatSchema, options.format, "--format")
    : fileConfig.output.format;

  const normalization = parseWithSchema(
    normalizationConfigSchema,
    {
      region: options.region ?? fileConfig.normalization.region,
      dayFirst: options.dayFirst ?? fileConfig.normalization.dayFirst,
    },
    "normalization options",
  );

  const target =
    options.targetUri || options.targetDb
      ? parseWithSchema(
          targetConfigSchema,
          {
            ...fileConfig.target,
            ...(options.targetUri ? { uri: options.targetUri } : {}),
            ...(options.targetDb ? { database: options.targetDb } : {}),
          },
          "target options",
        )
      : fileConfig.target;

  return {
    ...fileConfig,
    normalization,
    output: {
      format,
      dir: options.outputDir ?? fileConfig.output.dir,
    },
    target,
  };
}

/**
 * Keep only the named sources, in config order. No names keeps all.
 */
export function selectSources(
  sources: readonly SourceConfig[],
  names: readonly string[] = [],
): SourceConfig[] {
  if (names.length === 0) {
    return [...sources];
  }

  const known = new Set(sources.map((source) => source.name));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown source: ${unknown.join(", ")}`, { unknown });
  }

  return sources.filter((source) => names.includes(source.name));
}
