/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { MigrationConfig, migrationConfigSchema } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Run a zod schema, turning its issues into one readable ConfigError
 */
export function parseWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string,
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid ${label}:\n${issues.join("\n")}`, {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

/**
 * Parse and validate a configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): MigrationConfig {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, { cause: error });
  }

  let raw: unknown;
  try {
    raw = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, { cause: error });
  }

  const config = parseWithSchema(migrationConfigSchema, raw, `config file ${filePath}`);

  logger.info("Configuration file parsed successfully", {
    sources: config.sources.length,
    hasTarget: config.target !== undefined,
  });

  return config;
}
