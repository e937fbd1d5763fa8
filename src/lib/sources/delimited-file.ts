/**
 * Delimited text source (CSV and friends)
 */

import { parse } from "csv-parse/sync";
import { Dataset, LoadedSource } from "../../types/data-model.js";
import { DelimitedSourceConfig } from "../../types/config.js";
import { SourceReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { datasetFromRows } from "../dataset/index.js";
import { readSourceFile } from "./file-utils.js";
import { SourceAdapter } from "./types.js";

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

/**
 * Parse delimited text into a text-only dataset. The first record is the header.
 */
export function parseDelimitedText(content: string, delimiter: string, path = "<inline>"): Dataset {
  let records: unknown;
  try {
    records = parse(content, {
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    throw new SourceReadError(`Failed to parse delimited file: ${path}`, { path }, { cause: error });
  }

  if (!isStringMatrix(records)) {
    throw new SourceReadError(`Unexpected delimited content in: ${path}`, { path });
  }

  const [header, ...rows] = records;
  if (!header || header.every((name) => name === "")) {
    throw new SourceReadError(`Delimited file has no header row: ${path}`, { path });
  }

  return datasetFromRows(header, rows);
}

export class DelimitedFileSource implements SourceAdapter {
  readonly kind = "delimited";

  constructor(private readonly config: DelimitedSourceConfig) {}

  get name(): string {
    return this.config.name;
  }

  inputFiles(): string[] {
    return this.config.dependantsPath
      ? [this.config.path, this.config.dependantsPath]
      : [this.config.path];
  }

  async load(): Promise<LoadedSource> {
    const users = await this.readTable(this.config.path);
    const dependants = this.config.dependantsPath
      ? await this.readTable(this.config.dependantsPath)
      : undefined;

    logger.info("Delimited source loaded", {
      source: this.name,
      users: users.rowCount,
      dependants: dependants?.rowCount ?? 0,
    });

    return dependants ? { users, dependants } : { users };
  }

  private async readTable(path: string): Promise<Dataset> {
    const encoding: BufferEncoding = this.config.encoding === "latin1" ? "latin1" : "utf-8";
    const content = await readSourceFile(path, encoding);
    return parseDelimitedText(content, this.config.delimiter, path);
  }
}
