/**
 * Output writer - renders migration results to files or a text stream
 */

import { createWriteStream } from "fs";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { Readable, Writable } from "stream";
import { pipeline } from "stream/promises";
import type { OutputFormat } from "../../types/config.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { RecordExporter } from "../exporter/index.js";
import type { MigrationResult } from "../pipeline/index.js";
import { createNDJSONWriter } from "./ndjson-writer.js";
import { EmittedFile, EmitterOptions } from "./types.js";

export const DATASET_FILE_NAMES = {
  users: "usuarios",
  dependants: "dependentes",
} as const;

const BANNER = "=".repeat(40);
const SEPARATOR = "-".repeat(40);

/**
 * Whole dataset as one string in the given format
 */
export function renderDataset(exporter: RecordExporter, format: OutputFormat): string {
  switch (format) {
    case "csv":
      return exporter.toDelimited();
    case "json":
      return JSON.stringify(exporter.toRecords(), null, 2) + "\n";
    case "ndjson":
      return exporter
        .toRecords()
        .map((record) => JSON.stringify(record) + "\n")
        .join("");
  }
}

export async function writeDatasetFile(
  exporter: RecordExporter,
  format: OutputFormat,
  filePath: string,
): Promise<void> {
  try {
    if (format === "ndjson") {
      await pipeline(
        Readable.from(exporter.toRecords()),
        createNDJSONWriter(),
        createWriteStream(filePath, { encoding: "utf8" }),
      );
    } else {
      await writeFile(filePath, renderDataset(exporter, format), "utf8");
    }
  } catch (error) {
    throw new FileIOError(`Failed to write output file: ${filePath}`, { path: filePath }, { cause: error });
  }
}

/**
 * Write one source's datasets. With a directory, each present dataset gets
 * `<source>.<usuarios|dependentes>.<ext>`; otherwise both go to `out`.
 */
export async function emitResult(
  result: MigrationResult,
  options: EmitterOptions,
  out: Writable = process.stdout,
): Promise<EmittedFile[]> {
  if (!options.dir) {
    out.write(`${BANNER}\n\nSource: ${result.source} (${result.kind})\n\n`);
    out.write(renderDataset(result.users, options.format));
    out.write(`\n${SEPARATOR}\n`);
    out.write(renderDataset(result.dependants, options.format));
    out.write("\n");
    return [];
  }

  try {
    await mkdir(options.dir, { recursive: true });
  } catch (error) {
    throw new FileIOError(`Failed to create output directory: ${options.dir}`, { path: options.dir }, { cause: error });
  }

  const emitted: EmittedFile[] = [];
  const datasets = [
    ["users", result.users],
    ["dependants", result.dependants],
  ] as const;

  for (const [dataset, exporter] of datasets) {
    if (!exporter.isPresent) {
      continue;
    }
    const filePath = path.join(
      options.dir,
      `${result.source}.${DATASET_FILE_NAMES[dataset]}.${options.format}`,
    );
    await writeDatasetFile(exporter, options.format, filePath);
    emitted.push({ source: result.source, dataset, path: filePath, records: exporter.rowCount });
    logger.info("Output written", { path: filePath, records: exporter.rowCount });
  }

  return emitted;
}
