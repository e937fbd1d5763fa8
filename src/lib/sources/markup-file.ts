/**
 * Tagged markup (XML) source
 *
 * Expects one element per record under `recordPath`, each child element
 * holding one column:
 *
 *   <records>
 *     <record><user_id>1</user_id><name>Ana</name>...</record>
 *   </records>
 */

import { parseStringPromise } from "xml2js";
import { Column, Dataset, LoadedSource } from "../../types/data-model.js";
import { MarkupSourceConfig } from "../../types/config.js";
import { SourceReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { createDataset } from "../dataset/index.js";
import { readSourceFile } from "./file-utils.js";
import { SourceAdapter } from "./types.js";

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text content of a child element. Elements with attributes keep their text under "_".
 */
function toCellText(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (isXmlNode(value) && typeof value._ === "string") {
    return value._;
  }
  return JSON.stringify(value);
}

function findRecords(document: unknown, recordPath: readonly string[], path: string): XmlNode[] {
  let node: unknown = document;
  for (const key of recordPath) {
    if (!isXmlNode(node) || !(key in node)) {
      throw new SourceReadError(`Element <${key}> not found in ${path}`, {
        path,
        recordPath: [...recordPath],
      });
    }
    node = node[key];
  }

  const records = Array.isArray(node) ? node : [node];
  return records.map((record, index) => {
    if (!isXmlNode(record)) {
      throw new SourceReadError(`Record ${index} in ${path} has no fields`, { path, index });
    }
    return record;
  });
}

function toNumericColumn(values: string[], name: string, path: string): Column {
  return {
    kind: "numeric",
    values: values.map((raw, row) => {
      if (raw.trim() === "") {
        return Number.NaN;
      }
      const value = Number(raw);
      if (Number.isNaN(value)) {
        throw new SourceReadError(`Non-numeric value "${raw}" in ${name} (row ${row})`, {
          path,
          column: name,
          row,
        });
      }
      return value;
    }),
  };
}

/**
 * Parse a markup document into a dataset. Columns appear in first-seen order.
 */
export async function parseMarkupText(
  content: string,
  recordPath: readonly string[],
  numericColumns: readonly string[] = [],
  path = "<inline>",
): Promise<Dataset> {
  let document: unknown;
  try {
    document = await parseStringPromise(content, {
      explicitArray: false,
      trim: true,
      emptyTag: "",
    });
  } catch (error) {
    throw new SourceReadError(`Failed to parse markup file: ${path}`, { path }, { cause: error });
  }

  const records = findRecords(document, recordPath, path);

  const names: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (key !== "$" && !names.includes(key)) {
        names.push(key);
      }
    }
  }

  const numeric = new Set(numericColumns);
  return createDataset(
    names.map((name): [string, Column] => {
      const values = records.map((record) => toCellText(record[name]));
      return [name, numeric.has(name) ? toNumericColumn(values, name, path) : { kind: "text", values }];
    }),
  );
}

export class MarkupFileSource implements SourceAdapter {
  readonly kind = "markup";

  constructor(private readonly config: MarkupSourceConfig) {}

  get name(): string {
    return this.config.name;
  }

  inputFiles(): string[] {
    return [this.config.path];
  }

  async load(): Promise<LoadedSource> {
    const content = await readSourceFile(this.config.path);
    const users = await parseMarkupText(
      content,
      this.config.recordPath,
      this.config.numericColumns,
      this.config.path,
    );

    logger.info("Markup source loaded", { source: this.name, users: users.rowCount });
    return { users };
  }
}
