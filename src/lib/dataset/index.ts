/**
 * Dataset helpers - construction, column access and row views
 *
 * Datasets are never mutated; every helper that changes columns returns a
 * new Dataset.
 */

import { CellValue, Column, DataRecord, Dataset } from "../../types/data-model.js";

/**
 * Build a dataset from named columns, checking they have equal lengths
 */
export function createDataset(columns: Iterable<[string, Column]>): Dataset {
  const map = new Map<string, Column>(columns);
  let rowCount: number | undefined;

  for (const [name, column] of map) {
    if (rowCount === undefined) {
      rowCount = column.values.length;
    } else if (column.values.length !== rowCount) {
      throw new Error(
        `Column ${name} has ${column.values.length} values, expected ${rowCount}`,
      );
    }
  }

  return { columns: map, rowCount: rowCount ?? 0 };
}

/**
 * Build a text-only dataset from a header and string rows.
 * Short rows are padded with "", extra cells are dropped.
 */
export function datasetFromRows(header: readonly string[], rows: readonly (readonly string[])[]): Dataset {
  return createDataset(
    header.map((name, index): [string, Column] => [
      name,
      { kind: "text", values: rows.map((row) => row[index] ?? "") },
    ]),
  );
}

export function emptyDataset(): Dataset {
  return { columns: new Map(), rowCount: 0 };
}

export function columnNames(dataset: Dataset): string[] {
  return Array.from(dataset.columns.keys());
}

export function hasColumn(dataset: Dataset, name: string): boolean {
  return dataset.columns.has(name);
}

export function getColumn(dataset: Dataset, name: string): Column {
  const column = dataset.columns.get(name);
  if (!column) {
    throw new Error(`Column not found: ${name}`);
  }
  return column;
}

/**
 * Replace a column in place (same position) or append it when new
 */
export function withColumn(dataset: Dataset, name: string, column: Column): Dataset {
  const columns = new Map(dataset.columns);
  columns.set(name, column);
  return createDataset(columns);
}

/**
 * Replace the column `from` with `column` under the name `to`, keeping its position
 */
export function replaceColumn(dataset: Dataset, from: string, to: string, column: Column): Dataset {
  const entries: [string, Column][] = [];
  for (const [name, existing] of dataset.columns) {
    if (name === from) {
      entries.push([to, column]);
    } else if (name !== to) {
      entries.push([name, existing]);
    }
  }
  return createDataset(entries);
}

export function cellAt(column: Column, row: number): CellValue {
  return column.values[row] ?? "";
}

/**
 * Text form of a cell; NaN (a blank numeric cell) is ""
 */
export function cellToText(value: CellValue): string {
  if (typeof value === "number") {
    return Number.isNaN(value) ? "" : String(value);
  }
  return value;
}

export function rowAt(dataset: Dataset, row: number): CellValue[] {
  return Array.from(dataset.columns.values(), (column) => cellAt(column, row));
}

export function recordAt(dataset: Dataset, row: number): DataRecord {
  const record: DataRecord = {};
  for (const [name, column] of dataset.columns) {
    record[name] = cellAt(column, row);
  }
  return record;
}
