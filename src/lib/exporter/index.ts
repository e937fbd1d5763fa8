/**
 * Exporter module - read-only views over a normalized dataset
 */

import { CellValue, Column, DataRecord, Dataset } from "../../types/data-model.js";
import { columnNames, createDataset, recordAt, rowAt } from "../dataset/index.js";
import { toDelimitedText } from "./delimited.js";

export * from "./delimited.js";

function freezeColumn(column: Column): Column {
  const copy: Column =
    column.kind === "text"
      ? { kind: "text", values: [...column.values] }
      : { kind: "numeric", values: [...column.values] };
  Object.freeze(copy.values);
  return Object.freeze(copy);
}

function freezeDataset(dataset: Dataset): Dataset {
  const frozen = createDataset(
    Array.from(dataset.columns, ([name, column]): [string, Column] => [name, freezeColumn(column)]),
  );
  return Object.freeze(frozen);
}

/**
 * RecordExporter exposes one dataset as records, rows or delimited text.
 * An absent dataset exports as [], [] and "".
 */
export class RecordExporter {
  private readonly dataset: Dataset | undefined;

  constructor(dataset?: Dataset) {
    this.dataset = dataset ? freezeDataset(dataset) : undefined;
  }

  get isPresent(): boolean {
    return this.dataset !== undefined;
  }

  get rowCount(): number {
    return this.dataset?.rowCount ?? 0;
  }

  columns(): string[] {
    return this.dataset ? columnNames(this.dataset) : [];
  }

  toRecords(): DataRecord[] {
    const dataset = this.dataset;
    if (!dataset) {
      return [];
    }
    return Array.from({ length: dataset.rowCount }, (_, row) => recordAt(dataset, row));
  }

  toRows(): CellValue[][] {
    const dataset = this.dataset;
    if (!dataset) {
      return [];
    }
    return Array.from({ length: dataset.rowCount }, (_, row) => rowAt(dataset, row));
  }

  toDelimited(): string {
    if (!this.dataset) {
      return "";
    }
    return toDelimitedText(this.columns(), this.toRows());
  }
}
