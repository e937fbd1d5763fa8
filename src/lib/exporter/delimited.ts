/**
 * Delimited text rendering (header row, no index column, "\n" line endings)
 */

import { CellValue } from "../../types/data-model.js";
import { cellToText } from "../dataset/index.js";

export const DEFAULT_SEPARATOR = ",";

/**
 * Quote a cell when it holds the separator, a quote or a line break
 */
export function quoteCell(value: CellValue, separator: string = DEFAULT_SEPARATOR): string {
  const text = cellToText(value);
  if (text.includes(separator) || /["\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatDelimitedLine(
  cells: readonly CellValue[],
  separator: string = DEFAULT_SEPARATOR,
): string {
  return cells.map((cell) => quoteCell(cell, separator)).join(separator);
}

export function toDelimitedText(
  header: readonly string[],
  rows: readonly (readonly CellValue[])[],
  separator: string = DEFAULT_SEPARATOR,
): string {
  const lines = [header, ...rows].map((cells) => formatDelimitedLine(cells, separator));
  return lines.map((line) => `${line}\n`).join("");
}
