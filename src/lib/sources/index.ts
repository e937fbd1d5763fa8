/**
 * Sources module - adapters that turn files and sheets into raw datasets
 */

import { SourceConfig } from "../../types/config.js";
import { DelimitedFileSource } from "./delimited-file.js";
import { MarkupFileSource } from "./markup-file.js";
import { SheetValuesFetcherFactory, SpreadsheetApiSource } from "./spreadsheet-api.js";
import { SourceAdapter } from "./types.js";

export * from "./types.js";
export * from "./file-utils.js";
export * from "./delimited-file.js";
export * from "./markup-file.js";
export * from "./spreadsheet-api.js";
export * from "./mappings.js";

export interface SourceAdapterDeps {
  sheetsFetcherFactory?: SheetValuesFetcherFactory;
}

export function createSourceAdapter(config: SourceConfig, deps: SourceAdapterDeps = {}): SourceAdapter {
  switch (config.kind) {
    case "delimited":
      return new DelimitedFileSource(config);
    case "markup":
      return new MarkupFileSource(config);
    case "spreadsheet":
      return new SpreadsheetApiSource(config, deps.sheetsFetcherFactory);
  }
}
