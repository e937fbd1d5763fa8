/**
 * Source adapter types
 */

import type { LoadedSource } from "../../types/data-model.js";
import type { SourceKind } from "../../types/config.js";

/**
 * A pluggable reader yielding raw datasets with source-native column names.
 * Each load() call produces a fresh pair of datasets.
 */
export interface SourceAdapter {
  readonly name: string;
  readonly kind: SourceKind;
  load(): Promise<LoadedSource>;
  /** Local files read by load(), for the run report */
  inputFiles(): string[];
}
