/**
 * Core data model types for RecordShift
 * These structures flow through the pipeline: source → mapping → normalization → export
 */

/**
 * A single cell. Text columns hold strings (blank cells are ""), numeric
 * columns hold numbers (blank cells are NaN).
 */
export type CellValue = string | number;

export interface TextColumn {
  kind: "text";
  values: string[];
}

export interface NumericColumn {
  kind: "numeric";
  values: number[];
}

/**
 * Column type is decided once, at ingestion
 */
export type Column = TextColumn | NumericColumn;

/**
 * Dataset - ordered, named, equal-length columns
 */
export interface Dataset {
  readonly columns: ReadonlyMap<string, Column>;
  readonly rowCount: number;
}

/**
 * One exported row keyed by column name
 */
export type DataRecord = Record<string, CellValue>;

/**
 * Canonical user columns, in output order
 */
export const USER_FIELDS = [
  "id",
  "nome",
  "email",
  "telefone",
  "valor_total",
  "valor_com_desconto",
] as const;

export type UserField = (typeof USER_FIELDS)[number];

/**
 * Columns a user source must provide after renaming
 */
export const REQUIRED_USER_FIELDS = [
  "id",
  "nome",
  "email",
  "telefone",
  "valor_total",
] as const satisfies readonly UserField[];

/**
 * Derived by the normalizer, so never reported as missing
 */
export const SYNTHESIZED_USER_FIELDS = ["valor_com_desconto"] as const satisfies readonly UserField[];

/**
 * Discount percentage, consumed and replaced by valor_com_desconto
 */
export const DISCOUNT_FIELD = "desconto";

export const USER_MAPPING_TARGETS: readonly string[] = [...USER_FIELDS, DISCOUNT_FIELD];

/**
 * Canonical dependant columns
 */
export const DEPENDANT_FIELDS = [
  "id",
  "usuario_id",
  "dependente_de_id",
  "data_hora",
] as const;

/**
 * Source-native column name → canonical column name
 */
export type FieldMapping = Readonly<Record<string, string>>;

/**
 * Declared mapping tables for one source kind
 */
export interface SourceMappings {
  users: FieldMapping;
  /** Absent when the source has no dependant data to normalize */
  dependants?: FieldMapping;
}

/**
 * Raw datasets produced by a source adapter
 */
export interface LoadedSource {
  users: Dataset;
  dependants?: Dataset;
}

/**
 * Datasets after column renaming and validation
 */
export interface MappedSource {
  users: Dataset;
  dependants?: Dataset;
}
