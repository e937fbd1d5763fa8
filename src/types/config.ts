/**
 * Configuration types for RecordShift
 *
 * The zod schemas are the single source of truth; the exported types are
 * inferred from them with defaults applied.
 */

import { z } from "zod";
import { isSupportedCountry, type CountryCode } from "libphonenumber-js";

export const fieldMappingSchema = z.record(z.string().min(1), z.string().min(1));

export const sourceMappingsSchema = z.object({
  users: fieldMappingSchema,
  dependants: fieldMappingSchema.optional(),
});

const sourceBase = {
  /** Also the prefix of the source's output files */
  name: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "Source names may only use letters, digits, '.', '_' and '-'"),
  /** Overrides the built-in mapping table for the source kind */
  mapping: sourceMappingsSchema.optional(),
};

export const delimitedSourceSchema = z.object({
  ...sourceBase,
  kind: z.literal("delimited"),
  path: z.string().min(1),
  dependantsPath: z.string().min(1).optional(),
  delimiter: z.string().length(1).default(";"),
  encoding: z.enum(["utf-8", "latin1"]).default("utf-8"),
});

export const markupSourceSchema = z.object({
  ...sourceBase,
  kind: z.literal("markup"),
  path: z.string().min(1),
  recordPath: z.array(z.string().min(1)).min(1).default(["records", "record"]),
  numericColumns: z.array(z.string().min(1)).default([]),
});

export const spreadsheetSourceSchema = z.object({
  ...sourceBase,
  kind: z.literal("spreadsheet"),
  spreadsheetId: z.string().min(1),
  usersSheet: z.string().min(1).default("usuarios"),
  /** null disables the dependants sheet */
  dependantsSheet: z.string().min(1).nullable().default("dependentes"),
  credentialsFile: z.string().min(1).default("credentials.json"),
});

export const sourceConfigSchema = z.discriminatedUnion("kind", [
  delimitedSourceSchema,
  markupSourceSchema,
  spreadsheetSourceSchema,
]);

export const normalizationConfigSchema = z.object({
  region: z
    .string()
    .refine((value): value is CountryCode => isSupportedCountry(value), {
      message: "Unsupported phone region",
    })
    .default("BR"),
  dayFirst: z.boolean().default(false),
});

export const outputFormatSchema = z.enum(["csv", "json", "ndjson"]);

export const outputConfigSchema = z.object({
  format: outputFormatSchema.default("csv"),
  /** Directory for output files; stdout when omitted */
  dir: z.string().min(1).optional(),
});

export const targetConfigSchema = z.object({
  uri: z.string().min(1),
  database: z.string().min(1),
  usersCollection: z.string().min(1).default("usuarios"),
  dependantsCollection: z.string().min(1).default("dependentes"),
  batchSize: z.number().int().positive().default(1000),
  orderedInserts: z.boolean().default(false),
});

export const migrationConfigSchema = z.object({
  sources: z
    .array(sourceConfigSchema)
    .min(1)
    .refine((sources) => new Set(sources.map((source) => source.name)).size === sources.length, {
      message: "Source names must be unique",
    }),
  normalization: normalizationConfigSchema.default({}),
  output: outputConfigSchema.default({}),
  target: targetConfigSchema.optional(),
  logLevel: z.enum(["error", "warn", "info", "debug"]).optional(),
});

export type DelimitedSourceConfig = z.infer<typeof delimitedSourceSchema>;
export type MarkupSourceConfig = z.infer<typeof markupSourceSchema>;
export type SpreadsheetSourceConfig = z.infer<typeof spreadsheetSourceSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type SourceKind = SourceConfig["kind"];
export type NormalizationConfig = z.infer<typeof normalizationConfigSchema>;
export type OutputFormat = z.infer<typeof outputFormatSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
export type TargetConfig = z.infer<typeof targetConfigSchema>;
export type MigrationConfig = z.infer<typeof migrationConfigSchema>;
