/**
 * Schema mapper - renames source-native columns to canonical names and
 * checks that the canonical columns are present before any row is touched
 */

import {
  Column,
  DEPENDANT_FIELDS,
  Dataset,
  FieldMapping,
  LoadedSource,
  MappedSource,
  REQUIRED_USER_FIELDS,
  SYNTHESIZED_USER_FIELDS,
  SourceMappings,
} from "../../types/data-model.js";
import { createDataset, hasColumn } from "../dataset/index.js";
import { ConfigError, SchemaValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Rename columns per the mapping. Order is kept; unmapped columns are untouched.
 * Two columns ending up with the same name is a ConfigError.
 */
export function renameColumns(dataset: Dataset, mapping: FieldMapping): Dataset {
  const renamedFrom = new Map<string, string>();
  const columns = Array.from(dataset.columns, ([name, column]): [string, Column] => {
    const target = Object.hasOwn(mapping, name) ? (mapping[name] ?? name) : name;
    const previous = renamedFrom.get(target);
    if (previous !== undefined) {
      throw new ConfigError(`Columns ${previous} and ${name} would both be named ${target}`, {
        column: target,
        sources: [previous, name],
      });
    }
    renamedFrom.set(target, name);
    return [target, column];
  });
  return createDataset(columns);
}

/**
 * (declared targets ∪ required) − present − synthesized, sorted
 */
export function findMissingColumns(
  dataset: Dataset,
  mapping: FieldMapping,
  required: readonly string[],
  synthesized: readonly string[] = [],
): string[] {
  const expected = new Set([...Object.values(mapping), ...required]);
  for (const name of synthesized) {
    expected.delete(name);
  }
  return Array.from(expected)
    .filter((name) => !hasColumn(dataset, name))
    .sort();
}

export function mapUsers(dataset: Dataset, mapping: FieldMapping): Dataset {
  const renamed = renameColumns(dataset, mapping);
  const missing = findMissingColumns(
    renamed,
    mapping,
    REQUIRED_USER_FIELDS,
    SYNTHESIZED_USER_FIELDS,
  );
  if (missing.length > 0) {
    throw new SchemaValidationError("users", missing);
  }
  return renamed;
}

export function mapDependants(dataset: Dataset, mapping: FieldMapping): Dataset {
  const renamed = renameColumns(dataset, mapping);
  const missing = findMissingColumns(renamed, mapping, DEPENDANT_FIELDS);
  if (missing.length > 0) {
    throw new SchemaValidationError("dependants", missing);
  }
  return renamed;
}

/**
 * Map both datasets of a source. Users are validated first; dependants only
 * when the source declares a dependant mapping.
 */
export function mapDatasets(loaded: LoadedSource, mappings: SourceMappings): MappedSource {
  const users = mapUsers(loaded.users, mappings.users);

  if (!loaded.dependants) {
    return { users };
  }

  if (!mappings.dependants) {
    logger.warn("Dependant data ignored: no dependant mapping declared", {
      rows: loaded.dependants.rowCount,
    });
    return { users };
  }

  return { users, dependants: mapDependants(loaded.dependants, mappings.dependants) };
}
