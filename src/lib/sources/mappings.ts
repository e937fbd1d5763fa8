/**
 * Declared field-mapping tables, one per source kind
 */

import {
  DEPENDANT_FIELDS,
  FieldMapping,
  REQUIRED_USER_FIELDS,
  SourceMappings,
  USER_MAPPING_TARGETS,
} from "../../types/data-model.js";
import { SourceConfig, SourceKind } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";

export const DEFAULT_MAPPINGS: Readonly<Record<SourceKind, SourceMappings>> = {
  delimited: {
    users: {
      client_id: "id",
      username: "nome",
      email_client: "email",
      phone_client: "telefone",
      product_value: "valor_total",
      discount: "desconto",
    },
  },
  markup: {
    users: {
      user_id: "id",
      name: "nome",
      email_user: "email",
      phone: "telefone",
      buy_value: "valor_total",
    },
  },
  spreadsheet: {
    users: {
      id: "id",
      nome: "nome",
      email: "email",
      telefone: "telefone",
      valor: "valor_total",
      desconto: "desconto",
    },
    dependants: {
      id: "id",
      user_id: "usuario_id",
      dependente_id: "dependente_de_id",
      data_hora: "data_hora",
    },
  },
};

function checkTable(
  mapping: FieldMapping,
  label: string,
  required: readonly string[],
  allowed: readonly string[],
): void {
  const targets = Object.values(mapping);

  const unknown = targets.filter((target) => !allowed.includes(target));
  if (unknown.length > 0) {
    throw new ConfigError(`${label} mapping targets unknown columns: ${unknown.join(", ")}`, {
      unknown,
    });
  }

  const uncovered = required.filter((field) => !targets.includes(field));
  if (uncovered.length > 0) {
    throw new ConfigError(`${label} mapping does not cover: ${uncovered.join(", ")}`, {
      uncovered,
    });
  }

  const seen = new Set<string>();
  for (const target of targets) {
    if (seen.has(target)) {
      throw new ConfigError(`${label} mapping targets ${target} more than once`, { target });
    }
    seen.add(target);
  }
}

/**
 * Check a mapping table against the canonical schema
 */
export function validateMappingTable(mappings: SourceMappings, sourceName: string): void {
  checkTable(mappings.users, `Source ${sourceName}: user`, REQUIRED_USER_FIELDS, USER_MAPPING_TARGETS);
  if (mappings.dependants) {
    checkTable(
      mappings.dependants,
      `Source ${sourceName}: dependant`,
      DEPENDANT_FIELDS,
      DEPENDANT_FIELDS,
    );
  }
}

/**
 * The mapping a source runs with: its own override or the kind's default
 */
export function resolveMappings(source: SourceConfig): SourceMappings {
  const mappings = source.mapping ?? DEFAULT_MAPPINGS[source.kind];
  validateMappingTable(mappings, source.name);
  return mappings;
}
