/**
 * Normalizer module - applies the value rules to mapped datasets
 *
 * Users: phone → discount → money formatting, in that order, since money
 * formatting turns numbers into display text.
 * Dependants: timestamp canonicalization.
 */

import { Decimal } from "decimal.js";
import {
  Column,
  DISCOUNT_FIELD,
  Dataset,
  MappedSource,
} from "../../types/data-model.js";
import { getColumn, hasColumn, replaceColumn, withColumn } from "../dataset/index.js";
import { logger } from "../../utils/logger.js";
import { NormalizerOptions, TimestampOptions } from "./types.js";
import { DEFAULT_PHONE_REGION, formatPhoneColumn } from "./phone.js";
import {
  applyDiscount,
  formatMoney,
  readDiscountColumn,
  readMoneyColumn,
} from "./money.js";
import { formatTimestamp } from "./timestamp.js";

export * from "./types.js";
export * from "./phone.js";
export * from "./money.js";
export * from "./timestamp.js";

function textColumn(values: string[]): Column {
  return { kind: "text", values };
}

export function normalizeUsers(users: Dataset, options: NormalizerOptions = {}): Dataset {
  let result = withColumn(
    users,
    "telefone",
    formatPhoneColumn(getColumn(users, "telefone"), options.region ?? DEFAULT_PHONE_REGION),
  );

  const totals = readMoneyColumn(getColumn(result, "valor_total"), "valor_total");

  if (hasColumn(result, DISCOUNT_FIELD)) {
    const discounts = readDiscountColumn(getColumn(result, DISCOUNT_FIELD), DISCOUNT_FIELD);
    const discounted = totals.map((total, row) =>
      total ? applyDiscount(total, discounts[row] ?? new Decimal(0)) : undefined,
    );
    result = replaceColumn(
      result,
      DISCOUNT_FIELD,
      "valor_com_desconto",
      textColumn(discounted.map(formatMoney)),
    );
  } else {
    result = withColumn(result, "valor_com_desconto", textColumn(totals.map(formatMoney)));
  }

  return withColumn(result, "valor_total", textColumn(totals.map(formatMoney)));
}

export function normalizeDependants(dependants: Dataset, options: TimestampOptions = {}): Dataset {
  const column = getColumn(dependants, "data_hora");
  const values: string[] = [];
  for (let row = 0; row < column.values.length; row++) {
    values.push(formatTimestamp(column.values[row] ?? "", options));
  }
  return withColumn(dependants, "data_hora", textColumn(values));
}

/**
 * Normalize a mapped source. Pure: no I/O beyond debug logging.
 */
export function normalize(mapped: MappedSource, options: NormalizerOptions = {}): MappedSource {
  logger.debug("Normalizing datasets", {
    users: mapped.users.rowCount,
    dependants: mapped.dependants?.rowCount ?? 0,
  });

  const users = normalizeUsers(mapped.users, options);
  if (!mapped.dependants) {
    return { users };
  }
  return { users, dependants: normalizeDependants(mapped.dependants, options) };
}
