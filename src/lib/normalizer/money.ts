/**
 * Money and discount handling
 *
 * Values are kept as Decimal until they are rendered as text with a comma
 * decimal separator and two fraction digits.
 */

import { Decimal } from "decimal.js";
import { Column } from "../../types/data-model.js";
import { ConversionError } from "../../utils/errors.js";

const CURRENCY_MARKER = /^R\$\s*/i;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
// 100,00 or 1.234.567,89
const COMMA_DECIMAL_PATTERN = /^[+-]?(?:\d+|\d{1,3}(?:\.\d{3})+),\d+$/;
const NO_DISCOUNT_TOKEN = "-";
const ONE = new Decimal(1);
const HUNDRED = new Decimal(100);

/**
 * Parse a dot-decimal string; undefined when it is not a plain number
 */
export function parseDecimal(text: string): Decimal | undefined {
  const trimmed = text.trim();
  return DECIMAL_PATTERN.test(trimmed) ? new Decimal(trimmed) : undefined;
}

/**
 * Strip the currency marker and turn "1.234,56" into "1234.56".
 * Text without a comma is left as dot-decimal; any other use of the comma
 * is left in place so that parsing fails.
 */
export function cleanMoneyText(text: string): string {
  const cleaned = text.trim().replace(CURRENCY_MARKER, "").trim();
  if (!COMMA_DECIMAL_PATTERN.test(cleaned)) {
    return cleaned;
  }
  return cleaned.replace(/\./g, "").replace(",", ".");
}

/**
 * Parse money text such as "R$ 100,00", "99.9" or "1.234,56".
 * Undefined when blank or not a number.
 */
export function parseMoney(text: string): Decimal | undefined {
  return parseDecimal(cleanMoneyText(text));
}

export function formatMoney(value: Decimal | undefined): string {
  return value ? value.toFixed(2).replace(".", ",") : "";
}

/**
 * total * (1 - discount / 100)
 */
export function applyDiscount(total: Decimal, discountPercent: Decimal): Decimal {
  return total.times(ONE.minus(discountPercent.dividedBy(HUNDRED)));
}

/**
 * Read a money column. Blank cells become undefined.
 */
export function readMoneyColumn(column: Column, name: string): (Decimal | undefined)[] {
  if (column.kind === "numeric") {
    return column.values.map((value) => (Number.isNaN(value) ? undefined : new Decimal(value)));
  }

  return column.values.map((raw, row) => {
    if (raw.trim() === "") {
      return undefined;
    }
    const value = parseMoney(raw);
    if (!value) {
      throw new ConversionError(name, raw, row);
    }
    return value;
  });
}

/**
 * Read a discount percentage column. "-" and blank mean no discount.
 */
export function readDiscountColumn(column: Column, name: string): Decimal[] {
  if (column.kind === "numeric") {
    return column.values.map((value) => new Decimal(Number.isNaN(value) ? 0 : value));
  }

  return column.values.map((raw, row) => {
    const trimmed = raw.trim();
    if (trimmed === "" || trimmed === NO_DISCOUNT_TOKEN) {
      return new Decimal(0);
    }
    const value = parseDecimal(trimmed.replace(",", "."));
    if (!value) {
      throw new ConversionError(name, raw, row);
    }
    return value;
  });
}
