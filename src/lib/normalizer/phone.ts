/**
 * Phone canonicalization to E.164
 */

import { parsePhoneNumberWithError, type CountryCode } from "libphonenumber-js";
import { Column } from "../../types/data-model.js";
import { PhoneFormatError } from "../../utils/errors.js";
import { cellToText } from "../dataset/index.js";

export const DEFAULT_PHONE_REGION: CountryCode = "BR";

/**
 * Format one phone number as E.164.
 * Blank input is returned as given; anything that does not parse to a
 * possible number throws PhoneFormatError.
 *
 * @example
 * formatPhone("(16) 98177-3421"); // "+5516981773421"
 */
export function formatPhone(
  value: string,
  region: CountryCode = DEFAULT_PHONE_REGION,
  row = 0,
): string {
  if (value.trim().length === 0) {
    return value;
  }

  let possible = false;
  let formatted = "";
  try {
    const phoneNumber = parsePhoneNumberWithError(value, region);
    possible = phoneNumber.isPossible();
    formatted = phoneNumber.number;
  } catch (error) {
    throw new PhoneFormatError(value, row, { cause: error });
  }

  if (!possible) {
    throw new PhoneFormatError(value, row);
  }
  return formatted;
}

/**
 * Format every cell of a phone column. Stops at the first invalid number.
 */
export function formatPhoneColumn(
  column: Column,
  region: CountryCode = DEFAULT_PHONE_REGION,
): Column {
  const values: string[] = [];
  for (let row = 0; row < column.values.length; row++) {
    values.push(formatPhone(cellToText(column.values[row] ?? ""), region, row));
  }
  return { kind: "text", values };
}
