/**
 * Normalizer module types
 */

import type { CountryCode } from "libphonenumber-js";

export interface TimestampOptions {
  /** Read ambiguous NN/NN/YYYY dates as day/month instead of month/day */
  dayFirst?: boolean;
}

export interface NormalizerOptions extends TimestampOptions {
  /** Region used for phone numbers written without a country code */
  region?: CountryCode;
}
