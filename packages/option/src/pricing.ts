/**
 * Strike payment arithmetic.
 *
 * requiredPayment = unitAmount * strikePrice / PRICE_SCALE, truncating.
 * The same function backs both `quote` and `exercise`.
 */

import { PRICE_SCALE, mulDivDown } from "@callvault/ledger";

export function requiredPayment(unitAmount: bigint, strikePrice: bigint): bigint {
  return mulDivDown(unitAmount, strikePrice, PRICE_SCALE);
}
