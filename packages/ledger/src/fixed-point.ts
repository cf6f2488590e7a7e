/**
 * @callvault/ledger: Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Prices carry an explicit scale factor of
 * 10^18; base-unit amounts carry none.
 *
 * Rules:
 * - No floating-point operations
 * - Division truncates toward zero, never rounds up
 * - Amounts in text form are plain decimal strings
 */

import { LedgerError } from "./types.js";

/** Decimal places carried by a fixed-point price. */
export const PRICE_DECIMALS = 18;

/** Denominator of every fixed-point price. */
export const PRICE_SCALE = 10n ** BigInt(PRICE_DECIMALS);

/**
 * Parse a decimal string into a bigint scaled by `decimals`.
 *
 * "2" with decimals=18 → 2000000000000000000n
 * "0.5" with decimals=2 → 50n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but at most ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 2000000000000000000n with decimals=18 → "2.000000000000000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Parse a human-readable price ("2", "0.15") into its fixed-point form.
 */
export function parsePrice(price: string): bigint {
  return parseAmount(price, PRICE_DECIMALS);
}

/**
 * Format a fixed-point price without trailing zeros ("2", "0.15").
 */
export function formatPrice(price: bigint): string {
  const full = formatAmount(price, PRICE_DECIMALS);
  return full.replace(/\.?0+$/, "");
}

/**
 * Compute `a * b / denominator` with truncating division.
 *
 * Operands must be non-negative, so truncation is toward zero and the
 * result never exceeds the exact quotient.
 */
export function mulDivDown(a: bigint, b: bigint, denominator: bigint): bigint {
  if (a < 0n || b < 0n) {
    throw new LedgerError("INVALID_AMOUNT", "mulDivDown operands must be non-negative");
  }
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", "mulDivDown denominator must be positive");
  }
  return (a * b) / denominator;
}
