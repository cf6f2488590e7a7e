/**
 * Configuration.
 *
 * Loads and validates instrument and runtime settings from environment
 * variables using Zod.
 */

import { z } from "zod";
import { parsePrice } from "@callvault/ledger";
import type { CollateralKind } from "@callvault/types";
import type { LoggerOptions } from "./logger.js";
import type { InstrumentParams } from "./types.js";

// =============================================================================
// Field parsers
// =============================================================================

/**
 * Unix seconds, or any ISO-8601 instant Date.parse understands.
 */
const Instant = z.string().transform((raw, ctx) => {
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid instant "${raw}": expected Unix seconds or ISO-8601`,
    });
    return z.NEVER;
  }
  return Math.floor(ms / 1000);
});

/**
 * "native" or "asset:<id>".
 */
const Collateral = z.string().transform((raw, ctx): CollateralKind => {
  const trimmed = raw.trim();
  if (trimmed === "native") {
    return { kind: "native" };
  }
  const match = /^asset:(.+)$/.exec(trimmed);
  if (match?.[1] !== undefined) {
    return { kind: "asset", assetId: match[1] };
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `Invalid collateral "${raw}": expected "native" or "asset:<id>"`,
  });
  return z.NEVER;
});

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Instrument
  OPTION_NAME: z.string().min(1),
  OPTION_SYMBOL: z.string().min(1),
  OPTION_STRIKE_PRICE: z
    .string()
    .regex(/^\d+(\.\d{1,18})?$/, "Strike price must be a decimal with at most 18 places"),
  OPTION_EXPIRATION: Instant,
  OPTION_COLLATERAL: Collateral.default("native"),
  OPTION_ISSUER: z.string().min(1),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Construction parameters described by a loaded configuration.
 * Range checks (positive strike, future expiry) happen at construction.
 */
export function instrumentParamsFromConfig(config: AppConfig): InstrumentParams {
  return {
    name: config.OPTION_NAME,
    symbol: config.OPTION_SYMBOL,
    strikePrice: parsePrice(config.OPTION_STRIKE_PRICE),
    expiration: config.OPTION_EXPIRATION,
    collateralKind: config.OPTION_COLLATERAL,
    issuer: config.OPTION_ISSUER,
  };
}

/**
 * Pretty output in development, JSON lines everywhere else.
 */
export function loggerOptionsFromConfig(config: AppConfig): LoggerOptions {
  return {
    level: config.LOG_LEVEL,
    pretty: config.NODE_ENV === "development",
  };
}
