/**
 * Address Types
 *
 * Identities of the parties that interact with an instrument:
 * the issuer, unit holders, and the escrow itself.
 *
 * Rules:
 * - Addresses are opaque strings; no checksum or chain semantics
 * - The empty string is never a valid address
 * - Comparison is exact (case-sensitive)
 */

/**
 * An opaque party identifier (wallet address, account ID, etc.).
 */
export type Address = string;

/**
 * A base-unit quantity of value or option units.
 * Always a non-negative integer; fixed-point scaling is explicit at the call site.
 */
export type Amount = bigint;

/**
 * Identifier of the resource backing an instrument.
 *
 * - native: the hosting environment's own value type
 * - asset: a foreign fungible asset (recognised, not yet supported)
 */
export type CollateralKind =
  | { readonly kind: "native" }
  | { readonly kind: "asset"; readonly assetId: string };
