/**
 * @callvault/option domain types.
 *
 * An instrument is a single-issuance call option backed by escrowed
 * native value:
 * - Parameters are fixed at construction
 * - State is the expired flag and the collateral counter
 * - Unit balances live in the unit ledger
 */

import type { Address, CollateralKind } from "@callvault/types";
import type { EscrowAccount } from "@callvault/escrow";
import type { NotificationLog } from "@callvault/notifications";
import type { LedgerSnapshot } from "@callvault/ledger";
import type { AccessPolicy } from "./access-policy.js";
import type { Clock } from "./clock.js";
import type { Logger } from "./logger.js";

// =============================================================================
// Parameters & state
// =============================================================================

export interface InstrumentParams {
  readonly name: string;
  readonly symbol: string;
  /** Collateral base units per option unit, scaled by PRICE_SCALE. */
  readonly strikePrice: bigint;
  /** Unix seconds. */
  readonly expiration: number;
  readonly collateralKind: CollateralKind;
  readonly issuer: Address;
}

export type LifecycleState = "active" | "expired";

export interface InstrumentState {
  expired: boolean;
  totalCollateralHeld: bigint;
}

/**
 * Collaborators supplied by the host. Only `escrow` is required.
 */
export interface InstrumentDeps {
  readonly escrow: EscrowAccount;
  readonly clock?: Clock | undefined;
  readonly notifications?: NotificationLog | undefined;
  readonly logger?: Logger | undefined;
  readonly accessPolicy?: AccessPolicy | undefined;
  /** Notification stream. Defaults to `option:<symbol>`. */
  readonly streamId?: string | undefined;
}

// =============================================================================
// Requests & receipts
// =============================================================================

export interface IssueRequest {
  readonly amount: bigint;
  /** Native value accompanying the call. */
  readonly value: bigint;
}

export interface ExerciseRequest {
  readonly unitAmount: bigint;
  /** Native value accompanying the call. */
  readonly value: bigint;
}

export interface IssueReceipt {
  readonly issuer: Address;
  readonly amount: bigint;
  readonly totalSupply: bigint;
  readonly totalCollateralHeld: bigint;
}

export interface ExerciseReceipt {
  readonly holder: Address;
  readonly unitAmount: bigint;
  readonly collateralReleased: bigint;
  readonly paymentTaken: bigint;
  readonly refund: bigint;
}

export interface ExpireReceipt {
  readonly issuer: Address;
  readonly collateralSwept: bigint;
}

export interface TransferReceipt {
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

// =============================================================================
// Queries
// =============================================================================

export interface InstrumentInfo {
  readonly name: string;
  readonly symbol: string;
  readonly issuer: Address;
  readonly strikePrice: bigint;
  readonly expiration: number;
  readonly collateralKind: CollateralKind;
  readonly totalSupply: bigint;
  readonly totalCollateralHeld: bigint;
  readonly expired: boolean;
  readonly canExercise: boolean;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * The entire durable state of an instrument. Amounts are decimal strings.
 */
export interface InstrumentSnapshot {
  readonly version: 1;
  readonly params: {
    readonly name: string;
    readonly symbol: string;
    readonly strikePrice: string;
    readonly expiration: number;
    readonly collateralKind: CollateralKind;
    readonly issuer: Address;
  };
  readonly state: {
    readonly expired: boolean;
    readonly totalCollateralHeld: string;
  };
  readonly units: LedgerSnapshot;
}
