/**
 * @callvault/ledger: Internal types for the unit ledger.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@callvault/types";

// ─── Entry Types ─────────────────────────────────────────────────────────

/** The three ways unit balances can change. */
export type UnitEntryKind = "mint" | "burn" | "transfer";

/**
 * A single balance movement recorded in the journal.
 *
 * - mint: `to` credited, supply grows
 * - burn: `from` debited, supply shrinks
 * - transfer: `from` debited, `to` credited, supply unchanged
 */
export interface UnitEntry {
  readonly id: string;
  readonly kind: UnitEntryKind;
  readonly from?: Address | undefined;
  readonly to?: Address | undefined;
  readonly amount: bigint;
  /** Groups the entries produced by one instrument operation. */
  readonly correlationId: string;
  readonly timestamp: string;
}

/**
 * Options shared by mint, burn and transfer.
 */
export interface MovementOptions {
  readonly correlationId?: string | undefined;
  readonly timestamp?: string | undefined;
}

/**
 * A position in the journal that the ledger can be rolled back to.
 * Obtained from `savepoint()`, consumed by `rollbackTo()`. Positions count
 * every entry ever recorded, settled ones included.
 */
export interface Savepoint {
  readonly position: number;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_SAVEPOINT"
  | "SUPPLY_MISMATCH";

/**
 * Structured error from the ledger.
 * Always thrown: never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable durable state of the ledger: the balance table and the
 * supply counter. Amounts are decimal strings of base units.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly balances: Readonly<Record<Address, string>>;
  readonly totalSupply: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter criteria for querying journal entries.
 */
export interface EntryFilter {
  readonly kind?: UnitEntryKind | undefined;
  /** Matches entries where the holder is either side. */
  readonly holder?: Address | undefined;
  readonly correlationId?: string | undefined;
}

/**
 * Result of reconciling the balance table against the supply counter.
 */
export interface SupplyCheck {
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;
  readonly balanced: boolean;
}
