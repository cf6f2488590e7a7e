/**
 * @callvault/ledger: Fungible unit ledger and fixed-point arithmetic.
 *
 * A pure TypeScript balance ledger with zero runtime dependencies.
 * Enforces the conservation invariants the option core relies on:
 * - Total supply always equals the sum of holder balances
 * - Units appear only by mint and disappear only by burn
 * - Every movement is journalled and can be rolled back to a savepoint
 * - All arithmetic uses bigint (no floating point)
 */

// Core ledger
export { UnitLedger } from "./unit-ledger.js";

// Balance computation
export {
  computeBalances,
  computeSupplyDelta,
  checkSupply,
} from "./balance-calculator.js";

// Fixed-point arithmetic
export {
  PRICE_DECIMALS,
  PRICE_SCALE,
  parseAmount,
  formatAmount,
  parsePrice,
  formatPrice,
  mulDivDown,
} from "./fixed-point.js";

// Types
export type {
  UnitEntry,
  UnitEntryKind,
  MovementOptions,
  Savepoint,
  LedgerErrorCode,
  LedgerSnapshot,
  EntryFilter,
  SupplyCheck,
} from "./types.js";

export { LedgerError } from "./types.js";
