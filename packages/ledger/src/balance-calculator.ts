/**
 * @callvault/ledger: Balance calculation from the journal.
 *
 * Replays journal entries into a balance table. Used to cross-check the
 * ledger's incrementally maintained balances and to reconcile snapshots.
 *
 * Rules:
 * - Replay is deterministic: same entries → same balances
 * - Zero balances are omitted from the table
 */

import type { Address } from "@callvault/types";
import type { SupplyCheck, UnitEntry } from "./types.js";

/**
 * Replay entries into per-holder deltas, starting from `opening`.
 */
export function computeBalances(
  entries: readonly UnitEntry[],
  opening: ReadonlyMap<Address, bigint> = new Map(),
): Map<Address, bigint> {
  const balances = new Map<Address, bigint>(opening);

  const apply = (holder: Address, delta: bigint): void => {
    const next = (balances.get(holder) ?? 0n) + delta;
    if (next === 0n) {
      balances.delete(holder);
    } else {
      balances.set(holder, next);
    }
  };

  for (const entry of entries) {
    if (entry.from !== undefined) apply(entry.from, -entry.amount);
    if (entry.to !== undefined) apply(entry.to, entry.amount);
  }

  return balances;
}

/**
 * Net change in total supply produced by a list of entries.
 */
export function computeSupplyDelta(entries: readonly UnitEntry[]): bigint {
  let delta = 0n;
  for (const entry of entries) {
    if (entry.kind === "mint") delta += entry.amount;
    if (entry.kind === "burn") delta -= entry.amount;
  }
  return delta;
}

/**
 * Reconcile a balance table against a supply counter.
 */
export function checkSupply(
  balances: ReadonlyMap<Address, bigint>,
  totalSupply: bigint,
): SupplyCheck {
  let sumOfBalances = 0n;
  for (const balance of balances.values()) {
    sumOfBalances += balance;
  }
  return {
    totalSupply,
    sumOfBalances,
    balanced: sumOfBalances === totalSupply,
  };
}
