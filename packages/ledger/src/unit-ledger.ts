/**
 * @callvault/ledger: Fungible unit ledger.
 *
 * Tracks per-holder unit balances and the total supply. Every movement
 * is recorded in an in-memory journal; the journal is what makes
 * savepoint rollback possible. settle() drops entries no caller will roll
 * back, so the journal only grows between settlements.
 *
 * API surface:
 * - mint() / burn() / transfer(): the only balance-changing operations
 * - balanceOf() / totalSupply: queries
 * - savepoint() / rollbackTo() / settle(): all-or-nothing support for callers
 * - snapshot() / fromSnapshot(): durable state (balances + supply)
 *
 * Conservation: totalSupply always equals the sum of balances.
 */

import type { Address } from "@callvault/types";
import { isAddress } from "@callvault/types";
import { checkSupply } from "./balance-calculator.js";
import { parseAmount } from "./fixed-point.js";
import type {
  EntryFilter,
  LedgerSnapshot,
  MovementOptions,
  Savepoint,
  SupplyCheck,
  UnitEntry,
  UnitEntryKind,
} from "./types.js";
import { LedgerError } from "./types.js";

export class UnitLedger {
  private readonly _balances = new Map<Address, bigint>();
  private readonly _journal: UnitEntry[] = [];
  /** Entries settled out of the journal so far. */
  private _settled = 0;
  private _totalSupply = 0n;
  private _nextEntryId = 1;

  // ─── Movements ───────────────────────────────────────────────────────

  /**
   * Create `amount` new units and credit them to `to`.
   */
  mint(to: Address, amount: bigint, options?: MovementOptions): UnitEntry {
    this._assertAddress(to);
    this._assertPositive(amount);

    const entry = this._record("mint", undefined, to, amount, options);
    this._credit(to, amount);
    this._totalSupply += amount;
    return entry;
  }

  /**
   * Destroy `amount` units held by `from`.
   * Throws INSUFFICIENT_BALANCE if `from` holds fewer.
   */
  burn(from: Address, amount: bigint, options?: MovementOptions): UnitEntry {
    this._assertAddress(from);
    this._assertPositive(amount);
    this._assertCovered(from, amount);

    const entry = this._record("burn", from, undefined, amount, options);
    this._debit(from, amount);
    this._totalSupply -= amount;
    return entry;
  }

  /**
   * Move `amount` units from one holder to another. Supply is unchanged.
   */
  transfer(
    from: Address,
    to: Address,
    amount: bigint,
    options?: MovementOptions,
  ): UnitEntry {
    this._assertAddress(from);
    this._assertAddress(to);
    this._assertPositive(amount);
    this._assertCovered(from, amount);

    const entry = this._record("transfer", from, to, amount, options);
    this._debit(from, amount);
    this._credit(to, amount);
    return entry;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(holder: Address): bigint {
    return this._balances.get(holder) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  /**
   * All holders with a non-zero balance.
   */
  holders(): ReadonlyMap<Address, bigint> {
    return new Map(this._balances);
  }

  getEntries(filter?: EntryFilter): readonly UnitEntry[] {
    if (filter === undefined) {
      return [...this._journal];
    }

    return this._journal.filter((entry) => {
      if (filter.kind !== undefined && entry.kind !== filter.kind) {
        return false;
      }
      if (
        filter.holder !== undefined &&
        entry.from !== filter.holder &&
        entry.to !== filter.holder
      ) {
        return false;
      }
      if (filter.correlationId !== undefined && entry.correlationId !== filter.correlationId) {
        return false;
      }
      return true;
    });
  }

  /** Entries still held in the journal. */
  get entryCount(): number {
    return this._journal.length;
  }

  /**
   * Reconcile the balance table against the supply counter.
   */
  checkSupply(): SupplyCheck {
    return checkSupply(this._balances, this._totalSupply);
  }

  // ─── Rollback ────────────────────────────────────────────────────────

  /**
   * Mark the current journal position.
   */
  savepoint(): Savepoint {
    return { position: this._settled + this._journal.length };
  }

  /**
   * Undo every movement recorded after `savepoint`, newest first.
   * The undone entries leave the journal as if they never happened.
   * Throws INVALID_SAVEPOINT for a position already settled or not yet
   * reached.
   */
  rollbackTo(savepoint: Savepoint): void {
    const end = this._settled + this._journal.length;
    if (
      !Number.isInteger(savepoint.position) ||
      savepoint.position < this._settled ||
      savepoint.position > end
    ) {
      throw new LedgerError(
        "INVALID_SAVEPOINT",
        `Savepoint at ${String(savepoint.position)} is outside the journal (positions ${String(this._settled)} to ${String(end)})`,
      );
    }

    while (this._settled + this._journal.length > savepoint.position) {
      const entry = this._journal.pop();
      if (entry === undefined) break;

      switch (entry.kind) {
        case "mint":
          if (entry.to !== undefined) this._debit(entry.to, entry.amount);
          this._totalSupply -= entry.amount;
          break;
        case "burn":
          if (entry.from !== undefined) this._credit(entry.from, entry.amount);
          this._totalSupply += entry.amount;
          break;
        case "transfer":
          if (entry.to !== undefined) this._debit(entry.to, entry.amount);
          if (entry.from !== undefined) this._credit(entry.from, entry.amount);
          break;
      }
    }
  }

  /**
   * Drop every journal entry recorded so far. Balances and supply are
   * untouched; savepoints taken before this call can no longer be rolled
   * back to. Returns the number of entries dropped.
   */
  settle(): number {
    const dropped = this._journal.length;
    this._settled += dropped;
    this._journal.length = 0;
    return dropped;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Serialize the durable state: balance table and supply counter.
   * The journal is working history and is not part of the snapshot.
   */
  snapshot(): LedgerSnapshot {
    const balances: Record<Address, string> = {};
    for (const [holder, balance] of this._balances) {
      balances[holder] = balance.toString();
    }
    return {
      version: 1,
      balances,
      totalSupply: this._totalSupply.toString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Throws SUPPLY_MISMATCH if the balances do not add up to the supply.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): UnitLedger {
    const ledger = new UnitLedger();
    const opening = new Map<Address, bigint>();

    for (const [holder, raw] of Object.entries(snapshot.balances)) {
      ledger._assertAddress(holder);
      const balance = parseAmount(raw, 0);
      if (balance < 0n) {
        throw new LedgerError("INVALID_AMOUNT", `Negative balance for "${holder}"`);
      }
      if (balance > 0n) opening.set(holder, balance);
    }

    const totalSupply = parseAmount(snapshot.totalSupply, 0);
    const check = checkSupply(opening, totalSupply);
    if (!check.balanced) {
      throw new LedgerError(
        "SUPPLY_MISMATCH",
        `Balances sum to ${check.sumOfBalances.toString()} but supply is ${totalSupply.toString()}`,
      );
    }

    for (const [holder, balance] of opening) {
      ledger._balances.set(holder, balance);
    }
    ledger._totalSupply = totalSupply;
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _record(
    kind: UnitEntryKind,
    from: Address | undefined,
    to: Address | undefined,
    amount: bigint,
    options: MovementOptions | undefined,
  ): UnitEntry {
    const id = `entry-${String(this._nextEntryId++)}`;
    const entry: UnitEntry = {
      id,
      kind,
      from,
      to,
      amount,
      correlationId: options?.correlationId ?? id,
      timestamp: options?.timestamp ?? new Date().toISOString(),
    };
    this._journal.push(entry);
    return entry;
  }

  private _credit(holder: Address, amount: bigint): void {
    this._balances.set(holder, this.balanceOf(holder) + amount);
  }

  private _debit(holder: Address, amount: bigint): void {
    const next = this.balanceOf(holder) - amount;
    if (next === 0n) {
      this._balances.delete(holder);
    } else {
      this._balances.set(holder, next);
    }
  }

  private _assertAddress(holder: Address): void {
    if (!isAddress(holder)) {
      throw new LedgerError("INVALID_ADDRESS", `Invalid holder address: "${String(holder)}"`);
    }
  }

  private _assertPositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Unit amounts must be positive, got ${amount.toString()}`,
      );
    }
  }

  private _assertCovered(holder: Address, amount: bigint): void {
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `"${holder}" holds ${balance.toString()} units, cannot move ${amount.toString()}`,
      );
    }
  }
}
