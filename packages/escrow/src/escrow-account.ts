/**
 * Escrow Account: custody of deposited native value.
 *
 * Rules:
 * - Holdings only grow through deposit()
 * - Holdings only shrink through release() or revertDeposit()
 * - release() never throws; a failed transfer leaves holdings untouched
 * - The escrow knows nothing about option units or strike prices
 */

import type { Address } from "@callvault/types";
import type { ReleaseResult, ValueTransport } from "./types.js";
import { EscrowError } from "./types.js";

export interface EscrowAccountOptions {
  /** Holdings carried over from a previous process (host-reported balance). */
  readonly openingHoldings?: bigint | undefined;
}

export class EscrowAccount {
  private readonly transport: ValueTransport;
  private _holdings: bigint;

  constructor(transport: ValueTransport, options?: EscrowAccountOptions) {
    const opening = options?.openingHoldings ?? 0n;
    if (opening < 0n) {
      throw new EscrowError("INVALID_AMOUNT", "Opening holdings cannot be negative");
    }
    this.transport = transport;
    this._holdings = opening;
  }

  /**
   * Accept value that accompanied a call.
   */
  deposit(amount: bigint): void {
    if (amount < 0n) {
      throw new EscrowError(
        "INVALID_AMOUNT",
        `Deposit cannot be negative, got ${amount.toString()}`,
      );
    }
    this._holdings += amount;
  }

  /**
   * Unwind part of a deposit whose enclosing call aborted. The host returns
   * that value to the caller along with the aborted call.
   */
  revertDeposit(amount: bigint): void {
    if (amount < 0n) {
      throw new EscrowError(
        "INVALID_AMOUNT",
        `Cannot revert a negative deposit, got ${amount.toString()}`,
      );
    }
    if (amount > this._holdings) {
      throw new EscrowError(
        "INSUFFICIENT_HOLDINGS",
        `Cannot revert ${amount.toString()}, escrow holds ${this._holdings.toString()}`,
      );
    }
    this._holdings -= amount;
  }

  /**
   * Send `amount` to `to`. A zero release succeeds without a transfer.
   *
   * Holdings are debited before the transfer and restored if it fails,
   * so a recipient that calls back in observes the debited holdings.
   */
  async release(to: Address, amount: bigint): Promise<ReleaseResult> {
    if (amount < 0n) {
      return { ok: false, to, amount, reason: "Release amount cannot be negative" };
    }
    if (amount === 0n) {
      return { ok: true, to, amount };
    }
    if (amount > this._holdings) {
      return {
        ok: false,
        to,
        amount,
        reason: `Escrow holds ${this._holdings.toString()}, cannot release ${amount.toString()}`,
      };
    }

    this._holdings -= amount;
    try {
      await this.transport.send(to, amount);
      return { ok: true, to, amount };
    } catch (err: unknown) {
      this._holdings += amount;
      return {
        ok: false,
        to,
        amount,
        reason: err instanceof Error ? err.message : String(err),
      };
    }
  }

  /**
   * Raw holdings, including value the instrument does not account for.
   */
  holdings(): bigint {
    return this._holdings;
  }
}
