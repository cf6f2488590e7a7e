/**
 * In-memory value network.
 *
 * A stand-in for the hosting environment's native value: per-address
 * balances plus optional receive hooks. Suitable for:
 * - Unit and integration tests
 * - Embedding the instrument in a single process
 *
 * Properties:
 * - A transfer credits the recipient, then runs its hook
 * - A hook that throws (or rejects) refuses the value and the credit is undone
 * - No durability guarantees
 */

import type { Address } from "@callvault/types";
import type { ReceiveHook, ValueTransport } from "./types.js";
import { EscrowError } from "./types.js";

export class InMemoryValueNetwork {
  private readonly _balances = new Map<Address, bigint>();
  private readonly _hooks = new Map<Address, ReceiveHook>();
  private readonly _refusing = new Set<Address>();

  /**
   * Create value out of nothing for `address` (test and genesis funding).
   */
  fund(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new EscrowError("INVALID_AMOUNT", "Funding cannot be negative");
    }
    this._balances.set(address, this.balanceOf(address) + amount);
  }

  /**
   * Take `amount` from `address` so it can accompany a call.
   * Returns the amount for convenient use as a call's `value`.
   */
  spend(address: Address, amount: bigint): bigint {
    const balance = this.balanceOf(address);
    if (amount < 0n) {
      throw new EscrowError("INVALID_AMOUNT", "Cannot spend a negative amount");
    }
    if (balance < amount) {
      throw new EscrowError(
        "INSUFFICIENT_FUNDS",
        `"${address}" has ${balance.toString()}, cannot spend ${amount.toString()}`,
      );
    }
    this._balances.set(address, balance - amount);
    return amount;
  }

  balanceOf(address: Address): bigint {
    return this._balances.get(address) ?? 0n;
  }

  /**
   * Run `hook` whenever `address` receives value.
   */
  onReceive(address: Address, hook: ReceiveHook): () => void {
    this._hooks.set(address, hook);
    return () => {
      if (this._hooks.get(address) === hook) {
        this._hooks.delete(address);
      }
    };
  }

  /**
   * Make every transfer to `address` fail (or succeed again).
   */
  setRefusing(address: Address, refusing: boolean): void {
    if (refusing) {
      this._refusing.add(address);
    } else {
      this._refusing.delete(address);
    }
  }

  /**
   * A transport that sends from `sender` (the escrow's own identity).
   */
  transport(sender: Address): ValueTransport {
    return {
      send: async (to, amount) => {
        await this.deliver(sender, to, amount);
      },
    };
  }

  private async deliver(from: Address, to: Address, amount: bigint): Promise<void> {
    if (this._refusing.has(to)) {
      throw new Error(`Recipient "${to}" refused the transfer`);
    }

    this._balances.set(to, this.balanceOf(to) + amount);

    const hook = this._hooks.get(to);
    if (hook === undefined) return;

    try {
      await hook(from, amount);
    } catch (err: unknown) {
      this._balances.set(to, this.balanceOf(to) - amount);
      throw err;
    }
  }
}
