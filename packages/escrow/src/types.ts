/**
 * @callvault/escrow: Escrow types.
 *
 * The escrow holds deposited native value and is the only component that
 * releases value to an external recipient. How value actually moves is
 * the hosting environment's business, reached through a ValueTransport.
 */

import type { Address } from "@callvault/types";

// =============================================================================
// Transport
// =============================================================================

/**
 * Outbound value movement supplied by the hosting environment.
 *
 * `send` resolves when the recipient has the value and rejects when the
 * transfer did not complete. The recipient may run code on receipt,
 * including calls back into the instrument that owns the escrow.
 */
export interface ValueTransport {
  send(to: Address, amount: bigint): Promise<void>;
}

/** Hook run by a recipient when value arrives. Throwing refuses the value. */
export type ReceiveHook = (from: Address, amount: bigint) => void | Promise<void>;

// =============================================================================
// Release
// =============================================================================

/**
 * Outcome of a release. Never thrown; failures are values.
 */
export type ReleaseResult =
  | { readonly ok: true; readonly to: Address; readonly amount: bigint }
  | { readonly ok: false; readonly to: Address; readonly amount: bigint; readonly reason: string };

// =============================================================================
// Errors
// =============================================================================

export type EscrowErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_HOLDINGS"
  | "INSUFFICIENT_FUNDS";

/**
 * Thrown for caller mistakes (negative deposits, unwinding more than is
 * held). Transfer failures are reported through ReleaseResult instead.
 */
export class EscrowError extends Error {
  public readonly code: EscrowErrorCode;

  constructor(code: EscrowErrorCode, message: string) {
    super(message);
    this.name = "EscrowError";
    this.code = code;
  }
}
