/**
 * @callvault/escrow: Custody of deposited native value.
 */

export { EscrowAccount } from "./escrow-account.js";
export type { EscrowAccountOptions } from "./escrow-account.js";

export { InMemoryValueNetwork } from "./value-network.js";

export type {
  ValueTransport,
  ReceiveHook,
  ReleaseResult,
  EscrowErrorCode,
} from "./types.js";

export { EscrowError } from "./types.js";
