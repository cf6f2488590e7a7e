/**
 * Access policy: the authorization gate for privileged transitions
 * (issue and expire).
 */

import type { Address } from "@callvault/types";

/**
 * Must authorize the instrument's configured issuer. Any other address it
 * admits may issue, but units it mints go to that caller while the
 * collateral swept at expiry always goes to the configured issuer.
 */
export interface AccessPolicy {
  isIssuer(caller: Address): boolean;
}

/**
 * Exactly one address may issue and expire.
 */
export class SingleIssuerPolicy implements AccessPolicy {
  private readonly issuer: Address;

  constructor(issuer: Address) {
    this.issuer = issuer;
  }

  isIssuer(caller: Address): boolean {
    return caller === this.issuer;
  }
}
