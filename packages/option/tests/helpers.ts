/**
 * Shared fixtures for instrument tests.
 */

import { EscrowAccount, InMemoryValueNetwork } from "@callvault/escrow";
import { InMemoryNotificationLog, createOptionCatalog } from "@callvault/notifications";
import { PRICE_SCALE } from "@callvault/ledger";
import { ManualClock } from "../src/clock.js";
import { unwrap } from "../src/errors.js";
import { OptionInstrument } from "../src/instrument.js";
import type { InstrumentParams } from "../src/types.js";

export const DAY = 86_400;
export const HOUR = 3_600;
export const START = 1_767_225_600; // 2026-01-01T00:00:00Z

export const ISSUER = "issuer";
export const HOLDER_A = "holder-a";
export const HOLDER_B = "holder-b";
export const ESCROW = "escrow";

export function testParams(overrides?: Partial<InstrumentParams>): InstrumentParams {
  return {
    name: "Test Call",
    symbol: "TCALL",
    strikePrice: 2n * PRICE_SCALE,
    expiration: START + 30 * DAY,
    collateralKind: { kind: "native" },
    issuer: ISSUER,
    ...overrides,
  };
}

export function setup(overrides?: Partial<InstrumentParams>) {
  const clock = new ManualClock(START);
  const network = new InMemoryValueNetwork();
  const escrow = new EscrowAccount(network.transport(ESCROW));
  const log = new InMemoryNotificationLog({ catalog: createOptionCatalog() });
  const params = testParams(overrides);
  const instrument = unwrap(OptionInstrument.create(params, { escrow, clock, notifications: log }));
  return { clock, network, escrow, log, params, instrument };
}

export type Fixture = ReturnType<typeof setup>;

/**
 * Fund `from` on the network and spend exactly `amount` as call value.
 */
export function pay(fixture: Fixture, from: string, amount: bigint): bigint {
  fixture.network.fund(from, amount);
  return fixture.network.spend(from, amount);
}

/**
 * Issue `amount` units as the issuer.
 */
export async function issued(fixture: Fixture, amount: bigint): Promise<void> {
  unwrap(await fixture.instrument.issue(ISSUER, { amount, value: pay(fixture, ISSUER, amount) }));
}
