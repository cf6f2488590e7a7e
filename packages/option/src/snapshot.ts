/**
 * Snapshot validation for restoring instruments from persisted state.
 */

import { z } from "zod";
import type { InstrumentSnapshot } from "./types.js";

const AmountString = z.string().regex(/^\d+$/, "Expected a base-unit decimal string");

const CollateralKindSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("native") }),
  z.object({ kind: z.literal("asset"), assetId: z.string().min(1) }),
]);

export const InstrumentSnapshotSchema = z.object({
  version: z.literal(1),
  params: z.object({
    name: z.string().min(1),
    symbol: z.string().min(1),
    strikePrice: AmountString,
    expiration: z.number().int(),
    collateralKind: CollateralKindSchema,
    issuer: z.string().min(1),
  }),
  state: z.object({
    expired: z.boolean(),
    totalCollateralHeld: AmountString,
  }),
  units: z.object({
    version: z.literal(1),
    balances: z.record(AmountString),
    totalSupply: AmountString,
  }),
});

export type SnapshotParseResult =
  | { readonly success: true; readonly snapshot: InstrumentSnapshot }
  | { readonly success: false; readonly message: string };

export function parseSnapshot(input: unknown): SnapshotParseResult {
  const parsed = InstrumentSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return { success: false, message };
  }
  return { success: true, snapshot: parsed.data };
}
