/**
 * @callvault/notifications: What an option instrument announces.
 *
 * Naming: `option.<past-tense verb>`. Amounts are base-unit decimal
 * strings so payloads stay JSON-safe and canonicalizable.
 */

import { z } from "zod";
import { NotificationCatalog } from "./catalog.js";

const address = z.string().min(1);
const amount = z.string().regex(/^\d+$/, "expected a base-unit decimal string");

export const IssuedPayload = z
  .object({ issuer: address, amount })
  .strict();

export const ExercisedPayload = z
  .object({
    holder: address,
    unitAmount: amount,
    collateralReleased: amount,
    paymentTaken: amount,
    refund: amount,
  })
  .strict();

export const ExpiredPayload = z
  .object({ issuer: address, collateralSwept: amount })
  .strict();

export const TransferredPayload = z
  .object({ from: address, to: address, amount })
  .strict();

export type IssuedPayload = z.infer<typeof IssuedPayload>;
export type ExercisedPayload = z.infer<typeof ExercisedPayload>;
export type ExpiredPayload = z.infer<typeof ExpiredPayload>;
export type TransferredPayload = z.infer<typeof TransferredPayload>;

export const OPTION_NOTIFICATIONS = {
  ISSUED: "option.issued",
  EXERCISED: "option.exercised",
  EXPIRED: "option.expired",
  TRANSFERRED: "option.transferred",
} as const;

export type OptionNotificationType =
  (typeof OPTION_NOTIFICATIONS)[keyof typeof OPTION_NOTIFICATIONS];

/**
 * A catalog holding the four option notification types.
 */
export function createOptionCatalog(): NotificationCatalog {
  const catalog = new NotificationCatalog();
  catalog.register({
    type: OPTION_NOTIFICATIONS.ISSUED,
    source: "option",
    description: "The issuer deposited collateral and received units",
    payload: IssuedPayload,
  });
  catalog.register({
    type: OPTION_NOTIFICATIONS.EXERCISED,
    source: "option",
    description: "A holder burned units, paid the strike and took collateral",
    payload: ExercisedPayload,
  });
  catalog.register({
    type: OPTION_NOTIFICATIONS.EXPIRED,
    source: "option",
    description: "The instrument closed and returned its collateral to the issuer",
    payload: ExpiredPayload,
  });
  catalog.register({
    type: OPTION_NOTIFICATIONS.TRANSFERRED,
    source: "ledger",
    description: "Units moved between holders",
    payload: TransferredPayload,
  });
  return catalog;
}
