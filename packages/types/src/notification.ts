/**
 * Notifications
 *
 * A committed state change of an instrument, announced to observers.
 *
 * Rules:
 * - Notifications are immutable facts
 * - Only committed calls produce them; a rolled-back call leaves none
 * - Amounts in payloads are base-unit decimal strings
 */

import type { Address } from "./address.js";

export type NotificationSource = "option" | "ledger" | "escrow";

export interface Notification<
  TPayload extends Readonly<Record<string, unknown>> = Readonly<Record<string, unknown>>,
> {
  /** Dotted type, e.g. "option.issued" */
  readonly type: string;

  readonly id: string;

  /** ISO 8601 instant taken from the instrument's clock */
  readonly at: string;

  /** The caller whose call produced this notification */
  readonly actor: Address;

  /** Shared by every notification and ledger entry of one call */
  readonly callId: string;

  readonly source: NotificationSource;

  readonly payload: TPayload;
}
