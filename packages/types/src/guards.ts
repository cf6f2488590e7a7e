/**
 * Runtime Type Guards
 *
 * Narrowing at system boundaries: restored snapshots, notifications read
 * back from storage, values handed over by a host.
 */

import type { Address, CollateralKind } from "./address.js";
import type { Notification, NotificationSource } from "./notification.js";

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Zero or more base units. Negative bigints are not amounts.
 */
export function isAmount(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

/** Base units written out in decimal, as payloads and snapshots carry them. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isCollateralKind(value: unknown): value is CollateralKind {
  if (!isRecord(value)) return false;
  switch (value["kind"]) {
    case "native":
      return true;
    case "asset": {
      const assetId = value["assetId"];
      return typeof assetId === "string" && assetId.length > 0;
    }
    default:
      return false;
  }
}

const SOURCES: readonly NotificationSource[] = ["option", "ledger", "escrow"];

export function isNotificationSource(value: unknown): value is NotificationSource {
  return SOURCES.some((source) => source === value);
}

export function isNotification(value: unknown): value is Notification {
  if (!isRecord(value)) return false;
  return (
    typeof value["type"] === "string" &&
    typeof value["id"] === "string" &&
    typeof value["at"] === "string" &&
    isAddress(value["actor"]) &&
    typeof value["callId"] === "string" &&
    isNotificationSource(value["source"]) &&
    isRecord(value["payload"])
  );
}
