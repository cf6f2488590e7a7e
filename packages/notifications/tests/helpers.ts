import type { Notification } from "@callvault/types";

let counter = 0;

export function makeNotification(
  type: string,
  payload: Readonly<Record<string, unknown>> = {},
): Notification {
  counter++;
  return {
    type,
    id: `n-${String(counter)}`,
    at: "2026-01-01T00:00:00.000Z",
    actor: "issuer",
    callId: `call-${String(counter)}`,
    source: "option",
    payload,
  };
}
