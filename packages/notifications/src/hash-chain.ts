/**
 * @callvault/notifications: Hash chain.
 *
 * Every entry commits to its predecessor:
 *
 *   hash(n) = sha256(JCS({ ...content(n), previousHash: hash(n - 1) }))
 *
 * with hash(0) = GENESIS_HASH. Editing, dropping or reordering any entry
 * breaks every link after it. JCS is RFC 8785 canonical JSON.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ChainVerification, EntryContent, LogEntry } from "./types.js";

export const GENESIS_HASH = "0".repeat(64);

export function hashEntry(content: EntryContent, previousHash: string): string {
  const canonical = canonicalize({
    streamId: content.streamId,
    sequence: content.sequence,
    position: content.position,
    notification: content.notification,
    previousHash,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * Walk `entries` in position order and report the first broken link.
 */
export function verifyChain(entries: readonly LogEntry[]): ChainVerification {
  let previousHash = GENESIS_HASH;
  let verified = 0;

  for (const entry of entries) {
    if (entry.position !== verified + 1) {
      return broken(verified, entry.position, `expected position ${String(verified + 1)}`);
    }
    if (entry.previousHash !== previousHash) {
      return broken(verified, entry.position, "previousHash does not match the preceding entry");
    }
    if (entry.hash !== hashEntry(entry, entry.previousHash)) {
      return broken(verified, entry.position, "hash does not match the entry content");
    }
    previousHash = entry.hash;
    verified++;
  }

  return { valid: true, verified };
}

function broken(verified: number, brokenAt: number, reason: string): ChainVerification {
  return { valid: false, verified, brokenAt, reason };
}
