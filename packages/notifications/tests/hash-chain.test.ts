/**
 * Tests for the notification hash chain.
 */

import { describe, it, expect } from "vitest";
import { GENESIS_HASH, hashEntry, verifyChain } from "../src/hash-chain.js";
import type { LogEntry } from "../src/types.js";
import { makeNotification } from "./helpers.js";

function chain(count: number): LogEntry[] {
  const entries: LogEntry[] = [];
  let previousHash = GENESIS_HASH;
  for (let i = 1; i <= count; i++) {
    const content = {
      notification: makeNotification("option.issued", { issuer: "issuer", amount: String(i) }),
      streamId: "option:TCALL",
      sequence: i,
      position: i,
    };
    const entry = { ...content, hash: hashEntry(content, previousHash), previousHash };
    entries.push(entry);
    previousHash = entry.hash;
  }
  return entries;
}

describe("hashEntry", () => {
  it("is deterministic", () => {
    const [entry] = chain(1);
    if (entry === undefined) throw new Error("empty chain");

    expect(hashEntry(entry, GENESIS_HASH)).toBe(entry.hash);
  });

  it("ignores property order in the payload", () => {
    const notification = makeNotification("t", { a: "1", b: "2" });
    const reordered = { ...notification, payload: { b: "2", a: "1" } };
    const base = { streamId: "s", sequence: 1, position: 1 };

    expect(hashEntry({ ...base, notification }, GENESIS_HASH)).toBe(
      hashEntry({ ...base, notification: reordered }, GENESIS_HASH),
    );
  });

  it("depends on the predecessor", () => {
    const [entry] = chain(1);
    if (entry === undefined) throw new Error("empty chain");

    expect(hashEntry(entry, "f".repeat(64))).not.toBe(entry.hash);
  });
});

describe("verifyChain", () => {
  it("accepts an intact chain", () => {
    expect(verifyChain(chain(3))).toEqual({ valid: true, verified: 3 });
  });

  it("finds an edited payload", () => {
    const entries = chain(3);
    const second = entries[1];
    if (second === undefined) throw new Error("short chain");
    entries[1] = {
      ...second,
      notification: { ...second.notification, payload: { issuer: "issuer", amount: "999" } },
    };

    expect(verifyChain(entries)).toEqual({
      valid: false,
      verified: 1,
      brokenAt: 2,
      reason: "hash does not match the entry content",
    });
  });

  it("finds a dropped entry", () => {
    const entries = chain(3);
    entries.splice(1, 1);

    expect(verifyChain(entries)).toEqual({
      valid: false,
      verified: 1,
      brokenAt: 3,
      reason: "expected position 2",
    });
  });

  it("finds a relinked entry", () => {
    const entries = chain(2);
    const second = entries[1];
    if (second === undefined) throw new Error("short chain");
    entries[1] = { ...second, previousHash: GENESIS_HASH };

    expect(verifyChain(entries)).toMatchObject({
      valid: false,
      brokenAt: 2,
      reason: "previousHash does not match the preceding entry",
    });
  });
});
