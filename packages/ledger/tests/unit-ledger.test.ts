/**
 * Tests for the UnitLedger class.
 *
 * Covers:
 * - Mint, burn and transfer
 * - Balance and supply conservation
 * - Validation (amounts, addresses, insufficient balance)
 * - Journal queries
 * - Savepoint rollback
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { UnitLedger } from "../src/unit-ledger.js";
import { LedgerError } from "../src/types.js";

const TS = "2026-03-01T00:00:00.000Z";

describe("UnitLedger", () => {
  let ledger: UnitLedger;

  beforeEach(() => {
    ledger = new UnitLedger();
  });

  // ─── Mint ────────────────────────────────────────────────────────────

  describe("mint", () => {
    it("credits the holder and grows supply", () => {
      ledger.mint("issuer", 10n);

      expect(ledger.balanceOf("issuer")).toBe(10n);
      expect(ledger.totalSupply).toBe(10n);
    });

    it("records a mint entry with the given correlation and timestamp", () => {
      const entry = ledger.mint("issuer", 10n, { correlationId: "issue-1", timestamp: TS });

      expect(entry).toEqual({
        id: "entry-1",
        kind: "mint",
        from: undefined,
        to: "issuer",
        amount: 10n,
        correlationId: "issue-1",
        timestamp: TS,
      });
    });

    it("defaults the correlation ID to the entry ID", () => {
      const entry = ledger.mint("issuer", 1n);
      expect(entry.correlationId).toBe("entry-1");
    });

    it("rejects zero and negative amounts", () => {
      expect(() => ledger.mint("issuer", 0n)).toThrow(LedgerError);
      expect(() => ledger.mint("issuer", -1n)).toThrow(/must be positive/);
    });

    it("rejects an empty address", () => {
      try {
        ledger.mint("", 1n);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(LedgerError);
        expect(err).toMatchObject({ code: "INVALID_ADDRESS" });
      }
    });
  });

  // ─── Burn ────────────────────────────────────────────────────────────

  describe("burn", () => {
    it("debits the holder and shrinks supply", () => {
      ledger.mint("issuer", 10n);
      ledger.burn("issuer", 4n);

      expect(ledger.balanceOf("issuer")).toBe(6n);
      expect(ledger.totalSupply).toBe(6n);
    });

    it("drops holders whose balance reaches zero", () => {
      ledger.mint("issuer", 3n);
      ledger.burn("issuer", 3n);

      expect(ledger.holders().size).toBe(0);
      expect(ledger.balanceOf("issuer")).toBe(0n);
    });

    it("throws INSUFFICIENT_BALANCE when burning more than held", () => {
      ledger.mint("issuer", 2n);

      try {
        ledger.burn("issuer", 3n);
        expect.unreachable();
      } catch (err) {
        expect(err).toMatchObject({ code: "INSUFFICIENT_BALANCE" });
      }
      expect(ledger.balanceOf("issuer")).toBe(2n);
      expect(ledger.entryCount).toBe(1);
    });
  });

  // ─── Transfer ────────────────────────────────────────────────────────

  describe("transfer", () => {
    it("moves units without changing supply", () => {
      ledger.mint("issuer", 10n);
      ledger.transfer("issuer", "alice", 3n);

      expect(ledger.balanceOf("issuer")).toBe(7n);
      expect(ledger.balanceOf("alice")).toBe(3n);
      expect(ledger.totalSupply).toBe(10n);
    });

    it("allows a self-transfer", () => {
      ledger.mint("issuer", 5n);
      ledger.transfer("issuer", "issuer", 5n);

      expect(ledger.balanceOf("issuer")).toBe(5n);
    });

    it("throws when the sender lacks units", () => {
      ledger.mint("issuer", 1n);
      expect(() => ledger.transfer("issuer", "alice", 2n)).toThrow(/holds 1 units/);
    });

    it("rejects an invalid recipient", () => {
      ledger.mint("issuer", 1n);
      expect(() => ledger.transfer("issuer", " ", 1n)).toThrow(/Invalid holder address/);
    });
  });

  // ─── Queries ─────────────────────────────────────────────────────────

  describe("getEntries", () => {
    beforeEach(() => {
      ledger.mint("issuer", 10n, { correlationId: "c1" });
      ledger.transfer("issuer", "alice", 3n, { correlationId: "c2" });
      ledger.burn("alice", 1n, { correlationId: "c3" });
    });

    it("returns all entries without a filter", () => {
      expect(ledger.getEntries().map((e) => e.kind)).toEqual(["mint", "transfer", "burn"]);
    });

    it("filters by kind", () => {
      expect(ledger.getEntries({ kind: "burn" })).toHaveLength(1);
    });

    it("filters by holder on either side", () => {
      expect(ledger.getEntries({ holder: "alice" }).map((e) => e.correlationId)).toEqual([
        "c2",
        "c3",
      ]);
    });

    it("filters by correlation ID", () => {
      expect(ledger.getEntries({ correlationId: "c1" })[0]?.kind).toBe("mint");
    });
  });

  describe("checkSupply", () => {
    it("is balanced after mixed movements", () => {
      ledger.mint("issuer", 10n);
      ledger.transfer("issuer", "alice", 4n);
      ledger.burn("alice", 2n);

      expect(ledger.checkSupply()).toEqual({
        totalSupply: 8n,
        sumOfBalances: 8n,
        balanced: true,
      });
    });
  });

  // ─── Rollback ────────────────────────────────────────────────────────

  describe("rollbackTo", () => {
    it("undoes every movement after the savepoint", () => {
      ledger.mint("issuer", 10n);
      ledger.transfer("issuer", "alice", 3n);
      const sp = ledger.savepoint();

      ledger.burn("alice", 2n);
      ledger.mint("issuer", 5n);
      ledger.transfer("issuer", "bob", 1n);
      ledger.rollbackTo(sp);

      expect(ledger.balanceOf("issuer")).toBe(7n);
      expect(ledger.balanceOf("alice")).toBe(3n);
      expect(ledger.balanceOf("bob")).toBe(0n);
      expect(ledger.totalSupply).toBe(10n);
      expect(ledger.entryCount).toBe(2);
    });

    it("is a no-op at the current position", () => {
      ledger.mint("issuer", 1n);
      ledger.rollbackTo(ledger.savepoint());
      expect(ledger.totalSupply).toBe(1n);
    });

    it("does not reuse entry IDs after a rollback", () => {
      const sp = ledger.savepoint();
      ledger.mint("issuer", 1n);
      ledger.rollbackTo(sp);

      expect(ledger.mint("issuer", 1n).id).toBe("entry-2");
    });

    it("rejects a savepoint beyond the journal", () => {
      try {
        ledger.rollbackTo({ position: 3 });
        expect.unreachable();
      } catch (err) {
        expect(err).toMatchObject({ code: "INVALID_SAVEPOINT" });
      }
    });
  });

  // ─── Settle ──────────────────────────────────────────────────────────

  describe("settle", () => {
    it("drops the journal but keeps balances and supply", () => {
      ledger.mint("issuer", 10n);
      ledger.transfer("issuer", "alice", 4n);

      expect(ledger.settle()).toBe(2);
      expect(ledger.entryCount).toBe(0);
      expect(ledger.getEntries()).toEqual([]);
      expect(ledger.balanceOf("issuer")).toBe(6n);
      expect(ledger.balanceOf("alice")).toBe(4n);
      expect(ledger.totalSupply).toBe(10n);
    });

    it("still rolls back to a savepoint taken after settling", () => {
      ledger.mint("issuer", 10n);
      ledger.settle();
      const sp = ledger.savepoint();

      ledger.burn("issuer", 3n);
      ledger.rollbackTo(sp);

      expect(sp).toEqual({ position: 1 });
      expect(ledger.balanceOf("issuer")).toBe(10n);
      expect(ledger.entryCount).toBe(0);
    });

    it("rejects a savepoint taken before settling", () => {
      const sp = ledger.savepoint();
      ledger.mint("issuer", 10n);
      ledger.settle();

      try {
        ledger.rollbackTo(sp);
        expect.unreachable();
      } catch (err) {
        expect(err).toMatchObject({ code: "INVALID_SAVEPOINT" });
      }
      expect(ledger.totalSupply).toBe(10n);
    });

    it("keeps entry IDs increasing across settlements", () => {
      ledger.mint("issuer", 1n);
      ledger.settle();

      expect(ledger.mint("issuer", 1n).id).toBe("entry-2");
    });
  });

  // ─── Snapshot ────────────────────────────────────────────────────────

  describe("snapshot", () => {
    it("serializes balances and supply as strings", () => {
      ledger.mint("issuer", 10n);
      ledger.transfer("issuer", "alice", 3n);

      expect(ledger.snapshot()).toEqual({
        version: 1,
        balances: { issuer: "7", alice: "3" },
        totalSupply: "10",
      });
    });

    it("restores balances and supply from a snapshot", () => {
      ledger.mint("issuer", 10n);
      ledger.transfer("issuer", "alice", 3n);

      const restored = UnitLedger.fromSnapshot(ledger.snapshot());

      expect(restored.balanceOf("issuer")).toBe(7n);
      expect(restored.balanceOf("alice")).toBe(3n);
      expect(restored.totalSupply).toBe(10n);
      expect(restored.entryCount).toBe(0);
    });

    it("rejects a snapshot whose balances do not match supply", () => {
      expect(() =>
        UnitLedger.fromSnapshot({
          version: 1,
          balances: { issuer: "7" },
          totalSupply: "10",
        }),
      ).toThrow(/Balances sum to 7 but supply is 10/);
    });

    it("rejects a negative balance", () => {
      expect(() =>
        UnitLedger.fromSnapshot({
          version: 1,
          balances: { issuer: "-1" },
          totalSupply: "-1",
        }),
      ).toThrow(/Negative balance/);
    });
  });
});
