/**
 * Tests for logging setup and per-operation log lines.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { EscrowAccount, InMemoryValueNetwork } from "@callvault/escrow";
import { ManualClock } from "../src/clock.js";
import { unwrap } from "../src/errors.js";
import { OptionInstrument } from "../src/instrument.js";
import { createLogger, silentLogger } from "../src/logger.js";
import { ESCROW, HOLDER_A, ISSUER, START, testParams } from "./helpers.js";

function capture() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) {
          lines.push({ ...parsed });
        }
      },
    },
  );
  return { logger, lines };
}

describe("createLogger", () => {
  it("uses the requested level", () => {
    expect(createLogger({ level: "warn" }).level).toBe("warn");
  });

  it("defaults to info", () => {
    expect(createLogger().level).toBe("info");
  });

  it("builds a silent logger", () => {
    expect(silentLogger().level).toBe("silent");
  });
});

describe("instrument logging", () => {
  function build() {
    const { logger, lines } = capture();
    const network = new InMemoryValueNetwork();
    const instrument = unwrap(
      OptionInstrument.create(testParams(), {
        escrow: new EscrowAccount(network.transport(ESCROW)),
        clock: new ManualClock(START),
        logger,
      }),
    );
    return { instrument, lines };
  }

  it("logs committed calls at info with the instrument symbol", async () => {
    const { instrument, lines } = build();

    await instrument.issue(ISSUER, { amount: 1n, value: 1n });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      instrument: "TCALL",
      operation: "issue",
      caller: ISSUER,
      msg: "issue committed",
    });
  });

  it("logs rejected calls at warn with the error kind", async () => {
    const { instrument, lines } = build();

    await instrument.issue(HOLDER_A, { amount: 1n, value: 1n });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      instrument: "TCALL",
      operation: "issue",
      caller: HOLDER_A,
      kind: "Unauthorized",
      msg: '"holder-a" is not the issuer',
    });
  });
});
