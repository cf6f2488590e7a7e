/**
 * Option Instrument: the lifecycle state machine.
 *
 *   Active ──expire()──▶ Expired
 *
 * Rules:
 * - Units are created only by issue() and destroyed only by exercise()
 * - totalCollateralHeld equals total unit supply while Active
 * - Exercise is legal only inside [expiration - 1 day, expiration]
 * - Only the issuer may issue or expire
 * - One mutating call at a time; state changes before value leaves escrow
 * - A call either commits entirely or leaves no trace
 */

import { randomUUID } from "node:crypto";
import type { Address, Notification } from "@callvault/types";
import { isAddress } from "@callvault/types";
import { LedgerError, UnitLedger } from "@callvault/ledger";
import type { EscrowAccount } from "@callvault/escrow";
import { OPTION_NOTIFICATIONS } from "@callvault/notifications";
import type { NotificationLog, OptionNotificationType } from "@callvault/notifications";
import type { AccessPolicy } from "./access-policy.js";
import { SingleIssuerPolicy } from "./access-policy.js";
import type { Clock } from "./clock.js";
import { systemClock, toIsoTimestamp } from "./clock.js";
import type { OptionResult } from "./errors.js";
import { fail, ok } from "./errors.js";
import { isExercisable } from "./exercise-window.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { requiredPayment } from "./pricing.js";
import { SerialLock } from "./serial-lock.js";
import { parseSnapshot } from "./snapshot.js";
import type {
  ExerciseReceipt,
  ExerciseRequest,
  ExpireReceipt,
  InstrumentDeps,
  InstrumentInfo,
  InstrumentParams,
  InstrumentSnapshot,
  InstrumentState,
  IssueReceipt,
  IssueRequest,
  LifecycleState,
  TransferReceipt,
} from "./types.js";

/**
 * One mutating call: its id, the value it accepted into escrow and how
 * much of that has already gone back to the caller.
 */
interface Call {
  readonly id: string;
  deposited: bigint;
  refunded: bigint;
}

interface Announcement {
  readonly type: OptionNotificationType;
  readonly source: "option" | "ledger";
  readonly payload: Readonly<Record<string, unknown>>;
}

interface Committed<T> {
  readonly receipt: T;
  readonly announcement: Announcement;
}

function commit<T>(receipt: T, announcement: Announcement): OptionResult<Committed<T>> {
  return ok({ receipt, announcement });
}

export class OptionInstrument {
  private readonly params: InstrumentParams;
  private readonly state: InstrumentState;
  private readonly ledger: UnitLedger;
  private readonly escrow: EscrowAccount;
  private readonly clock: Clock;
  private readonly notifications: NotificationLog | undefined;
  private readonly logger: Logger;
  private readonly policy: AccessPolicy;
  private readonly lock = new SerialLock();
  private readonly streamId: string;

  private constructor(
    params: InstrumentParams,
    state: InstrumentState,
    ledger: UnitLedger,
    deps: InstrumentDeps,
  ) {
    this.params = params;
    this.state = state;
    this.ledger = ledger;
    this.escrow = deps.escrow;
    this.clock = deps.clock ?? systemClock;
    this.notifications = deps.notifications;
    this.policy = deps.accessPolicy ?? new SingleIssuerPolicy(params.issuer);
    this.streamId = deps.streamId ?? `option:${params.symbol}`;
    this.logger = (deps.logger ?? silentLogger()).child({ instrument: params.symbol });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Construction
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create an Active instrument with no units and no collateral.
   * Expiration must lie strictly after the clock's current instant.
   */
  static create(
    params: InstrumentParams,
    deps: InstrumentDeps,
  ): OptionResult<OptionInstrument> {
    const invalid = validateParams(params) ?? validatePolicy(params, deps);
    if (invalid !== undefined) return invalid;

    const now = (deps.clock ?? systemClock).now();
    if (params.expiration <= now) {
      return fail(
        "InvalidParameters",
        `Expiration ${String(params.expiration)} must be after the current instant ${String(now)}`,
      );
    }

    return ok(
      new OptionInstrument(
        params,
        { expired: false, totalCollateralHeld: 0n },
        new UnitLedger(),
        deps,
      ),
    );
  }

  /**
   * Rebuild an instrument from a snapshot. The escrow supplied in `deps`
   * must already hold the value the snapshot accounts for.
   */
  static restore(
    input: unknown,
    deps: InstrumentDeps,
  ): OptionResult<OptionInstrument> {
    const parsed = parseSnapshot(input);
    if (!parsed.success) {
      return fail("InvalidParameters", `Invalid snapshot: ${parsed.message}`);
    }
    const { snapshot } = parsed;

    const params: InstrumentParams = {
      name: snapshot.params.name,
      symbol: snapshot.params.symbol,
      strikePrice: BigInt(snapshot.params.strikePrice),
      expiration: snapshot.params.expiration,
      collateralKind: snapshot.params.collateralKind,
      issuer: snapshot.params.issuer,
    };
    const invalid = validateParams(params) ?? validatePolicy(params, deps);
    if (invalid !== undefined) return invalid;

    let ledger: UnitLedger;
    try {
      ledger = UnitLedger.fromSnapshot(snapshot.units);
    } catch (err: unknown) {
      if (err instanceof LedgerError) {
        return fail("InvalidParameters", `Invalid unit table: ${err.message}`);
      }
      throw err;
    }

    const state: InstrumentState = {
      expired: snapshot.state.expired,
      totalCollateralHeld: BigInt(snapshot.state.totalCollateralHeld),
    };

    if (!state.expired && state.totalCollateralHeld !== ledger.totalSupply) {
      return fail(
        "InvalidParameters",
        `Collateral ${state.totalCollateralHeld.toString()} does not back supply ${ledger.totalSupply.toString()}`,
      );
    }
    if (state.expired && state.totalCollateralHeld !== 0n) {
      return fail("InvalidParameters", "An expired instrument cannot hold collateral");
    }
    if (deps.escrow.holdings() < state.totalCollateralHeld) {
      return fail(
        "InvalidParameters",
        `Escrow holds ${deps.escrow.holdings().toString()}, less than collateral ${state.totalCollateralHeld.toString()}`,
      );
    }

    return ok(new OptionInstrument(params, state, ledger, deps));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Deposit `amount` collateral and mint `amount` units to the issuer.
   * The call's value must equal the amount exactly.
   */
  issue(caller: Address, request: IssueRequest): Promise<OptionResult<IssueReceipt>> {
    return this.mutate<IssueReceipt>("issue", caller, async (call) => {
      const { amount } = request;

      if (this.params.collateralKind.kind !== "native") {
        return fail("Unsupported", "Only native collateral can be issued against");
      }
      if (!this.policy.isIssuer(caller)) {
        return fail("Unauthorized", `"${caller}" is not the issuer`);
      }
      if (this.state.expired) {
        return fail("AlreadyExpired", "The instrument has expired");
      }
      if (amount < 0n || request.value < 0n) {
        return fail("InvalidParameters", "Amounts cannot be negative");
      }
      if (amount === 0n) {
        return fail("ZeroAmount", "Cannot issue zero units");
      }
      if (request.value !== amount) {
        return fail(
          "AmountMismatch",
          `Sent ${request.value.toString()} but issuing ${amount.toString()} requires exactly that much`,
        );
      }

      this.accept(call, request.value);
      this.state.totalCollateralHeld += amount;
      this.ledger.mint(caller, amount, this.movement(call));

      return commit(
        {
          issuer: caller,
          amount,
          totalSupply: this.ledger.totalSupply,
          totalCollateralHeld: this.state.totalCollateralHeld,
        },
        {
          type: OPTION_NOTIFICATIONS.ISSUED,
          source: "option",
          payload: { issuer: caller, amount: amount.toString() },
        },
      );
    });
  }

  /**
   * Burn `unitAmount` of the caller's units, take the strike payment,
   * refund any overpayment and release `unitAmount` collateral.
   */
  exercise(
    caller: Address,
    request: ExerciseRequest,
  ): Promise<OptionResult<ExerciseReceipt>> {
    return this.mutate<ExerciseReceipt>("exercise", caller, async (call) => {
      const { unitAmount } = request;
      const now = this.clock.now();

      if (this.state.expired) {
        return fail("AlreadyExpired", "The instrument has expired");
      }
      if (!isExercisable(now, this.params.expiration)) {
        return fail(
          "NotInExerciseWindow",
          `Instant ${String(now)} is outside the exercise window ending ${String(this.params.expiration)}`,
        );
      }
      if (unitAmount < 0n || request.value < 0n) {
        return fail("InvalidParameters", "Amounts cannot be negative");
      }
      if (unitAmount === 0n) {
        return fail("ZeroAmount", "Cannot exercise zero units");
      }
      const held = this.ledger.balanceOf(caller);
      if (held < unitAmount) {
        return fail(
          "InsufficientUnitBalance",
          `"${caller}" holds ${held.toString()} units, cannot exercise ${unitAmount.toString()}`,
        );
      }
      const payment = requiredPayment(unitAmount, this.params.strikePrice);
      if (request.value < payment) {
        return fail(
          "InsufficientPayment",
          `Exercising ${unitAmount.toString()} units requires ${payment.toString()}, sent ${request.value.toString()}`,
        );
      }

      this.accept(call, request.value);
      this.ledger.burn(caller, unitAmount, this.movement(call));
      this.state.totalCollateralHeld -= unitAmount;

      const refund = request.value - payment;
      if (refund > 0n) {
        const refunded = await this.escrow.release(caller, refund);
        if (!refunded.ok) {
          return fail("TransferFailed", `Refund of ${refund.toString()} failed: ${refunded.reason}`);
        }
        call.refunded += refund;
      }

      const payout = await this.escrow.release(caller, unitAmount);
      if (!payout.ok) {
        return fail(
          "TransferFailed",
          `Release of ${unitAmount.toString()} collateral failed: ${payout.reason}`,
        );
      }

      return commit(
        {
          holder: caller,
          unitAmount,
          collateralReleased: unitAmount,
          paymentTaken: payment,
          refund,
        },
        {
          type: OPTION_NOTIFICATIONS.EXERCISED,
          source: "option",
          payload: {
            holder: caller,
            unitAmount: unitAmount.toString(),
            collateralReleased: unitAmount.toString(),
            paymentTaken: payment.toString(),
            refund: refund.toString(),
          },
        },
      );
    });
  }

  /**
   * Close the instrument and return all remaining collateral to the issuer.
   * Legal from the expiration instant onward.
   */
  expire(caller: Address): Promise<OptionResult<ExpireReceipt>> {
    return this.mutate<ExpireReceipt>("expire", caller, async () => {
      const now = this.clock.now();

      if (!this.policy.isIssuer(caller)) {
        return fail("Unauthorized", `"${caller}" is not the issuer`);
      }
      if (this.state.expired) {
        return fail("AlreadyExpired", "The instrument has already expired");
      }
      if (now < this.params.expiration) {
        return fail(
          "NotYetExpirable",
          `Instant ${String(now)} is before expiration ${String(this.params.expiration)}`,
        );
      }

      const swept = this.state.totalCollateralHeld;
      this.state.expired = true;
      this.state.totalCollateralHeld = 0n;

      const released = await this.escrow.release(this.params.issuer, swept);
      if (!released.ok) {
        return fail(
          "TransferFailed",
          `Sweep of ${swept.toString()} to the issuer failed: ${released.reason}`,
        );
      }

      return commit(
        { issuer: this.params.issuer, collateralSwept: swept },
        {
          type: OPTION_NOTIFICATIONS.EXPIRED,
          source: "option",
          payload: { issuer: this.params.issuer, collateralSwept: swept.toString() },
        },
      );
    });
  }

  /**
   * Move units between holders. Supply and collateral are unchanged.
   */
  transfer(
    caller: Address,
    to: Address,
    amount: bigint,
  ): Promise<OptionResult<TransferReceipt>> {
    return this.mutate<TransferReceipt>("transfer", caller, async (call) => {
      if (!isAddress(to)) {
        return fail("InvalidParameters", `Invalid recipient: "${to}"`);
      }
      if (amount < 0n) {
        return fail("InvalidParameters", "Amounts cannot be negative");
      }
      if (amount === 0n) {
        return fail("ZeroAmount", "Cannot transfer zero units");
      }
      const held = this.ledger.balanceOf(caller);
      if (held < amount) {
        return fail(
          "InsufficientUnitBalance",
          `"${caller}" holds ${held.toString()} units, cannot transfer ${amount.toString()}`,
        );
      }

      this.ledger.transfer(caller, to, amount, this.movement(call));

      return commit(
        { from: caller, to, amount },
        {
          type: OPTION_NOTIFICATIONS.TRANSFERRED,
          source: "ledger",
          payload: { from: caller, to, amount: amount.toString() },
        },
      );
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Strike payment required to exercise `unitAmount` units, truncating.
   */
  quote(unitAmount: bigint): bigint {
    return requiredPayment(unitAmount, this.params.strikePrice);
  }

  info(): InstrumentInfo {
    return {
      name: this.params.name,
      symbol: this.params.symbol,
      issuer: this.params.issuer,
      strikePrice: this.params.strikePrice,
      expiration: this.params.expiration,
      collateralKind: this.params.collateralKind,
      totalSupply: this.ledger.totalSupply,
      totalCollateralHeld: this.state.totalCollateralHeld,
      expired: this.state.expired,
      canExercise:
        !this.state.expired && isExercisable(this.clock.now(), this.params.expiration),
    };
  }

  /** Raw escrow holdings, strike payments included. */
  balance(): bigint {
    return this.escrow.holdings();
  }

  balanceOf(holder: Address): bigint {
    return this.ledger.balanceOf(holder);
  }

  get lifecycle(): LifecycleState {
    return this.state.expired ? "expired" : "active";
  }

  snapshot(): InstrumentSnapshot {
    return {
      version: 1,
      params: {
        name: this.params.name,
        symbol: this.params.symbol,
        strikePrice: this.params.strikePrice.toString(),
        expiration: this.params.expiration,
        collateralKind: this.params.collateralKind,
        issuer: this.params.issuer,
      },
      state: {
        expired: this.state.expired,
        totalCollateralHeld: this.state.totalCollateralHeld.toString(),
      },
      units: this.ledger.snapshot(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `body` under the lock. A failed body rolls back the unit ledger,
   * the state fields and whatever call value it accepted into escrow.
   * Committed calls settle the ledger journal and record their
   * notification.
   */
  private async mutate<T>(
    operation: string,
    caller: Address,
    body: (call: Call) => Promise<OptionResult<Committed<T>>>,
  ): Promise<OptionResult<T>> {
    if (this.lock.isHeldByCaller()) {
      const rejected = fail(
        "ReentrantCall",
        `${operation} was called while another call on this instrument is in progress`,
      );
      this.logger.warn({ operation, caller, kind: rejected.error.kind }, rejected.error.message);
      return rejected;
    }

    const result = await this.lock.run(async (): Promise<OptionResult<T>> => {
      const savepoint = this.ledger.savepoint();
      const saved: InstrumentState = { ...this.state };
      const call: Call = { id: randomUUID(), deposited: 0n, refunded: 0n };

      const rollback = (): void => {
        this.ledger.rollbackTo(savepoint);
        this.state.expired = saved.expired;
        this.state.totalCollateralHeld = saved.totalCollateralHeld;
        const retained = call.deposited - call.refunded;
        if (retained > 0n) {
          this.escrow.revertDeposit(retained);
        }
      };

      let outcome: OptionResult<Committed<T>>;
      try {
        outcome = await body(call);
      } catch (err: unknown) {
        rollback();
        throw err;
      }

      if (!outcome.ok) {
        rollback();
        return outcome;
      }

      this.ledger.settle();
      this.announce(operation, caller, call, outcome.value.announcement);
      return ok(outcome.value.receipt);
    });

    if (result.ok) {
      this.logger.info({ operation, caller }, `${operation} committed`);
    } else {
      this.logger.warn(
        { operation, caller, kind: result.error.kind },
        result.error.message,
      );
    }
    return result;
  }

  private accept(call: Call, amount: bigint): void {
    this.escrow.deposit(amount);
    call.deposited += amount;
  }

  private movement(call: Call): { correlationId: string; timestamp: string } {
    return { correlationId: call.id, timestamp: toIsoTimestamp(this.clock.now()) };
  }

  /**
   * Record a committed call's notification. The call has already taken
   * effect, so a log that refuses the entry is reported, not unwound.
   */
  private announce(
    operation: string,
    actor: Address,
    call: Call,
    announcement: Announcement,
  ): void {
    if (this.notifications === undefined) return;

    const notification: Notification = {
      type: announcement.type,
      id: randomUUID(),
      at: toIsoTimestamp(this.clock.now()),
      actor,
      callId: call.id,
      source: announcement.source,
      payload: announcement.payload,
    };
    try {
      this.notifications.record(this.streamId, notification);
    } catch (err: unknown) {
      this.logger.error(
        { err, operation, type: notification.type, callId: call.id },
        "notification was not recorded",
      );
    }
  }
}

// =============================================================================
// Parameter validation
// =============================================================================

function validateParams(params: InstrumentParams): OptionResult<never> | undefined {
  if (params.name.length === 0 || params.symbol.length === 0) {
    return fail("InvalidParameters", "Name and symbol must be non-empty");
  }
  if (params.strikePrice <= 0n) {
    return fail("InvalidParameters", "Strike price must be positive");
  }
  if (!Number.isSafeInteger(params.expiration)) {
    return fail("InvalidParameters", "Expiration must be an integer instant in seconds");
  }
  if (!isAddress(params.issuer)) {
    return fail("InvalidParameters", `Invalid issuer address: "${params.issuer}"`);
  }
  if (params.collateralKind.kind !== "native") {
    return fail("Unsupported", `Collateral kind "${params.collateralKind.kind}" is not supported`);
  }
  return undefined;
}

/** The policy must admit the configured issuer, who receives the expiry sweep. */
function validatePolicy(
  params: InstrumentParams,
  deps: InstrumentDeps,
): OptionResult<never> | undefined {
  if (deps.accessPolicy !== undefined && !deps.accessPolicy.isIssuer(params.issuer)) {
    return fail(
      "InvalidParameters",
      `Access policy does not authorize the issuer "${params.issuer}"`,
    );
  }
  return undefined;
}
