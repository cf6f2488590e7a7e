/**
 * @callvault/option: Escrowed single-issuance call option.
 *
 * Provides:
 * - OptionInstrument: issue / exercise / expire / transfer state machine
 * - Exercise window and strike pricing helpers
 * - Access policy, clock and serial lock
 * - Configuration, logging and snapshot validation
 *
 * @packageDocumentation
 */

// Instrument
export { OptionInstrument } from "./instrument.js";

// Results
export { OPTION_ERROR_KINDS, OptionFailure, ok, fail, unwrap } from "./errors.js";
export type {
  OptionErrorKind,
  OptionError,
  OptionResult,
  Success,
  Failure,
} from "./errors.js";

// Window & pricing
export { EXERCISE_WINDOW_SECONDS, windowOpensAt, isExercisable } from "./exercise-window.js";
export { requiredPayment } from "./pricing.js";

// Collaborators
export { SingleIssuerPolicy } from "./access-policy.js";
export type { AccessPolicy } from "./access-policy.js";
export { ManualClock, systemClock, toIsoTimestamp } from "./clock.js";
export type { Clock } from "./clock.js";
export { SerialLock, LockReentryError } from "./serial-lock.js";

// Ambient
export {
  ConfigSchema,
  loadConfig,
  instrumentParamsFromConfig,
  loggerOptionsFromConfig,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { InstrumentSnapshotSchema, parseSnapshot } from "./snapshot.js";
export type { SnapshotParseResult } from "./snapshot.js";

// Types
export type {
  InstrumentParams,
  InstrumentState,
  InstrumentDeps,
  LifecycleState,
  IssueRequest,
  ExerciseRequest,
  IssueReceipt,
  ExerciseReceipt,
  ExpireReceipt,
  TransferReceipt,
  InstrumentInfo,
  InstrumentSnapshot,
} from "./types.js";
