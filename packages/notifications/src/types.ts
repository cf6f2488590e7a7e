/**
 * @callvault/notifications: Core types.
 *
 * A notification log is an append-only record of what instruments did.
 * Each instrument writes to its own stream; the log threads every entry,
 * across all streams, onto one hash chain.
 */

import type { Notification } from "@callvault/types";

// =============================================================================
// Entries
// =============================================================================

/**
 * A notification as the log holds it.
 */
export interface LogEntry {
  readonly notification: Notification;

  readonly streamId: string;

  /** 1-based, contiguous within the stream */
  readonly sequence: number;

  /** 1-based, contiguous across the whole log */
  readonly position: number;

  /** SHA-256 (hex) over the canonical entry and `previousHash` */
  readonly hash: string;

  /** Hash of the entry at `position - 1`, or GENESIS_HASH */
  readonly previousHash: string;
}

/** The part of an entry its hash covers, besides the predecessor's hash. */
export type EntryContent = Omit<LogEntry, "hash" | "previousHash">;

// =============================================================================
// Options
// =============================================================================

export interface RecordOptions {
  /**
   * Sequence the stream must currently be at. Omit to append
   * unconditionally; 0 means the stream must be empty.
   */
  readonly expectedSequence?: number | undefined;
}

export interface ReadOptions {
  /** Only entries after this sequence (stream reads) or position (log reads). */
  readonly after?: number | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// Subscriptions
// =============================================================================

/** Runs synchronously once an entry is in the log. */
export type EntryListener = (entry: LogEntry) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Verification
// =============================================================================

export interface ChainVerification {
  readonly valid: boolean;
  /** Entries whose link checked out before the first break. */
  readonly verified: number;
  /** Position of the first broken link, when there is one. */
  readonly brokenAt?: number | undefined;
  readonly reason?: string | undefined;
}

// =============================================================================
// Log
// =============================================================================

export interface NotificationLog {
  /**
   * Append a notification to `streamId`.
   *
   * @throws NotificationLogError on a sequence conflict or a payload the
   * log's catalog rejects
   */
  record(streamId: string, notification: Notification, options?: RecordOptions): LogEntry;

  read(streamId: string, options?: ReadOptions): readonly LogEntry[];

  readAll(options?: ReadOptions): readonly LogEntry[];

  subscribe(streamId: string, listener: EntryListener): Subscription;

  subscribeAll(listener: EntryListener): Subscription;

  /** Entries in the stream so far (0 if it has none). */
  sequenceOf(streamId: string): number;

  /** Entries in the log so far. */
  readonly length: number;

  verify(): ChainVerification;
}

// =============================================================================
// Errors
// =============================================================================

export type NotificationLogErrorCode =
  | "SEQUENCE_CONFLICT"
  | "INVALID_STREAM_ID"
  | "UNKNOWN_TYPE"
  | "INVALID_PAYLOAD";

export class NotificationLogError extends Error {
  public readonly code: NotificationLogErrorCode;
  public readonly streamId: string | undefined;

  constructor(code: NotificationLogErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "NotificationLogError";
    this.code = code;
    this.streamId = streamId;
  }
}
