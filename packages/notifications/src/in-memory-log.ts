/**
 * @callvault/notifications: In-memory notification log.
 *
 * Holds entries in arrays. Suitable for:
 * - Tests
 * - Hosts that forward notifications elsewhere as they arrive
 *
 * Listeners run synchronously after an entry is in the log, stream
 * listeners first. A listener that throws does not undo the entry.
 */

import type { Notification } from "@callvault/types";
import type { NotificationCatalog } from "./catalog.js";
import { GENESIS_HASH, hashEntry, verifyChain } from "./hash-chain.js";
import type {
  ChainVerification,
  EntryContent,
  EntryListener,
  LogEntry,
  NotificationLog,
  ReadOptions,
  RecordOptions,
  Subscription,
} from "./types.js";
import { NotificationLogError } from "./types.js";

export interface InMemoryNotificationLogOptions {
  /** When given, only notifications the catalog accepts are recorded. */
  readonly catalog?: NotificationCatalog | undefined;
}

export class InMemoryNotificationLog implements NotificationLog {
  private readonly _entries: LogEntry[] = [];
  private readonly _streams = new Map<string, LogEntry[]>();
  private readonly _streamListeners = new Map<string, Set<EntryListener>>();
  private readonly _listeners = new Set<EntryListener>();
  private readonly _catalog: NotificationCatalog | undefined;

  constructor(options?: InMemoryNotificationLogOptions) {
    this._catalog = options?.catalog;
  }

  record(streamId: string, notification: Notification, options?: RecordOptions): LogEntry {
    assertStreamId(streamId);

    const current = this.sequenceOf(streamId);
    const expected = options?.expectedSequence;
    if (expected !== undefined && expected !== current) {
      throw new NotificationLogError(
        "SEQUENCE_CONFLICT",
        `Stream "${streamId}" is at ${String(current)}, expected ${String(expected)}`,
        streamId,
      );
    }

    if (this._catalog !== undefined) {
      const check = this._catalog.check(notification.type, notification.payload);
      if (!check.ok) {
        const code = this._catalog.has(notification.type) ? "INVALID_PAYLOAD" : "UNKNOWN_TYPE";
        throw new NotificationLogError(code, check.reason, streamId);
      }
    }

    const previous = this._entries.at(-1);
    const previousHash = previous?.hash ?? GENESIS_HASH;
    const content: EntryContent = {
      notification,
      streamId,
      sequence: current + 1,
      position: this._entries.length + 1,
    };
    const entry: LogEntry = {
      ...content,
      hash: hashEntry(content, previousHash),
      previousHash,
    };

    this._entries.push(entry);
    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      this._streams.set(streamId, [entry]);
    } else {
      stream.push(entry);
    }

    this._notify(entry);
    return entry;
  }

  read(streamId: string, options?: ReadOptions): readonly LogEntry[] {
    assertStreamId(streamId);
    return page(this._streams.get(streamId) ?? [], options);
  }

  readAll(options?: ReadOptions): readonly LogEntry[] {
    return page(this._entries, options);
  }

  subscribe(streamId: string, listener: EntryListener): Subscription {
    assertStreamId(streamId);

    let listeners = this._streamListeners.get(streamId);
    if (listeners === undefined) {
      listeners = new Set();
      this._streamListeners.set(streamId, listeners);
    }
    const registered = listeners;
    registered.add(listener);

    return {
      unsubscribe: () => {
        registered.delete(listener);
        if (registered.size === 0) this._streamListeners.delete(streamId);
      },
    };
  }

  subscribeAll(listener: EntryListener): Subscription {
    this._listeners.add(listener);
    return {
      unsubscribe: () => {
        this._listeners.delete(listener);
      },
    };
  }

  sequenceOf(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  get length(): number {
    return this._entries.length;
  }

  verify(): ChainVerification {
    return verifyChain(this._entries);
  }

  /**
   * Every listener sees the entry; the first error is rethrown afterwards.
   */
  private _notify(entry: LogEntry): void {
    const listeners = [
      ...(this._streamListeners.get(entry.streamId) ?? []),
      ...this._listeners,
    ];
    const errors: unknown[] = [];
    for (const listener of listeners) {
      try {
        listener(entry);
      } catch (err: unknown) {
        errors.push(err);
      }
    }
    if (errors.length > 0) {
      throw errors[0];
    }
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.trim().length === 0) {
    throw new NotificationLogError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

/**
 * Sequences and positions are 1-based and contiguous, so entry n sits at
 * index n - 1 of its array.
 */
function page(entries: readonly LogEntry[], options: ReadOptions | undefined): readonly LogEntry[] {
  const after = Math.max(0, options?.after ?? 0);
  const limit = options?.limit;
  return entries.slice(after, limit === undefined ? undefined : after + Math.max(0, limit));
}
