/**
 * @callvault/notifications: Append-only, hash-chained notification log.
 *
 * @packageDocumentation
 */

export type {
  LogEntry,
  EntryContent,
  RecordOptions,
  ReadOptions,
  EntryListener,
  Subscription,
  ChainVerification,
  NotificationLog,
  NotificationLogErrorCode,
} from "./types.js";
export { NotificationLogError } from "./types.js";

export { GENESIS_HASH, hashEntry, verifyChain } from "./hash-chain.js";

export { InMemoryNotificationLog } from "./in-memory-log.js";
export type { InMemoryNotificationLogOptions } from "./in-memory-log.js";

export { NotificationCatalog, CatalogError } from "./catalog.js";
export type { NotificationType, PayloadCheck } from "./catalog.js";

export {
  OPTION_NOTIFICATIONS,
  createOptionCatalog,
  IssuedPayload,
  ExercisedPayload,
  ExpiredPayload,
  TransferredPayload,
} from "./option-notifications.js";
export type { OptionNotificationType } from "./option-notifications.js";
