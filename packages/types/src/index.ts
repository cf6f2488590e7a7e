/**
 * @callvault/types: Shared domain types.
 *
 * - Party addresses and base-unit amounts
 * - Collateral kinds
 * - Notifications
 *
 * Everything here is readonly and dependency-free; meaning lives in the
 * packages that consume these types.
 */

export type { Address, Amount, CollateralKind } from "./address.js";

export type { Notification, NotificationSource } from "./notification.js";

export {
  isAddress,
  isAmount,
  isAmountString,
  isCollateralKind,
  isNotificationSource,
  isNotification,
} from "./guards.js";
