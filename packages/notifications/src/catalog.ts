/**
 * @callvault/notifications: Catalog.
 *
 * The notification types a log accepts, each with a zod schema for its
 * payload. A log built with a catalog refuses unknown types and
 * malformed payloads.
 */

import type { z } from "zod";
import type { NotificationSource } from "@callvault/types";

export interface NotificationType {
  /** e.g. "option.issued" */
  readonly type: string;
  readonly source: NotificationSource;
  readonly description: string;
  readonly payload: z.ZodTypeAny;
}

export type PayloadCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

export class NotificationCatalog {
  private readonly _types = new Map<string, NotificationType>();

  register(definition: NotificationType): void {
    if (this._types.has(definition.type)) {
      throw new CatalogError(`Notification type "${definition.type}" is already registered`);
    }
    this._types.set(definition.type, definition);
  }

  get(type: string): NotificationType | undefined {
    return this._types.get(type);
  }

  has(type: string): boolean {
    return this._types.has(type);
  }

  /** Registered types, sorted. */
  types(): readonly string[] {
    return [...this._types.keys()].sort();
  }

  bySource(source: NotificationSource): readonly NotificationType[] {
    return [...this._types.values()].filter((definition) => definition.source === source);
  }

  check(type: string, payload: unknown): PayloadCheck {
    const definition = this._types.get(type);
    if (definition === undefined) {
      return { ok: false, reason: `Unknown notification type "${type}"` };
    }
    const parsed = definition.payload.safeParse(payload);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(payload)"}: ${issue.message}`)
        .join("; ");
      return { ok: false, reason };
    }
    return { ok: true };
  }

  get size(): number {
    return this._types.size;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
