import type { Conflict, SyncType } from "../types/index.js";
import type { Logger } from "./logger.js";

export type SyncEvent =
  | {
      type: "sync_completed";
      user_id: string;
      device_id: string;
      direction: SyncType;
      items: number;
      sync_time: string;
    }
  | { type: "conflict_detected"; user_id: string; device_id: string; conflict: Conflict }
  | { type: "conflict_resolved"; user_id: string; conflict: Conflict };

/** Sink for sync events (WebSocket fan-out, notifications). */
export type SyncNotifier = (event: SyncEvent) => void;

export const noopNotifier: SyncNotifier = () => {};

/**
 * Deliver an event without letting the sink affect the sync operation:
 * a throwing notifier is logged and the caller carries on.
 */
export function emitSyncEvent(notifier: SyncNotifier, event: SyncEvent, logger: Logger): void {
  try {
    notifier(event);
  } catch (error) {
    logger.warn(`Notifier failed for ${event.type}`, {
      user_id: event.user_id,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
