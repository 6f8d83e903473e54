import { recordChange } from "../db/changes.js";
import { getConflict, getOpenConflict, listOpenConflicts, markConflictResolved } from "../db/conflicts.js";
import type { ChangeData, ChangeOperation, Conflict, ConflictResolution, ExecutableResolution } from "../types/index.js";
import { ConflictNotFoundError, ValidationError } from "../types/index.js";
import { getEntityHandler } from "./entities.js";
import { emitSyncEvent } from "./notifier.js";
import { resolveSyncContext } from "./sync-context.js";
import type { SyncOptions } from "./sync-types.js";

/** Open conflicts for the user, newest first. */
export function listConflicts(userId: string, options: SyncOptions = {}): Conflict[] {
  const { db } = resolveSyncContext(options, "conflicts");
  return listOpenConflicts(userId, db);
}

/**
 * The change a resolution replays: the device's pushed operation, or the
 * server snapshot written back as an update. Null when there is nothing to apply.
 */
function chosenChange(
  conflict: Conflict,
  resolution: ExecutableResolution,
): { operation: ChangeOperation; data: ChangeData } | null {
  if (resolution === "device1" && conflict.device1_operation === "delete") return { operation: "delete", data: {} };
  const data = resolution === "device1" ? conflict.device1_data : conflict.device2_data;
  // An empty side means the entity did not exist there
  return Object.keys(data).length > 0 ? { operation: "update", data } : null;
}

/**
 * Settle an open conflict by applying one side's data. `device1` is the
 * pushing device's proposal, `device2` the server snapshot taken at detection.
 */
export function resolveConflict(
  userId: string,
  conflictId: string,
  resolution: ConflictResolution,
  options: SyncOptions = {},
): true {
  const ctx = resolveSyncContext(options, "conflicts");

  const resolve = ctx.db.transaction((): Conflict => {
    const conflict = getOpenConflict(userId, conflictId, ctx.db);
    if (!conflict) throw new ConflictNotFoundError(conflictId);
    if (resolution !== "device1" && resolution !== "device2") {
      throw new ValidationError(`Resolution ${resolution} cannot be applied automatically (use device1 or device2)`);
    }

    const handler = getEntityHandler(ctx.entities, conflict.entity_type);
    const chosen = chosenChange(conflict, resolution);
    const missing = Object.keys(handler.snapshot(userId, conflict.entity_id, ctx.db)).length === 0;
    if (chosen && !(chosen.operation === "delete" && missing)) {
      handler.apply(userId, conflict.entity_id, chosen.operation, chosen.data, ctx.db);
      if (ctx.settings.journal_resolutions) {
        recordChange(
          userId,
          {
            entity_type: conflict.entity_type,
            entity_id: conflict.entity_id,
            operation: chosen.operation,
            data: chosen.data,
            origin_device_id: null,
          },
          ctx.db,
        );
      }
    }

    markConflictResolved(conflict.id, resolution, ctx.db);
    return getConflict(conflict.id, ctx.db) ?? conflict;
  });

  const resolved = resolve();
  ctx.logger.info("Conflict resolved", { user_id: userId, conflict_id: conflictId, resolution });
  emitSyncEvent(ctx.notifier, { type: "conflict_resolved", user_id: userId, conflict: resolved }, ctx.logger);
  return true;
}
