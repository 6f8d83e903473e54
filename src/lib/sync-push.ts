import { now } from "../db/database.js";
import { findCompetingChanges, recordChange } from "../db/changes.js";
import { createConflict, findOpenConflictForEntity, markConflictResolved } from "../db/conflicts.js";
import { requireActiveDevice } from "../db/devices.js";
import { createSyncLog } from "../db/sync-logs.js";
import type { Conflict } from "../types/index.js";
import { getEntityHandler } from "./entities.js";
import { emitSyncEvent } from "./notifier.js";
import { resolveSyncContext, type SyncContext } from "./sync-context.js";
import { type ClientChange, type PushRequest, type PushResult, pushRequestSchema, type SyncOptions } from "./sync-types.js";
import { errorMessage, normalizeTimestamp, parseRequest } from "./sync-utils.js";

type ItemOutcome = { kind: "applied" } | { kind: "conflict"; conflict: Conflict | null };

/**
 * Open a conflict for a rejected change, honouring the open-conflict policy.
 * Returns null when the policy keeps the existing conflict instead.
 */
function openConflict(ctx: SyncContext, userId: string, deviceId: string, change: ClientChange): Conflict | null {
  const existing = findOpenConflictForEntity(userId, change.entity_type, change.entity_id, ctx.db);
  if (existing) {
    if (ctx.settings.open_conflict_policy === "reject") return null;
    if (ctx.settings.open_conflict_policy === "supersede") markConflictResolved(existing.id, "superseded", ctx.db);
  }

  const handler = getEntityHandler(ctx.entities, change.entity_type);
  return createConflict(
    userId,
    {
      entity_type: change.entity_type,
      entity_id: change.entity_id,
      device1_id: deviceId,
      device1_operation: change.operation,
      device1_data: change.data,
      device2_data: handler.snapshot(userId, change.entity_id, ctx.db),
    },
    ctx.db,
  );
}

function pushOne(ctx: SyncContext, userId: string, deviceId: string, change: ClientChange): ItemOutcome {
  const asOf = normalizeTimestamp(change.as_of, "as_of");
  const competing = findCompetingChanges(userId, change.entity_type, change.entity_id, asOf, deviceId, ctx.db);
  if (competing.length > 0) {
    return { kind: "conflict", conflict: openConflict(ctx, userId, deviceId, change) };
  }

  getEntityHandler(ctx.entities, change.entity_type).apply(
    userId,
    change.entity_id,
    change.operation,
    change.data,
    ctx.db,
  );
  recordChange(
    userId,
    {
      entity_type: change.entity_type,
      entity_id: change.entity_id,
      operation: change.operation,
      data: change.data,
      origin_device_id: deviceId,
    },
    ctx.db,
  );
  return { kind: "applied" };
}

/**
 * Apply a device's batch of changes. Each change is checked against newer
 * journal records from elsewhere and either applied and journaled or parked
 * as a conflict. A failing item is reported and the batch carries on.
 */
export function pushChanges(userId: string, request: PushRequest, options: SyncOptions = {}): PushResult {
  const { device_id, changes } = parseRequest(pushRequestSchema, request, "push request");
  const ctx = resolveSyncContext(options, "push");
  const startedAt = now();

  requireActiveDevice(userId, device_id, ctx.db);
  for (const change of changes) getEntityHandler(ctx.entities, change.entity_type);

  const result: PushResult = { applied: 0, conflicts: 0, errored: 0, errors: [], sync_time: startedAt };
  const detected: Conflict[] = [];

  for (const change of changes) {
    // Check and apply commit together, so no other writer lands in between
    const push = ctx.db.transaction(() => pushOne(ctx, userId, device_id, change));
    try {
      const outcome = push.immediate();
      if (outcome.kind === "applied") {
        result.applied++;
      } else {
        result.conflicts++;
        if (outcome.conflict) detected.push(outcome.conflict);
      }
    } catch (error) {
      const message = errorMessage(error);
      result.errored++;
      result.errors.push(`${change.entity_type}/${change.entity_id}: ${message}`);
      ctx.logger.error(
        "Push item failed",
        error instanceof Error ? error : undefined,
        { user_id: userId, device_id, entity_type: change.entity_type, entity_id: change.entity_id },
      );
    }
  }

  result.sync_time = now();
  const failed = changes.length > 0 && result.errored === changes.length;
  createSyncLog(
    userId,
    {
      device_id,
      sync_type: "push",
      status: failed ? "failed" : "completed",
      items_synced: result.applied,
      items_failed: result.errored,
      error_message: result.errors.length > 0 ? result.errors.join("\n") : null,
      started_at: startedAt,
    },
    ctx.db,
  );

  ctx.logger.info("Push completed", {
    user_id: userId,
    device_id,
    applied: result.applied,
    conflicts: result.conflicts,
    errored: result.errored,
  });
  for (const conflict of detected) {
    emitSyncEvent(ctx.notifier, { type: "conflict_detected", user_id: userId, device_id, conflict }, ctx.logger);
  }
  emitSyncEvent(
    ctx.notifier,
    {
      type: "sync_completed",
      user_id: userId,
      device_id,
      direction: "push",
      items: result.applied,
      sync_time: result.sync_time,
    },
    ctx.logger,
  );

  return result;
}
