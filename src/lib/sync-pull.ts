import { now } from "../db/database.js";
import { queryChanges } from "../db/changes.js";
import { countOpenConflicts } from "../db/conflicts.js";
import { requireActiveDevice, updateDeviceCheckpoint } from "../db/devices.js";
import { createSyncLog } from "../db/sync-logs.js";
import type { ChangeRecord } from "../types/index.js";
import type { CheckpointStrategy } from "./config.js";
import { emitSyncEvent } from "./notifier.js";
import { resolveSyncContext } from "./sync-context.js";
import { type PulledChange, type PullRequest, type PullResult, pullRequestSchema, type SyncOptions } from "./sync-types.js";
import { daysAgo, normalizeTimestamp, parseRequest } from "./sync-utils.js";

function groupByEntityType(entityTypes: Iterable<string>, records: ChangeRecord[]): Record<string, PulledChange[]> {
  const grouped: Record<string, PulledChange[]> = {};
  for (const type of entityTypes) grouped[type] = [];
  for (const record of records) {
    const bucket = grouped[record.entity_type] ?? [];
    bucket.push({ id: record.entity_id, operation: record.operation, data: record.data, timestamp: record.timestamp });
    grouped[record.entity_type] = bucket;
  }
  return grouped;
}

/**
 * Next checkpoint, or null to leave the stored one alone. Under
 * "latest-change" the checkpoint only moves forward, to the newest record
 * actually delivered.
 */
function nextCheckpoint(
  strategy: CheckpointStrategy,
  stored: string | null,
  records: ChangeRecord[],
): string | null {
  if (strategy === "now") return now();
  const latest = records.at(-1)?.timestamp;
  if (!latest) return null;
  return stored && stored >= latest ? null : latest;
}

/**
 * Return everything the device has not seen yet, grouped by entity type, and
 * advance its checkpoint. The device's own changes are never echoed back.
 */
export function pullChanges(userId: string, request: PullRequest, options: SyncOptions = {}): PullResult {
  const { device_id, since: sinceOverride } = parseRequest(pullRequestSchema, request, "pull request");
  const ctx = resolveSyncContext(options, "pull");
  const startedAt = now();

  const pull = ctx.db.transaction(() => {
    const device = requireActiveDevice(userId, device_id, ctx.db);
    const since = sinceOverride
      ? normalizeTimestamp(sinceOverride, "since")
      : device.last_sync_at || daysAgo(ctx.settings.pull_lookback_days);

    const records = queryChanges(userId, since, device_id, ctx.db);
    const checkpoint = nextCheckpoint(ctx.settings.checkpoint_strategy, device.last_sync_at, records);
    if (checkpoint) updateDeviceCheckpoint(device_id, checkpoint, ctx.db);

    createSyncLog(
      userId,
      { device_id, sync_type: "pull", status: "completed", items_synced: records.length, started_at: startedAt },
      ctx.db,
    );

    return {
      records,
      syncTime: checkpoint || device.last_sync_at || since,
      openConflicts: countOpenConflicts(userId, ctx.db),
    };
  });

  const { records, syncTime, openConflicts } = pull();

  ctx.logger.info("Pull completed", { user_id: userId, device_id, changes: records.length, sync_time: syncTime });
  emitSyncEvent(
    ctx.notifier,
    {
      type: "sync_completed",
      user_id: userId,
      device_id,
      direction: "pull",
      items: records.length,
      sync_time: syncTime,
    },
    ctx.logger,
  );

  return {
    changes: groupByEntityType(ctx.entities.keys(), records),
    sync_time: syncTime,
    has_conflicts: openConflicts > 0,
  };
}
