import { compactChanges, countChangesSince } from "../db/changes.js";
import { countOpenConflicts } from "../db/conflicts.js";
import type { Database } from "../db/database.js";
import { getDatabase } from "../db/database.js";
import { resolveSyncSettings } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import type { SyncStats } from "./sync-types.js";
import { daysAgo } from "./sync-utils.js";

interface DeviceSummary {
  total: number;
  active: number;
  newest: string | null;
  oldest_active: string | null;
  /** Oldest checkpoint across every device, inactive ones included. */
  oldest_checkpoint: string | null;
  never_synced: number;
}

function summarizeDevices(userId: string, db: Database): DeviceSummary {
  const row = db
    .prepare<[string], DeviceSummary>(
      `SELECT COUNT(*) as total,
              COALESCE(SUM(is_active), 0) as active,
              MAX(last_sync_at) as newest,
              MIN(CASE WHEN is_active = 1 THEN last_sync_at END) as oldest_active,
              MIN(last_sync_at) as oldest_checkpoint,
              COALESCE(SUM(CASE WHEN is_active = 1 AND last_sync_at IS NULL THEN 1 ELSE 0 END), 0) as never_synced
       FROM sync_devices WHERE user_id = ?`,
    )
    .get(userId);
  return row ?? { total: 0, active: 0, newest: null, oldest_active: null, oldest_checkpoint: null, never_synced: 0 };
}

// Everything after the slowest active device's checkpoint is still owed to someone
function pendingChanges(userId: string, devices: DeviceSummary, db: Database): number {
  if (devices.active === 0) return 0;
  if (devices.never_synced > 0) return countChangesSince(userId, null, db);
  return countChangesSince(userId, devices.oldest_active, db);
}

export function getSyncStats(userId: string, db?: Database): SyncStats {
  const d = db || getDatabase();
  const devices = summarizeDevices(userId, d);
  return {
    total_devices: devices.total,
    active_devices: devices.active,
    last_sync_at: devices.newest,
    pending_changes: pendingChanges(userId, devices, d),
    unresolved_conflicts: countOpenConflicts(userId, d),
  };
}

export interface CompactOptions {
  retention_days?: number;
  db?: Database;
  logger?: Logger;
}

export interface CompactResult {
  deleted: number;
  /** Records older than this were eligible; null when nothing could be deleted. */
  cutoff: string | null;
}

/**
 * Drop journal records that are past retention and already delivered to
 * every device. A deactivated device keeps its checkpoint and can be
 * re-registered, so it holds the journal too. A never-synced active device
 * holds the whole journal.
 */
export function compactJournal(userId: string, options: CompactOptions = {}): CompactResult {
  const d = options.db || getDatabase();
  const logger = options.logger || createLogger({ context: "compact" });
  const retentionDays = options.retention_days ?? resolveSyncSettings().journal_retention_days;

  const compact = d.transaction((): CompactResult => {
    const devices = summarizeDevices(userId, d);
    if (devices.never_synced > 0) return { deleted: 0, cutoff: null };

    const horizon = daysAgo(retentionDays);
    const oldest = devices.oldest_checkpoint;
    const cutoff = oldest && oldest < horizon ? oldest : horizon;
    return { deleted: compactChanges(userId, cutoff, d), cutoff };
  });

  const result = compact();
  logger.info("Journal compacted", { user_id: userId, deleted: result.deleted, cutoff: result.cutoff });
  return result;
}
