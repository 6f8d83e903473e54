import type { CreateSyncLogInput, SyncLog, SyncLogRow } from "../types/index.js";
import { type Database, getDatabase, now, uuid } from "./database.js";

function rowToSyncLog(row: SyncLogRow): SyncLog {
  return {
    ...row,
    sync_type: row.sync_type === "push" ? "push" : "pull",
    status: row.status === "failed" ? "failed" : "completed",
  };
}

export function createSyncLog(userId: string, input: CreateSyncLogInput, db?: Database): SyncLog {
  const d = db || getDatabase();
  const id = uuid();

  d.prepare(
    `INSERT INTO sync_logs (id, user_id, device_id, sync_type, status, items_synced, items_failed, error_message, started_at, completed_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    userId,
    input.device_id,
    input.sync_type,
    input.status,
    input.items_synced,
    input.items_failed ?? 0,
    input.error_message ?? null,
    input.started_at,
    now(),
  );

  const row = d.prepare<[string], SyncLogRow>("SELECT * FROM sync_logs WHERE id = ?").get(id);
  if (!row) throw new Error(`Sync log not written: ${id}`);
  return rowToSyncLog(row);
}

export function listSyncLogs(userId: string, deviceId?: string, limit = 50, db?: Database): SyncLog[] {
  const d = db || getDatabase();
  const rows = deviceId
    ? d
        .prepare<[string, string, number], SyncLogRow>(
          "SELECT * FROM sync_logs WHERE user_id = ? AND device_id = ? ORDER BY completed_at DESC, rowid DESC LIMIT ?",
        )
        .all(userId, deviceId, limit)
    : d
        .prepare<[string, number], SyncLogRow>(
          "SELECT * FROM sync_logs WHERE user_id = ? ORDER BY completed_at DESC, rowid DESC LIMIT ?",
        )
        .all(userId, limit);
  return rows.map(rowToSyncLog);
}
