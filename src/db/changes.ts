import type { ChangeOperation, ChangeRecord, ChangeRow, RecordChangeInput } from "../types/index.js";
import { CHANGE_OPERATIONS } from "../types/index.js";
import { type Database, getDatabase, now, parseJsonObject, uuid } from "./database.js";

function isOperation(value: string): value is ChangeOperation {
  return CHANGE_OPERATIONS.some((op) => op === value);
}

function rowToChange(row: ChangeRow): ChangeRecord {
  return {
    ...row,
    operation: isOperation(row.operation) ? row.operation : "update",
    data: parseJsonObject(row.data),
    delivered: row.delivered === 1,
  };
}

/**
 * Journal timestamps strictly increase per user, so a checkpoint taken from a
 * returned record never skips a sibling written in the same millisecond.
 */
function nextTimestamp(userId: string, db: Database): string {
  const current = now();
  const latest = latestChangeTimestamp(userId, db);
  if (!latest || current > latest) return current;
  return new Date(Date.parse(latest) + 1).toISOString();
}

/**
 * Append one immutable record to the user's journal. A null origin marks a
 * server-originated change.
 */
export function recordChange(userId: string, input: RecordChangeInput, db?: Database): ChangeRecord {
  const d = db || getDatabase();
  const id = uuid();
  const timestamp = nextTimestamp(userId, d);

  d.prepare(
    `INSERT INTO sync_changes (id, user_id, entity_type, entity_id, operation, data, origin_device_id, timestamp, delivered)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0)`,
  ).run(
    id,
    userId,
    input.entity_type,
    input.entity_id,
    input.operation,
    JSON.stringify(input.data),
    input.origin_device_id ?? null,
    timestamp,
  );

  return {
    id,
    user_id: userId,
    entity_type: input.entity_type,
    entity_id: input.entity_id,
    operation: input.operation,
    data: input.data,
    origin_device_id: input.origin_device_id ?? null,
    timestamp,
    delivered: false,
  };
}

export function getChange(id: string, db?: Database): ChangeRecord | null {
  const d = db || getDatabase();
  const row = d.prepare<[string], ChangeRow>("SELECT * FROM sync_changes WHERE id = ?").get(id);
  return row ? rowToChange(row) : null;
}

/**
 * Records after `since`, oldest first. Records originating from
 * `excludeDeviceId` are left out; server-origin records never are.
 */
export function queryChanges(
  userId: string,
  since: string,
  excludeDeviceId?: string,
  db?: Database,
): ChangeRecord[] {
  const d = db || getDatabase();
  if (excludeDeviceId) {
    return d
      .prepare<[string, string, string], ChangeRow>(
        `SELECT * FROM sync_changes
         WHERE user_id = ? AND timestamp > ? AND (origin_device_id IS NULL OR origin_device_id != ?)
         ORDER BY timestamp ASC, rowid ASC`,
      )
      .all(userId, since, excludeDeviceId)
      .map(rowToChange);
  }
  return d
    .prepare<[string, string], ChangeRow>(
      "SELECT * FROM sync_changes WHERE user_id = ? AND timestamp > ? ORDER BY timestamp ASC, rowid ASC",
    )
    .all(userId, since)
    .map(rowToChange);
}

/** Journal records for one entity, newer than `after`, written by anyone but `pushingDeviceId`. */
export function findCompetingChanges(
  userId: string,
  entityType: string,
  entityId: string,
  after: string,
  pushingDeviceId: string,
  db?: Database,
): ChangeRecord[] {
  const d = db || getDatabase();
  return d
    .prepare<[string, string, string, string, string], ChangeRow>(
      `SELECT * FROM sync_changes
       WHERE user_id = ? AND entity_type = ? AND entity_id = ? AND timestamp > ?
         AND (origin_device_id IS NULL OR origin_device_id != ?)
       ORDER BY timestamp ASC`,
    )
    .all(userId, entityType, entityId, after, pushingDeviceId)
    .map(rowToChange);
}

export function latestChangeTimestamp(userId: string, db?: Database): string | null {
  const d = db || getDatabase();
  const row = d
    .prepare<[string], { latest: string | null }>("SELECT MAX(timestamp) as latest FROM sync_changes WHERE user_id = ?")
    .get(userId);
  return row?.latest ?? null;
}

export function countChangesSince(userId: string, since: string | null, db?: Database): number {
  const d = db || getDatabase();
  const row = since
    ? d
        .prepare<[string, string], { count: number }>(
          "SELECT COUNT(*) as count FROM sync_changes WHERE user_id = ? AND timestamp > ?",
        )
        .get(userId, since)
    : d.prepare<[string], { count: number }>("SELECT COUNT(*) as count FROM sync_changes WHERE user_id = ?").get(userId);
  return row?.count ?? 0;
}

/** Delete the user's records stamped strictly before `before`. */
export function compactChanges(userId: string, before: string, db?: Database): number {
  const d = db || getDatabase();
  return d.prepare("DELETE FROM sync_changes WHERE user_id = ? AND timestamp < ?").run(userId, before).changes;
}
