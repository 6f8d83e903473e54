import type { ChangeOperation, Conflict, ConflictResolution, ConflictRow, CreateConflictInput } from "../types/index.js";
import { CHANGE_OPERATIONS, CONFLICT_RESOLUTIONS, SERVER_DEVICE_ID } from "../types/index.js";
import { type Database, getDatabase, now, parseJsonObject, uuid } from "./database.js";

function toResolution(value: string | null): ConflictResolution | null {
  return CONFLICT_RESOLUTIONS.find((r) => r === value) ?? null;
}

function toOperation(value: string): ChangeOperation {
  return CHANGE_OPERATIONS.find((o) => o === value) ?? "update";
}

function rowToConflict(row: ConflictRow): Conflict {
  return {
    ...row,
    device1_operation: toOperation(row.device1_operation),
    device1_data: parseJsonObject(row.device1_data),
    device2_data: parseJsonObject(row.device2_data),
    resolution: toResolution(row.resolution),
    resolved: row.resolved === 1,
  };
}

/** Open a conflict pairing a device's proposed data against the server snapshot. */
export function createConflict(userId: string, input: CreateConflictInput, db?: Database): Conflict {
  const d = db || getDatabase();
  const id = uuid();
  const timestamp = now();
  const operation = input.device1_operation ?? "update";

  d.prepare(
    `INSERT INTO sync_conflicts (id, user_id, entity_type, entity_id, device1_id, device2_id, device1_operation, device1_data, device2_data, resolution, resolved, resolved_at, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, NULL, 0, NULL, ?)`,
  ).run(
    id,
    userId,
    input.entity_type,
    input.entity_id,
    input.device1_id,
    SERVER_DEVICE_ID,
    operation,
    JSON.stringify(input.device1_data),
    JSON.stringify(input.device2_data),
    timestamp,
  );

  return {
    id,
    user_id: userId,
    entity_type: input.entity_type,
    entity_id: input.entity_id,
    device1_id: input.device1_id,
    device2_id: SERVER_DEVICE_ID,
    device1_operation: operation,
    device1_data: input.device1_data,
    device2_data: input.device2_data,
    resolution: null,
    resolved: false,
    resolved_at: null,
    created_at: timestamp,
  };
}

export function getConflict(id: string, db?: Database): Conflict | null {
  const d = db || getDatabase();
  const row = d.prepare<[string], ConflictRow>("SELECT * FROM sync_conflicts WHERE id = ?").get(id);
  return row ? rowToConflict(row) : null;
}

/** An unresolved conflict owned by the user, or null. */
export function getOpenConflict(userId: string, id: string, db?: Database): Conflict | null {
  const conflict = getConflict(id, db);
  if (!conflict || conflict.user_id !== userId || conflict.resolved) return null;
  return conflict;
}

export function findOpenConflictForEntity(
  userId: string,
  entityType: string,
  entityId: string,
  db?: Database,
): Conflict | null {
  const d = db || getDatabase();
  const row = d
    .prepare<[string, string, string], ConflictRow>(
      `SELECT * FROM sync_conflicts
       WHERE user_id = ? AND entity_type = ? AND entity_id = ? AND resolved = 0
       ORDER BY created_at DESC, rowid DESC LIMIT 1`,
    )
    .get(userId, entityType, entityId);
  return row ? rowToConflict(row) : null;
}

export function listOpenConflicts(userId: string, db?: Database): Conflict[] {
  const d = db || getDatabase();
  return d
    .prepare<[string], ConflictRow>(
      "SELECT * FROM sync_conflicts WHERE user_id = ? AND resolved = 0 ORDER BY created_at DESC, rowid DESC",
    )
    .all(userId)
    .map(rowToConflict);
}

export function countOpenConflicts(userId: string, db?: Database): number {
  const d = db || getDatabase();
  const row = d
    .prepare<[string], { count: number }>("SELECT COUNT(*) as count FROM sync_conflicts WHERE user_id = ? AND resolved = 0")
    .get(userId);
  return row?.count ?? 0;
}

/** Close an open conflict. Returns false when it was already resolved. */
export function markConflictResolved(id: string, resolution: ConflictResolution, db?: Database): boolean {
  const d = db || getDatabase();
  const result = d
    .prepare("UPDATE sync_conflicts SET resolved = 1, resolution = ?, resolved_at = ? WHERE id = ? AND resolved = 0")
    .run(resolution, now(), id);
  return result.changes > 0;
}
