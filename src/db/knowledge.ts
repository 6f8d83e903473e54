import type {
  CreateKnowledgeItemInput,
  KnowledgeItem,
  KnowledgeItemRow,
  UpdateKnowledgeItemInput,
} from "../types/index.js";
import { EntityNotFoundError, ValidationError } from "../types/index.js";
import { type Database, getDatabase, now, parseJsonObject, uuid } from "./database.js";

function rowToKnowledgeItem(row: KnowledgeItemRow): KnowledgeItem {
  return {
    ...row,
    metadata: parseJsonObject(row.metadata),
    is_deleted: row.is_deleted === 1,
  };
}

export function createKnowledgeItem(userId: string, input: CreateKnowledgeItemInput, db?: Database): KnowledgeItem {
  const d = db || getDatabase();
  const id = input.id || uuid();
  const timestamp = now();

  if (getKnowledgeItem(id, d)) {
    throw new ValidationError(`knowledge item already exists: ${id}`);
  }

  d.prepare(
    `INSERT INTO knowledge_items (id, user_id, title, content, content_type, summary, category_id, metadata, is_deleted, deleted_at, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, NULL, ?, ?)`,
  ).run(
    id,
    userId,
    input.title,
    input.content,
    input.content_type || "markdown",
    input.summary ?? null,
    input.category_id ?? null,
    JSON.stringify(input.metadata || {}),
    timestamp,
    timestamp,
  );

  return requireKnowledgeItem(userId, id, d);
}

export function getKnowledgeItem(id: string, db?: Database): KnowledgeItem | null {
  const d = db || getDatabase();
  const row = d.prepare<[string], KnowledgeItemRow>("SELECT * FROM knowledge_items WHERE id = ?").get(id);
  return row ? rowToKnowledgeItem(row) : null;
}

export function getUserKnowledgeItem(userId: string, id: string, db?: Database): KnowledgeItem | null {
  const item = getKnowledgeItem(id, db);
  return item && item.user_id === userId ? item : null;
}

function requireKnowledgeItem(userId: string, id: string, db: Database): KnowledgeItem {
  const item = getUserKnowledgeItem(userId, id, db);
  if (!item) throw new EntityNotFoundError("knowledge", id);
  return item;
}

export function listKnowledgeItems(userId: string, includeDeleted = false, db?: Database): KnowledgeItem[] {
  const d = db || getDatabase();
  const where = includeDeleted ? "user_id = ?" : "user_id = ? AND is_deleted = 0";
  return d
    .prepare<[string], KnowledgeItemRow>(`SELECT * FROM knowledge_items WHERE ${where} ORDER BY updated_at DESC`)
    .all(userId)
    .map(rowToKnowledgeItem);
}

export function updateKnowledgeItem(
  userId: string,
  id: string,
  input: UpdateKnowledgeItemInput,
  db?: Database,
): KnowledgeItem {
  const d = db || getDatabase();
  requireKnowledgeItem(userId, id, d);

  const sets: string[] = ["updated_at = ?"];
  const params: (string | null)[] = [now()];

  if (input.title !== undefined) {
    sets.push("title = ?");
    params.push(input.title);
  }
  if (input.content !== undefined) {
    sets.push("content = ?");
    params.push(input.content);
  }
  if (input.content_type !== undefined) {
    sets.push("content_type = ?");
    params.push(input.content_type);
  }
  if (input.summary !== undefined) {
    sets.push("summary = ?");
    params.push(input.summary);
  }
  if (input.category_id !== undefined) {
    sets.push("category_id = ?");
    params.push(input.category_id);
  }
  if (input.metadata !== undefined) {
    sets.push("metadata = ?");
    params.push(JSON.stringify(input.metadata));
  }

  params.push(id);
  d.prepare(`UPDATE knowledge_items SET ${sets.join(", ")} WHERE id = ?`).run(...params);

  return requireKnowledgeItem(userId, id, d);
}

/** Soft delete: the row stays so later snapshots and replays still find it. */
export function deleteKnowledgeItem(userId: string, id: string, db?: Database): boolean {
  const d = db || getDatabase();
  requireKnowledgeItem(userId, id, d);
  const timestamp = now();
  const result = d
    .prepare("UPDATE knowledge_items SET is_deleted = 1, deleted_at = ?, updated_at = ? WHERE id = ? AND is_deleted = 0")
    .run(timestamp, timestamp, id);
  return result.changes > 0;
}
