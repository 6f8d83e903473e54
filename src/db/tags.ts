import type { CreateTagInput, Tag, TagRow, UpdateTagInput } from "../types/index.js";
import { EntityNotFoundError, ValidationError } from "../types/index.js";
import { type Database, getDatabase, now, uuid } from "./database.js";

function rowToTag(row: TagRow): Tag {
  return { ...row, is_active: row.is_active === 1 };
}

export function createTag(userId: string, input: CreateTagInput, db?: Database): Tag {
  const d = db || getDatabase();
  const id = input.id || uuid();
  const timestamp = now();

  if (getTag(id, d)) {
    throw new ValidationError(`tag already exists: ${id}`);
  }

  d.prepare(
    `INSERT INTO tags (id, user_id, name, description, color, is_active, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, 1, ?, ?)`,
  ).run(id, userId, input.name, input.description ?? null, input.color || "#95a5a6", timestamp, timestamp);

  return requireTag(userId, id, d);
}

export function getTag(id: string, db?: Database): Tag | null {
  const d = db || getDatabase();
  const row = d.prepare<[string], TagRow>("SELECT * FROM tags WHERE id = ?").get(id);
  return row ? rowToTag(row) : null;
}

export function getUserTag(userId: string, id: string, db?: Database): Tag | null {
  const tag = getTag(id, db);
  return tag && tag.user_id === userId ? tag : null;
}

function requireTag(userId: string, id: string, db: Database): Tag {
  const tag = getUserTag(userId, id, db);
  if (!tag) throw new EntityNotFoundError("tag", id);
  return tag;
}

export function listTags(userId: string, db?: Database): Tag[] {
  const d = db || getDatabase();
  return d
    .prepare<[string], TagRow>("SELECT * FROM tags WHERE user_id = ? AND is_active = 1 ORDER BY name")
    .all(userId)
    .map(rowToTag);
}

export function updateTag(userId: string, id: string, input: UpdateTagInput, db?: Database): Tag {
  const d = db || getDatabase();
  requireTag(userId, id, d);

  const sets: string[] = ["updated_at = ?"];
  const params: (string | null)[] = [now()];

  if (input.name !== undefined) {
    sets.push("name = ?");
    params.push(input.name);
  }
  if (input.description !== undefined) {
    sets.push("description = ?");
    params.push(input.description);
  }
  if (input.color !== undefined) {
    sets.push("color = ?");
    params.push(input.color);
  }

  params.push(id);
  d.prepare(`UPDATE tags SET ${sets.join(", ")} WHERE id = ?`).run(...params);

  return requireTag(userId, id, d);
}

export function deactivateTag(userId: string, id: string, db?: Database): boolean {
  const d = db || getDatabase();
  requireTag(userId, id, d);
  return d.prepare("UPDATE tags SET is_active = 0, updated_at = ? WHERE id = ? AND is_active = 1").run(now(), id).changes > 0;
}
