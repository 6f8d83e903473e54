import type { Category, CategoryRow, CreateCategoryInput, UpdateCategoryInput } from "../types/index.js";
import { EntityNotFoundError, ValidationError } from "../types/index.js";
import { type Database, getDatabase, now, uuid } from "./database.js";

function rowToCategory(row: CategoryRow): Category {
  return { ...row, is_active: row.is_active === 1 };
}

export function createCategory(userId: string, input: CreateCategoryInput, db?: Database): Category {
  const d = db || getDatabase();
  const id = input.id || uuid();
  const timestamp = now();

  if (getCategory(id, d)) {
    throw new ValidationError(`category already exists: ${id}`);
  }

  d.prepare(
    `INSERT INTO categories (id, user_id, name, description, parent_id, color, icon, sort_order, is_active, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`,
  ).run(
    id,
    userId,
    input.name,
    input.description ?? null,
    input.parent_id ?? null,
    input.color || "#3498db",
    input.icon ?? null,
    input.sort_order ?? 0,
    timestamp,
    timestamp,
  );

  return requireCategory(userId, id, d);
}

export function getCategory(id: string, db?: Database): Category | null {
  const d = db || getDatabase();
  const row = d.prepare<[string], CategoryRow>("SELECT * FROM categories WHERE id = ?").get(id);
  return row ? rowToCategory(row) : null;
}

export function getUserCategory(userId: string, id: string, db?: Database): Category | null {
  const category = getCategory(id, db);
  return category && category.user_id === userId ? category : null;
}

function requireCategory(userId: string, id: string, db: Database): Category {
  const category = getUserCategory(userId, id, db);
  if (!category) throw new EntityNotFoundError("category", id);
  return category;
}

export function listCategories(userId: string, db?: Database): Category[] {
  const d = db || getDatabase();
  return d
    .prepare<[string], CategoryRow>("SELECT * FROM categories WHERE user_id = ? AND is_active = 1 ORDER BY sort_order, name")
    .all(userId)
    .map(rowToCategory);
}

export function updateCategory(userId: string, id: string, input: UpdateCategoryInput, db?: Database): Category {
  const d = db || getDatabase();
  requireCategory(userId, id, d);

  const sets: string[] = ["updated_at = ?"];
  const params: (string | number | null)[] = [now()];

  if (input.name !== undefined) {
    sets.push("name = ?");
    params.push(input.name);
  }
  if (input.description !== undefined) {
    sets.push("description = ?");
    params.push(input.description);
  }
  if (input.parent_id !== undefined) {
    if (input.parent_id === id) throw new ValidationError("A category cannot be its own parent");
    sets.push("parent_id = ?");
    params.push(input.parent_id);
  }
  if (input.color !== undefined) {
    sets.push("color = ?");
    params.push(input.color);
  }
  if (input.icon !== undefined) {
    sets.push("icon = ?");
    params.push(input.icon);
  }
  if (input.sort_order !== undefined) {
    sets.push("sort_order = ?");
    params.push(input.sort_order);
  }

  params.push(id);
  d.prepare(`UPDATE categories SET ${sets.join(", ")} WHERE id = ?`).run(...params);

  return requireCategory(userId, id, d);
}

export function deactivateCategory(userId: string, id: string, db?: Database): boolean {
  const d = db || getDatabase();
  requireCategory(userId, id, d);
  return d.prepare("UPDATE categories SET is_active = 0, updated_at = ? WHERE id = ? AND is_active = 1").run(now(), id)
    .changes > 0;
}
