import { z } from "zod";
import type { Database } from "../db/database.js";
import { createCategory, deactivateCategory, getUserCategory, updateCategory } from "../db/categories.js";
import { createKnowledgeItem, deleteKnowledgeItem, getUserKnowledgeItem, updateKnowledgeItem } from "../db/knowledge.js";
import { createTag, deactivateTag, getUserTag, updateTag } from "../db/tags.js";
import type { ChangeData, ChangeOperation } from "../types/index.js";
import { ValidationError } from "../types/index.js";
import { parseRequest } from "./sync-utils.js";

/**
 * One entity store as seen by the sync engine: apply a journaled operation
 * and capture the current state as conflict evidence.
 */
export interface EntityHandler {
  readonly type: string;
  apply(userId: string, entityId: string, operation: ChangeOperation, data: ChangeData, db: Database): void;
  /** Current state of the entity, or `{}` when it does not exist for the user. */
  snapshot(userId: string, entityId: string, db: Database): ChangeData;
}

export type EntityRegistry = ReadonlyMap<string, EntityHandler>;

interface EntityStore<C, U> {
  type: string;
  createSchema: z.ZodType<C>;
  updateSchema: z.ZodType<U>;
  create(userId: string, entityId: string, input: C, db: Database): void;
  update(userId: string, entityId: string, input: U, db: Database): void;
  remove(userId: string, entityId: string, db: Database): void;
  snapshot(userId: string, entityId: string, db: Database): ChangeData;
}

export function defineEntityHandler<C, U>(store: EntityStore<C, U>): EntityHandler {
  return {
    type: store.type,
    apply(userId, entityId, operation, data, db) {
      switch (operation) {
        case "create":
          store.create(userId, entityId, parseRequest(store.createSchema, data, `${store.type} payload`), db);
          return;
        case "update":
          store.update(userId, entityId, parseRequest(store.updateSchema, data, `${store.type} payload`), db);
          return;
        case "delete":
          store.remove(userId, entityId, db);
          return;
      }
    },
    snapshot: store.snapshot,
  };
}

const knowledgeSchema = z.object({
  title: z.string().min(1),
  content: z.string(),
  content_type: z.string().optional(),
  summary: z.string().nullable().optional(),
  category_id: z.string().nullable().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const categorySchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  parent_id: z.string().nullable().optional(),
  color: z.string().optional(),
  icon: z.string().nullable().optional(),
  sort_order: z.number().int().optional(),
});

const tagSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  color: z.string().optional(),
});

export const knowledgeHandler = defineEntityHandler({
  type: "knowledge",
  createSchema: knowledgeSchema,
  updateSchema: knowledgeSchema.partial(),
  create: (userId, id, input, db) => createKnowledgeItem(userId, { ...input, id }, db),
  update: (userId, id, input, db) => updateKnowledgeItem(userId, id, input, db),
  remove: (userId, id, db) => deleteKnowledgeItem(userId, id, db),
  snapshot(userId, id, db) {
    const item = getUserKnowledgeItem(userId, id, db);
    if (!item) return {};
    return {
      title: item.title,
      content: item.content,
      content_type: item.content_type,
      summary: item.summary,
      category_id: item.category_id,
      metadata: item.metadata,
      is_deleted: item.is_deleted,
      updated_at: item.updated_at,
    };
  },
});

export const categoryHandler = defineEntityHandler({
  type: "category",
  createSchema: categorySchema,
  updateSchema: categorySchema.partial(),
  create: (userId, id, input, db) => createCategory(userId, { ...input, id }, db),
  update: (userId, id, input, db) => updateCategory(userId, id, input, db),
  remove: (userId, id, db) => deactivateCategory(userId, id, db),
  snapshot(userId, id, db) {
    const category = getUserCategory(userId, id, db);
    if (!category) return {};
    return {
      name: category.name,
      description: category.description,
      parent_id: category.parent_id,
      color: category.color,
      icon: category.icon,
      sort_order: category.sort_order,
      is_active: category.is_active,
      updated_at: category.updated_at,
    };
  },
});

export const tagHandler = defineEntityHandler({
  type: "tag",
  createSchema: tagSchema,
  updateSchema: tagSchema.partial(),
  create: (userId, id, input, db) => createTag(userId, { ...input, id }, db),
  update: (userId, id, input, db) => updateTag(userId, id, input, db),
  remove: (userId, id, db) => deactivateTag(userId, id, db),
  snapshot(userId, id, db) {
    const tag = getUserTag(userId, id, db);
    if (!tag) return {};
    return {
      name: tag.name,
      description: tag.description,
      color: tag.color,
      is_active: tag.is_active,
      updated_at: tag.updated_at,
    };
  },
});

export const DEFAULT_ENTITY_HANDLERS: readonly EntityHandler[] = [knowledgeHandler, categoryHandler, tagHandler];

export function createEntityRegistry(handlers: readonly EntityHandler[] = DEFAULT_ENTITY_HANDLERS): EntityRegistry {
  const registry = new Map<string, EntityHandler>();
  for (const handler of handlers) {
    if (registry.has(handler.type)) throw new Error(`Duplicate entity handler: ${handler.type}`);
    registry.set(handler.type, handler);
  }
  return registry;
}

let defaultRegistry: EntityRegistry | null = null;

export function getDefaultEntityRegistry(): EntityRegistry {
  if (!defaultRegistry) defaultRegistry = createEntityRegistry();
  return defaultRegistry;
}

export function getEntityHandler(registry: EntityRegistry, entityType: string): EntityHandler {
  const handler = registry.get(entityType);
  if (!handler) {
    throw new ValidationError(`Unknown entity type: ${entityType} (expected ${[...registry.keys()].join(", ")})`);
  }
  return handler;
}
