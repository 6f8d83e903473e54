import { z } from "zod";
import { recordChange } from "../db/changes.js";
import type { ChangeRecord } from "../types/index.js";
import { CHANGE_OPERATIONS } from "../types/index.js";
import { getEntityHandler } from "./entities.js";
import { resolveSyncContext } from "./sync-context.js";
import type { SyncOptions } from "./sync-types.js";
import { parseRequest } from "./sync-utils.js";

export const serverChangeSchema = z.object({
  entity_type: z.string().min(1),
  entity_id: z.string().min(1),
  operation: z.enum(CHANGE_OPERATIONS),
  data: z.record(z.unknown()).default({}),
});

export type ServerChangeInput = z.input<typeof serverChangeSchema>;

/**
 * Apply an edit made outside any device (web API, import) and journal it
 * with no origin, so every device receives it on its next pull.
 */
export function commitServerChange(userId: string, input: ServerChangeInput, options: SyncOptions = {}): ChangeRecord {
  const change = parseRequest(serverChangeSchema, input, "server change");
  const ctx = resolveSyncContext(options, "server");
  const handler = getEntityHandler(ctx.entities, change.entity_type);

  const commit = ctx.db.transaction(() => {
    handler.apply(userId, change.entity_id, change.operation, change.data, ctx.db);
    return recordChange(userId, { ...change, origin_device_id: null }, ctx.db);
  });

  const record = commit();
  ctx.logger.debug("Server change recorded", {
    user_id: userId,
    entity_type: record.entity_type,
    entity_id: record.entity_id,
    operation: record.operation,
  });
  return record;
}
