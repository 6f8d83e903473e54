import { z } from "zod";
import type { Database } from "../db/database.js";
import type { ChangeData, ChangeOperation } from "../types/index.js";
import { CHANGE_OPERATIONS, EXECUTABLE_RESOLUTIONS } from "../types/index.js";
import type { SyncSettings } from "./config.js";
import type { EntityRegistry } from "./entities.js";
import type { Logger } from "./logger.js";
import type { SyncNotifier } from "./notifier.js";
import { parseTimestamp } from "./sync-utils.js";

const timestampString = z.string().refine((value) => parseTimestamp(value) !== null, {
  message: "Expected an ISO-8601 timestamp",
});

export const clientChangeSchema = z.object({
  entity_type: z.string().min(1),
  entity_id: z.string().min(1),
  operation: z.enum(CHANGE_OPERATIONS),
  data: z.record(z.unknown()),
  /** The server state the client believes it edited against. */
  as_of: timestampString,
});

export const pushRequestSchema = z.object({
  device_id: z.string().min(1),
  changes: z.array(clientChangeSchema),
});

export const pullRequestSchema = z.object({
  device_id: z.string().min(1),
  since: timestampString.optional(),
});

export const resolveRequestSchema = z.object({
  conflict_id: z.string().min(1),
  resolution: z.enum(EXECUTABLE_RESOLUTIONS),
});

export type ClientChange = z.infer<typeof clientChangeSchema>;
export type PushRequest = z.infer<typeof pushRequestSchema>;
export type PullRequest = z.infer<typeof pullRequestSchema>;

export interface PulledChange {
  id: string;
  operation: ChangeOperation;
  data: ChangeData;
  timestamp: string;
}

export interface PullResult {
  changes: Record<string, PulledChange[]>;
  sync_time: string;
  has_conflicts: boolean;
}

export interface PushResult {
  applied: number;
  conflicts: number;
  errored: number;
  errors: string[];
  sync_time: string;
}

export interface SyncStats {
  total_devices: number;
  active_devices: number;
  last_sync_at: string | null;
  pending_changes: number;
  unresolved_conflicts: number;
}

/** Collaborators and settings shared by pull, push and conflict resolution. */
export interface SyncOptions {
  settings?: Partial<SyncSettings>;
  entities?: EntityRegistry;
  notifier?: SyncNotifier;
  logger?: Logger;
  db?: Database;
}
