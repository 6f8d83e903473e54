import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getDatabase, resolvePartialId } from "../db/database.js";
import { queryChanges } from "../db/changes.js";
import { deactivateDevice, listDevices, registerDevice } from "../db/devices.js";
import { listSyncLogs } from "../db/sync-logs.js";
import { getCurrentUserId } from "../lib/config.js";
import { commitServerChange } from "../lib/server-changes.js";
import { compactJournal, getSyncStats } from "../lib/sync.js";
import { listConflicts, resolveConflict } from "../lib/sync-conflicts.js";
import { pullChanges } from "../lib/sync-pull.js";
import { pushChanges } from "../lib/sync-push.js";
import { normalizeTimestamp } from "../lib/sync-utils.js";
import { clientChangeSchema, type PullResult, type PushResult } from "../lib/sync-types.js";
import type { Conflict, Device } from "../types/index.js";
import {
  CHANGE_OPERATIONS,
  ConflictNotFoundError,
  DEVICE_TYPES,
  DeviceNotFoundError,
  DeviceOwnershipError,
  EntityNotFoundError,
  EXECUTABLE_RESOLUTIONS,
  ValidationError,
} from "../types/index.js";

export function formatError(error: unknown): string {
  if (error instanceof DeviceNotFoundError) return `Not found: ${error.message}`;
  if (error instanceof ConflictNotFoundError) return `Not found: ${error.message}`;
  if (error instanceof EntityNotFoundError) return `Not found: ${error.message}`;
  if (error instanceof DeviceOwnershipError) return `Forbidden: ${error.message}`;
  if (error instanceof ValidationError) return `Invalid request: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

function resolveUser(explicit?: string): string {
  const userId = getCurrentUserId(explicit);
  if (!userId) throw new ValidationError("No user id: pass user_id, set NOTESYNC_USER_ID or user_id in config");
  return userId;
}

function resolveId(userId: string, partialId: string): string {
  const id = resolvePartialId(getDatabase(), "sync_conflicts", partialId, userId);
  if (!id) throw new ConflictNotFoundError(partialId);
  return id;
}

export function formatDevice(d: Device): string {
  const synced = d.last_sync_at ? `last sync ${d.last_sync_at}` : "never synced";
  return `${d.device_id} | ${d.device_type} | ${d.name} | ${synced}`;
}

export function formatConflict(c: Conflict): string {
  return [
    `ID: ${c.id}`,
    `Entity: ${c.entity_type}/${c.entity_id}`,
    `Device: ${c.device1_id}`,
    `Operation: ${c.device1_operation}`,
    `Device data: ${JSON.stringify(c.device1_data)}`,
    `Server data: ${JSON.stringify(c.device2_data)}`,
    `Created: ${c.created_at}`,
  ].join("\n");
}

export function formatPullResult(result: PullResult): string {
  const lines: string[] = [];
  for (const [type, changes] of Object.entries(result.changes)) {
    lines.push(`${type}: ${changes.length}`);
    for (const c of changes) lines.push(`  ${c.operation} ${c.id} @ ${c.timestamp} ${JSON.stringify(c.data)}`);
  }
  lines.push(`Sync time: ${result.sync_time}`);
  if (result.has_conflicts) lines.push("Open conflicts: yes");
  return lines.join("\n");
}

export function formatPushResult(result: PushResult): string {
  const lines = [`Applied: ${result.applied}`, `Conflicts: ${result.conflicts}`, `Errored: ${result.errored}`];
  for (const e of result.errors) lines.push(`  ${e}`);
  lines.push(`Sync time: ${result.sync_time}`);
  return lines.join("\n");
}

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

function failure(error: unknown) {
  return { content: [{ type: "text" as const, text: formatError(error) }], isError: true };
}

const userParam = z.string().optional().describe("Acting user ID (defaults to NOTESYNC_USER_ID / config)");

export function createServer(): McpServer {
  const server = new McpServer({
    name: "notesync",
    version: "0.1.0",
  });

  // === DEVICES ===

  server.tool(
    "register_device",
    "Register a device for sync (re-registering re-activates it)",
    {
      user_id: userParam,
      device_id: z.string().describe("Client-chosen device identifier"),
      name: z.string().describe("Device name"),
      device_type: z.enum(DEVICE_TYPES).describe("Device class"),
    },
    async ({ user_id, device_id, name, device_type }) => {
      try {
        const device = registerDevice(resolveUser(user_id), { device_id, name, device_type });
        return text(`Device registered:\n${formatDevice(device)}`);
      } catch (e) {
        return failure(e);
      }
    },
  );

  server.tool("list_devices", "List active devices, most recently synced first", { user_id: userParam }, async ({ user_id }) => {
    try {
      const devices = listDevices(resolveUser(user_id));
      if (devices.length === 0) return text("No devices registered.");
      return text(`${devices.length} device(s):\n${devices.map(formatDevice).join("\n")}`);
    } catch (e) {
      return failure(e);
    }
  });

  server.tool(
    "deactivate_device",
    "Deactivate a device so it no longer syncs",
    { user_id: userParam, device_id: z.string().describe("Device identifier") },
    async ({ user_id, device_id }) => {
      try {
        deactivateDevice(resolveUser(user_id), device_id);
        return text(`Device deactivated: ${device_id}`);
      } catch (e) {
        return failure(e);
      }
    },
  );

  // === SYNC ===

  server.tool(
    "pull_changes",
    "Fetch changes a device has not seen yet, grouped by entity type",
    {
      user_id: userParam,
      device_id: z.string().describe("Pulling device"),
      since: z.string().optional().describe("ISO timestamp overriding the device checkpoint"),
    },
    async ({ user_id, device_id, since }) => {
      try {
        return text(formatPullResult(pullChanges(resolveUser(user_id), { device_id, since })));
      } catch (e) {
        return failure(e);
      }
    },
  );

  server.tool(
    "push_changes",
    "Push a batch of changes from a device; stale edits become conflicts",
    {
      user_id: userParam,
      device_id: z.string().describe("Pushing device"),
      changes: z.array(clientChangeSchema).describe("Changes with entity_type, entity_id, operation, data, as_of"),
    },
    async ({ user_id, device_id, changes }) => {
      try {
        return text(formatPushResult(pushChanges(resolveUser(user_id), { device_id, changes })));
      } catch (e) {
        return failure(e);
      }
    },
  );

  // === CONFLICTS ===

  server.tool("list_conflicts", "List open conflicts, newest first", { user_id: userParam }, async ({ user_id }) => {
    try {
      const conflicts = listConflicts(resolveUser(user_id));
      if (conflicts.length === 0) return text("No open conflicts.");
      return text(`${conflicts.length} open conflict(s):\n\n${conflicts.map(formatConflict).join("\n\n")}`);
    } catch (e) {
      return failure(e);
    }
  });

  server.tool(
    "resolve_conflict",
    "Resolve a conflict by keeping the device's data (device1) or the server's (device2)",
    {
      user_id: userParam,
      conflict_id: z.string().describe("Conflict ID (full or partial)"),
      resolution: z.enum(EXECUTABLE_RESOLUTIONS).describe("Side to keep"),
    },
    async ({ user_id, conflict_id, resolution }) => {
      try {
        const userId = resolveUser(user_id);
        const id = resolveId(userId, conflict_id);
        resolveConflict(userId, id, resolution);
        return text(`Conflict ${id} resolved with ${resolution}.`);
      } catch (e) {
        return failure(e);
      }
    },
  );

  // === JOURNAL ===

  server.tool(
    "record_change",
    "Apply a server-side change and journal it for every device",
    {
      user_id: userParam,
      entity_type: z.string().describe("Entity type (knowledge, category, tag)"),
      entity_id: z.string().describe("Entity ID"),
      operation: z.enum(CHANGE_OPERATIONS).describe("Operation"),
      data: z.record(z.unknown()).optional().describe("Entity fields"),
    },
    async ({ user_id, entity_type, entity_id, operation, data }) => {
      try {
        const record = commitServerChange(resolveUser(user_id), { entity_type, entity_id, operation, data });
        return text(`Change recorded: ${record.operation} ${record.entity_type}/${record.entity_id} @ ${record.timestamp}`);
      } catch (e) {
        return failure(e);
      }
    },
  );

  server.tool(
    "list_changes",
    "List journal records after a timestamp",
    {
      user_id: userParam,
      since: z.string().optional().describe("ISO timestamp (default: beginning of the journal)"),
      exclude_device_id: z.string().optional().describe("Leave out records from this device"),
    },
    async ({ user_id, since, exclude_device_id }) => {
      try {
        const from = since ? normalizeTimestamp(since, "since") : "1970-01-01T00:00:00.000Z";
        const records = queryChanges(resolveUser(user_id), from, exclude_device_id);
        if (records.length === 0) return text("No changes found.");
        const lines = records.map(
          (r) => `${r.timestamp} ${r.operation} ${r.entity_type}/${r.entity_id} from ${r.origin_device_id ?? "server"}`,
        );
        return text(`${records.length} change(s):\n${lines.join("\n")}`);
      } catch (e) {
        return failure(e);
      }
    },
  );

  server.tool(
    "compact_journal",
    "Delete journal records past retention that every device has pulled",
    {
      user_id: userParam,
      retention_days: z.number().positive().optional().describe("Days of history to keep (default from config)"),
    },
    async ({ user_id, retention_days }) => {
      try {
        const result = compactJournal(resolveUser(user_id), { retention_days });
        if (result.cutoff === null) return text("Nothing compacted: an active device has never synced.");
        return text(`Deleted ${result.deleted} record(s) older than ${result.cutoff}.`);
      } catch (e) {
        return failure(e);
      }
    },
  );

  // === STATUS ===

  server.tool("sync_stats", "Sync status summary for the user", { user_id: userParam }, async ({ user_id }) => {
    try {
      const stats = getSyncStats(resolveUser(user_id));
      return text(
        [
          `Devices: ${stats.active_devices} active / ${stats.total_devices} total`,
          `Last sync: ${stats.last_sync_at ?? "never"}`,
          `Pending changes: ${stats.pending_changes}`,
          `Unresolved conflicts: ${stats.unresolved_conflicts}`,
        ].join("\n"),
      );
    } catch (e) {
      return failure(e);
    }
  });

  server.tool(
    "list_sync_logs",
    "Recent pull and push runs",
    {
      user_id: userParam,
      device_id: z.string().optional().describe("Filter by device"),
      limit: z.number().int().positive().optional().describe("Maximum rows (default 20)"),
    },
    async ({ user_id, device_id, limit }) => {
      try {
        const logs = listSyncLogs(resolveUser(user_id), device_id, limit ?? 20);
        if (logs.length === 0) return text("No sync runs yet.");
        const lines = logs.map(
          (l) => `${l.completed_at} ${l.sync_type} ${l.status} ${l.device_id} ${l.items_synced} synced, ${l.items_failed} failed`,
        );
        return text(lines.join("\n"));
      } catch (e) {
        return failure(e);
      }
    },
  );

  // === RESOURCES ===

  server.resource(
    "conflicts",
    "notesync://conflicts",
    { description: "Open conflicts for the configured user", mimeType: "application/json" },
    async () => {
      const userId = getCurrentUserId();
      const conflicts = userId ? listConflicts(userId) : [];
      return {
        contents: [
          { uri: "notesync://conflicts", text: JSON.stringify(conflicts, null, 2), mimeType: "application/json" },
        ],
      };
    },
  );

  return server;
}
