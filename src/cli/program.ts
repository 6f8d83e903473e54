import { Command } from "commander";
import chalk from "chalk";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { getDatabase, resolvePartialId } from "../db/database.js";
import { queryChanges } from "../db/changes.js";
import { deactivateDevice, listDevices, registerDevice } from "../db/devices.js";
import { listSyncLogs } from "../db/sync-logs.js";
import { getCurrentUserId } from "../lib/config.js";
import { commitServerChange, serverChangeSchema } from "../lib/server-changes.js";
import { getSyncStats, compactJournal } from "../lib/sync.js";
import { listConflicts, resolveConflict } from "../lib/sync-conflicts.js";
import { pullChanges } from "../lib/sync-pull.js";
import { pushChanges } from "../lib/sync-push.js";
import { pushRequestSchema } from "../lib/sync-types.js";
import { normalizeTimestamp, parseRequest } from "../lib/sync-utils.js";
import type { ChangeOperation, ChangeRecord, Conflict, Device, DeviceType } from "../types/index.js";
import { DEVICE_TYPES, EXECUTABLE_RESOLUTIONS, ValidationError } from "../types/index.js";

type GlobalOptions = {
  user?: string;
  json?: boolean;
};

function getPackageVersion(): string {
  try {
    const pkgPath = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "package.json");
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") return pkg.version;
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function handleError(e: unknown): never {
  console.error(chalk.red(e instanceof Error ? e.message : String(e)));
  process.exit(1);
}

function output(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

function parseJson(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ValidationError(`${label} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function oneOf<T extends string>(values: readonly T[], value: string, label: string): T {
  const match = values.find((v) => v === value);
  if (!match) throw new ValidationError(`Invalid ${label}: ${value} (expected ${values.join(", ")})`);
  return match;
}

/** A push file holds either a bare array of changes or `{ "changes": [...] }`. */
function readChanges(file: string | undefined): unknown {
  const text = !file || file === "-" ? readFileSync(0, "utf-8") : readFileSync(file, "utf-8");
  const parsed = parseJson(text, file && file !== "-" ? file : "stdin");
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed) && "changes" in parsed) return parsed.changes;
  return parsed;
}

function resolveConflictId(userId: string, partialId: string): string {
  const id = resolvePartialId(getDatabase(), "sync_conflicts", partialId, userId);
  if (!id) throw new ValidationError(`Could not resolve conflict ID: ${partialId}`);
  return id;
}

const deviceTypeColors: Record<DeviceType, (s: string) => string> = {
  web: chalk.blue,
  mobile: chalk.magenta,
  desktop: chalk.cyan,
};

const operationColors: Record<ChangeOperation, (s: string) => string> = {
  create: chalk.green,
  update: chalk.yellow,
  delete: chalk.red,
};

export function formatDeviceLine(d: Device): string {
  const synced = d.last_sync_at ? chalk.dim(`synced ${d.last_sync_at}`) : chalk.dim("never synced");
  return `${chalk.bold(d.device_id)} ${deviceTypeColors[d.device_type](d.device_type.padEnd(7))} ${d.name} ${synced}`;
}

export function formatChangeLine(c: ChangeRecord): string {
  const origin = c.origin_device_id ? chalk.cyan(c.origin_device_id) : chalk.magenta("server");
  return `${chalk.dim(c.timestamp)} ${operationColors[c.operation](c.operation.padEnd(6))} ${c.entity_type}/${c.entity_id} ${origin}`;
}

export function formatConflictLine(c: Conflict): string {
  return `${chalk.dim(c.id.slice(0, 8))} ${c.entity_type}/${c.entity_id} ${chalk.yellow(c.device1_id)} vs ${chalk.magenta(c.device2_id)} ${chalk.dim(c.created_at)}`;
}

export function createProgram(): Command {
  const program = new Command();

  function requireUser(): string {
    const userId = getCurrentUserId(program.opts<GlobalOptions>().user);
    if (!userId) throw new ValidationError("No user id: pass --user, set NOTESYNC_USER_ID or user_id in config");
    return userId;
  }

  function jsonMode(): boolean {
    return program.opts<GlobalOptions>().json === true;
  }

  program
    .name("notesync")
    .description("Multi-device sync for notes, categories and tags")
    .version(getPackageVersion())
    .option("--user <id>", "Acting user ID")
    .option("--json", "Output as JSON");

  // === DEVICES ===

  const device = program.command("device").description("Manage sync devices");

  device
    .command("register <device-id>")
    .description("Register (or re-activate) a device")
    .requiredOption("-n, --name <name>", "Device name")
    .option("-t, --type <type>", `Device type: ${DEVICE_TYPES.join(", ")}`, "web")
    .action((deviceId: string, opts: { name: string; type: string }) => {
      try {
        const registered = registerDevice(requireUser(), {
          device_id: deviceId,
          name: opts.name,
          device_type: oneOf(DEVICE_TYPES, opts.type, "device type"),
        });
        if (jsonMode()) {
          output(registered);
          return;
        }
        console.log(chalk.green("Device registered:"));
        console.log(formatDeviceLine(registered));
      } catch (e) {
        handleError(e);
      }
    });

  device
    .command("list")
    .description("List active devices")
    .action(() => {
      try {
        const devices = listDevices(requireUser());
        if (jsonMode()) {
          output(devices);
          return;
        }
        if (devices.length === 0) {
          console.log(chalk.dim("No devices registered. Use 'notesync device register <device-id>' to add one."));
          return;
        }
        for (const d of devices) console.log(formatDeviceLine(d));
      } catch (e) {
        handleError(e);
      }
    });

  device
    .command("remove <device-id>")
    .alias("deactivate")
    .description("Deactivate a device")
    .action((deviceId: string) => {
      try {
        deactivateDevice(requireUser(), deviceId);
        if (jsonMode()) {
          output({ device_id: deviceId, deactivated: true });
          return;
        }
        console.log(chalk.green(`Device deactivated: ${deviceId}`));
      } catch (e) {
        handleError(e);
      }
    });

  // === SYNC ===

  program
    .command("pull <device-id>")
    .description("Fetch changes the device has not seen yet")
    .option("--since <timestamp>", "Override the device checkpoint")
    .action((deviceId: string, opts: { since?: string }) => {
      try {
        const result = pullChanges(requireUser(), { device_id: deviceId, since: opts.since });
        if (jsonMode()) {
          output(result);
          return;
        }
        const total = Object.values(result.changes).reduce((sum, list) => sum + list.length, 0);
        console.log(chalk.bold(`${total} change(s) since last sync`));
        for (const [type, changes] of Object.entries(result.changes)) {
          if (changes.length === 0) continue;
          console.log(`  ${chalk.cyan(type)}: ${changes.length}`);
          for (const c of changes) {
            console.log(`    ${operationColors[c.operation](c.operation.padEnd(6))} ${c.id} ${chalk.dim(c.timestamp)}`);
          }
        }
        console.log(chalk.dim(`Sync time: ${result.sync_time}`));
        if (result.has_conflicts) console.log(chalk.yellow("Open conflicts need attention: notesync conflicts list"));
      } catch (e) {
        handleError(e);
      }
    });

  program
    .command("push <device-id> [file]")
    .description("Push changes from a JSON file (or stdin)")
    .action((deviceId: string, file: string | undefined) => {
      try {
        const request = parseRequest(pushRequestSchema, { device_id: deviceId, changes: readChanges(file) }, "push request");
        const result = pushChanges(requireUser(), request);
        if (jsonMode()) {
          output(result);
          return;
        }
        console.log(
          `${chalk.green(`${result.applied} applied`)}, ${chalk.yellow(`${result.conflicts} conflict(s)`)}, ${chalk.red(`${result.errored} error(s)`)}`,
        );
        for (const err of result.errors) console.log(chalk.red(`  ${err}`));
        console.log(chalk.dim(`Sync time: ${result.sync_time}`));
      } catch (e) {
        handleError(e);
      }
    });

  // === CONFLICTS ===

  const conflicts = program.command("conflicts").description("Inspect and resolve sync conflicts");

  conflicts
    .command("list", { isDefault: true })
    .description("List open conflicts, newest first")
    .action(() => {
      try {
        const open = listConflicts(requireUser());
        if (jsonMode()) {
          output(open);
          return;
        }
        if (open.length === 0) {
          console.log(chalk.dim("No open conflicts."));
          return;
        }
        console.log(chalk.bold(`${open.length} open conflict(s):\n`));
        for (const c of open) console.log(formatConflictLine(c));
      } catch (e) {
        handleError(e);
      }
    });

  conflicts
    .command("resolve <id> <side>")
    .description(`Resolve a conflict by keeping one side: ${EXECUTABLE_RESOLUTIONS.join(", ")}`)
    .action((id: string, side: string) => {
      try {
        const userId = requireUser();
        const conflictId = resolveConflictId(userId, id);
        resolveConflict(userId, conflictId, oneOf(EXECUTABLE_RESOLUTIONS, side, "resolution"));
        if (jsonMode()) {
          output({ conflict_id: conflictId, resolution: side, resolved: true });
          return;
        }
        console.log(chalk.green(`Conflict ${conflictId.slice(0, 8)} resolved with ${side}.`));
      } catch (e) {
        handleError(e);
      }
    });

  // === JOURNAL ===

  program
    .command("change <entity-type> <entity-id> <operation>")
    .description("Record a server-side change")
    .option("-d, --data <json>", "Entity data as JSON", "{}")
    .action((entityType: string, entityId: string, operation: string, opts: { data: string }) => {
      try {
        const change = parseRequest(
          serverChangeSchema,
          { entity_type: entityType, entity_id: entityId, operation, data: parseJson(opts.data, "--data") },
          "server change",
        );
        const record = commitServerChange(requireUser(), change);
        if (jsonMode()) {
          output(record);
          return;
        }
        console.log(chalk.green("Change recorded:"));
        console.log(formatChangeLine(record));
      } catch (e) {
        handleError(e);
      }
    });

  const journal = program.command("journal").description("Inspect and compact the change journal");

  journal
    .command("list", { isDefault: true })
    .description("List journal records")
    .option("--since <timestamp>", "Only records after this time", "1970-01-01T00:00:00.000Z")
    .option("--exclude <device-id>", "Leave out records from this device")
    .action((opts: { since: string; exclude?: string }) => {
      try {
        const records = queryChanges(requireUser(), normalizeTimestamp(opts.since, "since"), opts.exclude);
        if (jsonMode()) {
          output(records);
          return;
        }
        if (records.length === 0) {
          console.log(chalk.dim("Journal is empty."));
          return;
        }
        for (const r of records) console.log(formatChangeLine(r));
      } catch (e) {
        handleError(e);
      }
    });

  journal
    .command("compact")
    .description("Delete records every device has already pulled")
    .option("--retention-days <days>", "Keep at least this many days of history")
    .action((opts: { retentionDays?: string }) => {
      try {
        const days = opts.retentionDays === undefined ? undefined : Number(opts.retentionDays);
        if (days !== undefined && !(days > 0)) {
          throw new ValidationError(`Invalid retention days: ${opts.retentionDays}`);
        }
        const result = compactJournal(requireUser(), { retention_days: days });
        if (jsonMode()) {
          output(result);
          return;
        }
        if (result.cutoff === null) {
          console.log(chalk.yellow("Nothing compacted: an active device has never synced."));
          return;
        }
        console.log(chalk.green(`Deleted ${result.deleted} record(s) older than ${result.cutoff}.`));
      } catch (e) {
        handleError(e);
      }
    });

  // === STATUS ===

  program
    .command("stats")
    .description("Show sync status for the user")
    .action(() => {
      try {
        const stats = getSyncStats(requireUser());
        if (jsonMode()) {
          output(stats);
          return;
        }
        console.log(`  ${chalk.dim("Devices:")}   ${stats.active_devices} active / ${stats.total_devices} total`);
        console.log(`  ${chalk.dim("Last sync:")} ${stats.last_sync_at ?? "never"}`);
        console.log(`  ${chalk.dim("Pending:")}   ${stats.pending_changes}`);
        const conflictsFn = stats.unresolved_conflicts > 0 ? chalk.yellow : chalk.green;
        console.log(`  ${chalk.dim("Conflicts:")} ${conflictsFn(String(stats.unresolved_conflicts))}`);
      } catch (e) {
        handleError(e);
      }
    });

  program
    .command("logs")
    .description("Show recent sync runs")
    .option("--device <device-id>", "Filter by device")
    .option("--limit <n>", "Maximum rows", "20")
    .action((opts: { device?: string; limit: string }) => {
      try {
        const logs = listSyncLogs(requireUser(), opts.device, Number(opts.limit) || 20);
        if (jsonMode()) {
          output(logs);
          return;
        }
        if (logs.length === 0) {
          console.log(chalk.dim("No sync runs yet."));
          return;
        }
        for (const l of logs) {
          const statusFn = l.status === "completed" ? chalk.green : chalk.red;
          console.log(
            `${chalk.dim(l.completed_at)} ${l.sync_type.padEnd(4)} ${statusFn(l.status.padEnd(9))} ${l.device_id} ${l.items_synced} synced, ${l.items_failed} failed`,
          );
        }
      } catch (e) {
        handleError(e);
      }
    });

  return program;
}
