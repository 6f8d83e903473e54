import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getDatabase, closeDatabase, resetDatabase } from "../db/database.js";
import type { Database } from "../db/database.js";
import { deactivateDevice, getDevice, registerDevice } from "../db/devices.js";
import { createConflict } from "../db/conflicts.js";
import { listSyncLogs } from "../db/sync-logs.js";
import { noopLogger } from "./logger.js";
import type { SyncEvent } from "./notifier.js";
import { commitServerChange } from "./server-changes.js";
import { pullChanges } from "./sync-pull.js";
import { pushChanges } from "./sync-push.js";
import { daysAgo } from "./sync-utils.js";
import { DeviceNotFoundError, ValidationError } from "../types/index.js";

const USER = "user-1";
const PAST = "2020-01-01T00:00:00.000Z";

let db: Database;

beforeEach(() => {
  process.env["NOTESYNC_DB_PATH"] = ":memory:";
  resetDatabase();
  db = getDatabase();
  registerDevice(USER, { name: "Laptop", device_type: "desktop", device_id: "A" });
  registerDevice(USER, { name: "Phone", device_type: "mobile", device_id: "B" });
});

afterEach(() => {
  closeDatabase();
  delete process.env["NOTESYNC_DB_PATH"];
});

function pushNote(deviceId: string, id: string, title: string) {
  return pushChanges(
    USER,
    {
      device_id: deviceId,
      changes: [{ entity_type: "knowledge", entity_id: id, operation: "create", data: { title, content: "" }, as_of: PAST }],
    },
    { logger: noopLogger },
  );
}

function insertChange(timestamp: string, entityId: string): void {
  db.prepare(
    `INSERT INTO sync_changes (id, user_id, entity_type, entity_id, operation, data, origin_device_id, timestamp, delivered)
     VALUES (?, ?, 'tag', ?, 'update', '{}', NULL, ?, 0)`,
  ).run(`c-${entityId}`, USER, entityId, timestamp);
}

describe("pullChanges", () => {
  it("should require a registered, active device of the user", () => {
    expect(() => pullChanges(USER, { device_id: "nope" }, { logger: noopLogger })).toThrow(DeviceNotFoundError);
    expect(() => pullChanges("user-2", { device_id: "A" }, { logger: noopLogger })).toThrow(DeviceNotFoundError);

    deactivateDevice(USER, "B");
    expect(() => pullChanges(USER, { device_id: "B" }, { logger: noopLogger })).toThrow(DeviceNotFoundError);
  });

  it("should group changes by entity type with every type present", () => {
    pushNote("A", "k1", "First");

    const result = pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    expect(Object.keys(result.changes)).toEqual(["knowledge", "category", "tag"]);
    expect(result.changes["category"]).toEqual([]);
    expect(result.changes["knowledge"]).toHaveLength(1);
    expect(result.changes["knowledge"]![0]).toMatchObject({
      id: "k1",
      operation: "create",
      data: { title: "First", content: "" },
    });
  });

  it("should never echo a device's own changes", () => {
    pushNote("A", "k1", "First");
    const result = pullChanges(USER, { device_id: "A" }, { logger: noopLogger });
    expect(result.changes["knowledge"]).toEqual([]);
  });

  it("should deliver server-origin changes to every device", () => {
    commitServerChange(USER, { entity_type: "tag", entity_id: "t1", operation: "create", data: { name: "web" } }, {
      logger: noopLogger,
    });
    expect(pullChanges(USER, { device_id: "A" }, { logger: noopLogger }).changes["tag"]).toHaveLength(1);
    expect(pullChanges(USER, { device_id: "B" }, { logger: noopLogger }).changes["tag"]).toHaveLength(1);
  });

  it("should advance the checkpoint to the newest delivered change", () => {
    pushNote("A", "k1", "First");
    const pushed = pushNote("A", "k2", "Second");
    expect(pushed.applied).toBe(1);

    const first = pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    const newest = first.changes["knowledge"]![1]!.timestamp;
    expect(first.sync_time).toBe(newest);
    expect(getDevice("B")!.last_sync_at).toBe(newest);

    const second = pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    expect(second.changes["knowledge"]).toEqual([]);
    expect(second.sync_time).toBe(newest);
    expect(getDevice("B")!.last_sync_at).toBe(newest);
  });

  it("should deliver changes newer than the checkpoint exactly once", () => {
    pushNote("A", "k1", "First");
    pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    pushNote("A", "k2", "Second");

    const result = pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    expect(result.changes["knowledge"]!.map((c) => c.id)).toEqual(["k2"]);
  });

  it("should look back a limited window for never-synced devices", () => {
    insertChange(daysAgo(40), "old");
    insertChange(daysAgo(10), "recent");

    const result = pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    expect(result.changes["tag"]!.map((c) => c.id)).toEqual(["recent"]);

    const wider = pullChanges(USER, { device_id: "A" }, { logger: noopLogger, settings: { pull_lookback_days: 60 } });
    expect(wider.changes["tag"]!.map((c) => c.id)).toEqual(["old", "recent"]);
  });

  it("should honour an explicit since", () => {
    insertChange("2024-01-01T00:00:00.000Z", "t1");
    insertChange("2024-02-01T00:00:00.000Z", "t2");

    const result = pullChanges(USER, { device_id: "B", since: "2024-01-15T00:00:00Z" }, { logger: noopLogger });
    expect(result.changes["tag"]!.map((c) => c.id)).toEqual(["t2"]);
    expect(() => pullChanges(USER, { device_id: "B", since: "yesterday" }, { logger: noopLogger })).toThrow(
      ValidationError,
    );
  });

  it("should never move the checkpoint backwards", () => {
    insertChange("2024-01-01T00:00:00.000Z", "t1");
    pullChanges(USER, { device_id: "B", since: "2023-12-01T00:00:00.000Z" }, { logger: noopLogger });
    expect(getDevice("B")!.last_sync_at).toBe("2024-01-01T00:00:00.000Z");

    insertChange("2024-03-01T00:00:00.000Z", "t2");
    pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    pullChanges(USER, { device_id: "B", since: "2023-12-01T00:00:00.000Z" }, { logger: noopLogger });
    expect(getDevice("B")!.last_sync_at).toBe("2024-03-01T00:00:00.000Z");
  });

  it("should move the checkpoint to now under the now strategy", () => {
    const before = new Date().toISOString();
    const result = pullChanges(USER, { device_id: "B" }, { logger: noopLogger, settings: { checkpoint_strategy: "now" } });
    expect(result.sync_time >= before).toBe(true);
    expect(getDevice("B")!.last_sync_at).toBe(result.sync_time);
  });

  it("should leave a never-synced checkpoint unset when nothing is delivered", () => {
    const result = pullChanges(USER, { device_id: "B" }, { logger: noopLogger });
    expect(getDevice("B")!.last_sync_at).toBeNull();
    expect(result.sync_time < new Date().toISOString()).toBe(true);
  });

  it("should report open conflicts", () => {
    expect(pullChanges(USER, { device_id: "B" }, { logger: noopLogger }).has_conflicts).toBe(false);
    createConflict(USER, { entity_type: "tag", entity_id: "t1", device1_id: "A", device1_data: {}, device2_data: {} });
    expect(pullChanges(USER, { device_id: "B" }, { logger: noopLogger }).has_conflicts).toBe(true);
  });

  it("should log the run and notify", () => {
    pushNote("A", "k1", "First");
    const events: SyncEvent[] = [];
    const result = pullChanges(USER, { device_id: "B" }, { logger: noopLogger, notifier: (e) => events.push(e) });

    const logs = listSyncLogs(USER, "B");
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({ sync_type: "pull", status: "completed", items_synced: 1 });
    expect(events).toEqual([
      { type: "sync_completed", user_id: USER, device_id: "B", direction: "pull", items: 1, sync_time: result.sync_time },
    ]);
  });
});
