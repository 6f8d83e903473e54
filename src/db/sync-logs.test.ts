import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getDatabase, closeDatabase, resetDatabase } from "./database.js";
import { createSyncLog, listSyncLogs } from "./sync-logs.js";

beforeEach(() => {
  process.env["NOTESYNC_DB_PATH"] = ":memory:";
  resetDatabase();
  getDatabase();
});

afterEach(() => {
  closeDatabase();
  delete process.env["NOTESYNC_DB_PATH"];
});

describe("createSyncLog", () => {
  it("should store a run with defaults for failures", () => {
    const log = createSyncLog("user-1", {
      device_id: "phone",
      sync_type: "pull",
      status: "completed",
      items_synced: 3,
      started_at: "2024-01-01T00:00:00.000Z",
    });
    expect(log.items_synced).toBe(3);
    expect(log.items_failed).toBe(0);
    expect(log.error_message).toBeNull();
    expect(log.sync_type).toBe("pull");
    expect(log.started_at).toBe("2024-01-01T00:00:00.000Z");
  });
});

describe("listSyncLogs", () => {
  it("should filter by device and honour the limit", () => {
    for (let i = 0; i < 3; i++) {
      createSyncLog("user-1", {
        device_id: "phone",
        sync_type: "push",
        status: "completed",
        items_synced: i,
        started_at: "2024-01-01T00:00:00.000Z",
      });
    }
    createSyncLog("user-1", {
      device_id: "laptop",
      sync_type: "push",
      status: "failed",
      items_synced: 0,
      items_failed: 2,
      error_message: "boom",
      started_at: "2024-01-01T00:00:00.000Z",
    });

    expect(listSyncLogs("user-1")).toHaveLength(4);
    expect(listSyncLogs("user-1", "phone")).toHaveLength(3);
    expect(listSyncLogs("user-1", "phone", 2)).toHaveLength(2);
    expect(listSyncLogs("user-1", "laptop")[0]!.status).toBe("failed");
    expect(listSyncLogs("user-2")).toEqual([]);
  });
});
