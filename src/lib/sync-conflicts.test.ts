import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getDatabase, closeDatabase, resetDatabase } from "../db/database.js";
import { queryChanges } from "../db/changes.js";
import { createConflict, getConflict } from "../db/conflicts.js";
import { registerDevice } from "../db/devices.js";
import { getKnowledgeItem } from "../db/knowledge.js";
import { getTag } from "../db/tags.js";
import { noopLogger } from "./logger.js";
import type { SyncEvent } from "./notifier.js";
import { listConflicts, resolveConflict } from "./sync-conflicts.js";
import { pullChanges } from "./sync-pull.js";
import { pushChanges } from "./sync-push.js";
import type { SyncOptions } from "./sync-types.js";
import { ConflictNotFoundError, ValidationError } from "../types/index.js";

const USER = "user-1";
const T0 = "2020-01-01T00:00:00.000Z";
const EPOCH = "1970-01-01T00:00:00.000Z";
const quiet: SyncOptions = { logger: noopLogger };

beforeEach(() => {
  process.env["NOTESYNC_DB_PATH"] = ":memory:";
  resetDatabase();
  getDatabase();
  registerDevice(USER, { name: "Laptop", device_type: "desktop", device_id: "A" });
  registerDevice(USER, { name: "Phone", device_type: "mobile", device_id: "B" });
});

afterEach(() => {
  closeDatabase();
  delete process.env["NOTESYNC_DB_PATH"];
});

/** A creates X, B pulls, then B pushes an edit made against the state before A's write. */
function conflictOnX(): string {
  pushChanges(
    USER,
    {
      device_id: "A",
      changes: [
        { entity_type: "knowledge", entity_id: "X", operation: "create", data: { title: "From A", content: "a" }, as_of: T0 },
      ],
    },
    quiet,
  );
  pullChanges(USER, { device_id: "B" }, quiet);
  const result = pushChanges(
    USER,
    {
      device_id: "B",
      changes: [{ entity_type: "knowledge", entity_id: "X", operation: "update", data: { title: "From B" }, as_of: T0 }],
    },
    quiet,
  );
  expect(result.conflicts).toBe(1);
  const open = listConflicts(USER, quiet);
  expect(open).toHaveLength(1);
  return open[0]!.id;
}

describe("resolveConflict", () => {
  it("should keep the server version without journaling when resolution journaling is off", () => {
    const id = conflictOnX();

    expect(resolveConflict(USER, id, "device2", { ...quiet, settings: { journal_resolutions: false } })).toBe(true);

    expect(getKnowledgeItem("X")).toMatchObject({ title: "From A", content: "a" });
    expect(queryChanges(USER, EPOCH)).toHaveLength(1);
    expect(getConflict(id)).toMatchObject({ resolved: true, resolution: "device2" });
    expect(listConflicts(USER, quiet)).toEqual([]);
  });

  it("should apply the device's data and journal it as a server change", () => {
    const id = conflictOnX();
    resolveConflict(USER, id, "device1", quiet);

    expect(getKnowledgeItem("X")!.title).toBe("From B");
    const journal = queryChanges(USER, EPOCH);
    expect(journal).toHaveLength(2);
    expect(journal[1]).toMatchObject({ operation: "update", origin_device_id: null, data: { title: "From B" } });

    expect(pullChanges(USER, { device_id: "A" }, quiet).changes["knowledge"]!.map((c) => c.data)).toEqual([
      { title: "From B" },
    ]);
  });

  it("should replay a conflicting delete when the device side wins", () => {
    pushChanges(
      USER,
      {
        device_id: "A",
        changes: [
          { entity_type: "knowledge", entity_id: "X", operation: "create", data: { title: "From A", content: "a" }, as_of: T0 },
        ],
      },
      quiet,
    );
    const result = pushChanges(
      USER,
      { device_id: "B", changes: [{ entity_type: "knowledge", entity_id: "X", operation: "delete", data: {}, as_of: T0 }] },
      quiet,
    );
    expect(result.conflicts).toBe(1);
    const conflict = listConflicts(USER, quiet)[0]!;
    expect(conflict.device1_operation).toBe("delete");

    resolveConflict(USER, conflict.id, "device1", quiet);

    expect(getKnowledgeItem("X")!.is_deleted).toBe(true);
    const journal = queryChanges(USER, EPOCH);
    expect(journal).toHaveLength(2);
    expect(journal[1]).toMatchObject({ operation: "delete", origin_device_id: null, data: {} });
  });

  it("should refuse to resolve the same conflict twice", () => {
    const id = conflictOnX();
    resolveConflict(USER, id, "device1", quiet);
    expect(() => resolveConflict(USER, id, "device2", quiet)).toThrow(ConflictNotFoundError);
    expect(getKnowledgeItem("X")!.title).toBe("From B");
  });

  it("should hide conflicts of other users", () => {
    const id = conflictOnX();
    expect(() => resolveConflict("user-2", id, "device1", quiet)).toThrow(`Conflict not found: ${id}`);
    expect(() => resolveConflict(USER, "missing", "device1", quiet)).toThrow(ConflictNotFoundError);
  });

  it("should not execute merge or manual resolutions", () => {
    const id = conflictOnX();
    expect(() => resolveConflict(USER, id, "merge", quiet)).toThrow(ValidationError);
    expect(() => resolveConflict(USER, id, "manual", quiet)).toThrow(ValidationError);
    expect(getConflict(id)!.resolved).toBe(false);
  });

  it("should apply nothing for an empty side", () => {
    const conflict = createConflict(USER, {
      entity_type: "tag",
      entity_id: "t1",
      device1_id: "A",
      device1_data: { name: "new" },
      device2_data: {},
    });

    resolveConflict(USER, conflict.id, "device2", quiet);
    expect(getTag("t1")).toBeNull();
    expect(queryChanges(USER, EPOCH)).toEqual([]);
    expect(getConflict(conflict.id)!.resolved).toBe(true);
  });

  it("should notify with the resolved conflict", () => {
    const id = conflictOnX();
    const events: SyncEvent[] = [];
    resolveConflict(USER, id, "device2", { ...quiet, notifier: (e) => events.push(e) });

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "conflict_resolved",
      user_id: USER,
      conflict: { id, resolved: true, resolution: "device2" },
    });
  });
});

describe("listConflicts", () => {
  it("should list open conflicts newest first", () => {
    const input = { entity_type: "tag", device1_id: "A", device1_data: {}, device2_data: {} };
    const first = createConflict(USER, { ...input, entity_id: "t1" });
    const second = createConflict(USER, { ...input, entity_id: "t2" });
    expect(listConflicts(USER, quiet).map((c) => c.id)).toEqual([second.id, first.id]);
  });
});
