import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  getDatabase,
  closeDatabase,
  resetDatabase,
  resolvePartialId,
  parseJsonObject,
  now,
  uuid,
  shortUuid,
} from "./database.js";
import type { Database } from "./database.js";
import { createConflict } from "./conflicts.js";

let db: Database;

beforeEach(() => {
  process.env["NOTESYNC_DB_PATH"] = ":memory:";
  resetDatabase();
  db = getDatabase();
});

afterEach(() => {
  closeDatabase();
  delete process.env["NOTESYNC_DB_PATH"];
});

describe("migrations", () => {
  it("should create every table and record five migrations", () => {
    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((t) => t.name);
    expect(tables).toEqual([
      "_migrations",
      "categories",
      "knowledge_items",
      "sync_changes",
      "sync_conflicts",
      "sync_devices",
      "sync_logs",
      "tags",
    ]);
    const level = db.prepare<[], { max_id: number }>("SELECT MAX(id) as max_id FROM _migrations").get();
    expect(level!.max_id).toBe(5);
  });

  it("should return the same connection until closed", () => {
    expect(getDatabase()).toBe(db);
    closeDatabase();
    const reopened = getDatabase();
    expect(reopened).not.toBe(db);
    db = reopened;
  });
});

describe("resolvePartialId", () => {
  function conflict() {
    return createConflict(
      "user-1",
      { entity_type: "tag", entity_id: "t1", device1_id: "phone", device1_data: {}, device2_data: {} },
      db,
    );
  }

  it("should match an exact full UUID", () => {
    const c = conflict();
    expect(resolvePartialId(db, "sync_conflicts", c.id, "user-1")).toBe(c.id);
    expect(resolvePartialId(db, "sync_conflicts", c.id, "user-2")).toBeNull();
  });

  it("should find a unique match with an 8-char prefix", () => {
    const c = conflict();
    expect(resolvePartialId(db, "sync_conflicts", c.id.substring(0, 8), "user-1")).toBe(c.id);
  });

  it("should only look at the user's rows and match wildcards literally", () => {
    const insert = db.prepare(
      `INSERT INTO sync_conflicts (id, user_id, entity_type, entity_id, device1_id, device2_id, device1_data, device2_data, created_at)
       VALUES (?, ?, 'tag', 't1', 'phone', 'server', '{}', '{}', ?)`,
    );
    insert.run("abc-1", "user-1", now());
    insert.run("abc-2", "user-2", now());
    insert.run("a_c%3", "user-1", now());

    expect(resolvePartialId(db, "sync_conflicts", "abc", "user-1")).toBe("abc-1");
    expect(resolvePartialId(db, "sync_conflicts", "abc", "user-2")).toBe("abc-2");
    expect(resolvePartialId(db, "sync_conflicts", "a_c", "user-1")).toBe("a_c%3");
    expect(resolvePartialId(db, "sync_conflicts", "a%", "user-1")).toBeNull();
  });

  it("should return null for a non-existent full UUID", () => {
    expect(resolvePartialId(db, "sync_conflicts", "00000000-0000-0000-0000-000000000000", "user-1")).toBeNull();
  });
});

describe("helpers", () => {
  it("should produce ISO timestamps and ids of the expected shape", () => {
    expect(now()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(uuid()).toHaveLength(36);
    expect(shortUuid()).toHaveLength(8);
  });

  it("should parse only JSON objects", () => {
    expect(parseJsonObject('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonObject(null)).toEqual({});
    expect(parseJsonObject("[1,2]")).toEqual({});
    expect(parseJsonObject("null")).toEqual({});
  });
});
