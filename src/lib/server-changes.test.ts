import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getDatabase, closeDatabase, resetDatabase } from "../db/database.js";
import { queryChanges } from "../db/changes.js";
import { getCategory } from "../db/categories.js";
import { noopLogger } from "./logger.js";
import { commitServerChange } from "./server-changes.js";
import { ValidationError } from "../types/index.js";

const USER = "user-1";
const EPOCH = "1970-01-01T00:00:00.000Z";

beforeEach(() => {
  process.env["NOTESYNC_DB_PATH"] = ":memory:";
  resetDatabase();
  getDatabase();
});

afterEach(() => {
  closeDatabase();
  delete process.env["NOTESYNC_DB_PATH"];
});

describe("commitServerChange", () => {
  it("should apply the change and journal it without an origin", () => {
    const record = commitServerChange(
      USER,
      { entity_type: "category", entity_id: "c1", operation: "create", data: { name: "Inbox" } },
      { logger: noopLogger },
    );

    expect(getCategory("c1")!.name).toBe("Inbox");
    expect(record.origin_device_id).toBeNull();
    expect(queryChanges(USER, EPOCH)).toEqual([record]);
  });

  it("should default data to an empty object", () => {
    commitServerChange(USER, { entity_type: "category", entity_id: "c1", operation: "create", data: { name: "Inbox" } }, {
      logger: noopLogger,
    });
    const record = commitServerChange(USER, { entity_type: "category", entity_id: "c1", operation: "delete" }, {
      logger: noopLogger,
    });
    expect(record.data).toEqual({});
    expect(getCategory("c1")!.is_active).toBe(false);
  });

  it("should journal nothing when the apply fails", () => {
    expect(() =>
      commitServerChange(USER, { entity_type: "category", entity_id: "c1", operation: "update", data: { name: "X" } }, {
        logger: noopLogger,
      }),
    ).toThrow("category not found: c1");
    expect(queryChanges(USER, EPOCH)).toEqual([]);
  });

  it("should reject unknown entity types", () => {
    expect(() =>
      commitServerChange(USER, { entity_type: "folder", entity_id: "f1", operation: "delete" }, { logger: noopLogger }),
    ).toThrow(ValidationError);
  });
});
