import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { getDatabase, closeDatabase, resetDatabase } from "../db/database.js";
import { listOpenConflicts } from "../db/conflicts.js";
import { getDevice } from "../db/devices.js";
import { getKnowledgeItem } from "../db/knowledge.js";
import { createProgram } from "./program.js";

let log: MockInstance<typeof console.log>;
let err: MockInstance<typeof console.error>;
let dir: string;

beforeEach(() => {
  process.env["NOTESYNC_DB_PATH"] = ":memory:";
  resetDatabase();
  getDatabase();
  dir = mkdtempSync(join(tmpdir(), "notesync-cli-"));
  log = vi.spyOn(console, "log").mockImplementation(() => {});
  err = vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  closeDatabase();
  delete process.env["NOTESYNC_DB_PATH"];
  rmSync(dir, { recursive: true, force: true });
});

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(["--user", "user-1", ...args], { from: "user" });
}

function lastJson(): unknown {
  const calls = log.mock.calls;
  return JSON.parse(String(calls[calls.length - 1]![0]));
}

function writePush(changes: unknown): string {
  const path = join(dir, "changes.json");
  writeFileSync(path, JSON.stringify(changes));
  return path;
}

describe("CLI", () => {
  it("should register and list devices", async () => {
    await run("--json", "device", "register", "laptop-1", "--name", "Laptop", "--type", "desktop");
    expect(lastJson()).toMatchObject({ device_id: "laptop-1", device_type: "desktop", is_active: true });

    await run("--json", "device", "list");
    expect(lastJson()).toHaveLength(1);
  });

  it("should push from a file and pull on another device", async () => {
    await run("device", "register", "A", "--name", "Laptop");
    await run("device", "register", "B", "--name", "Phone");
    const file = writePush({
      changes: [
        {
          entity_type: "knowledge",
          entity_id: "X",
          operation: "create",
          data: { title: "From A", content: "" },
          as_of: "2020-01-01T00:00:00.000Z",
        },
      ],
    });

    await run("--json", "push", "A", file);
    expect(lastJson()).toMatchObject({ applied: 1, conflicts: 0, errored: 0, errors: [] });
    expect(getKnowledgeItem("X")!.title).toBe("From A");

    await run("--json", "pull", "B");
    expect(lastJson()).toMatchObject({
      changes: { knowledge: [{ id: "X", operation: "create" }], category: [], tag: [] },
      has_conflicts: false,
    });
    expect(getDevice("B")!.last_sync_at).not.toBeNull();
  });

  it("should accept a bare array of changes and resolve conflicts by ID prefix", async () => {
    await run("device", "register", "A", "--name", "Laptop");
    await run("device", "register", "B", "--name", "Phone");
    const stale = {
      entity_type: "knowledge",
      entity_id: "X",
      data: { title: "From B" },
      as_of: "2020-01-01T00:00:00.000Z",
    };
    await run("push", "A", writePush([{ ...stale, operation: "create", data: { title: "From A", content: "" } }]));
    await run("--json", "push", "B", writePush([{ ...stale, operation: "update" }]));
    expect(lastJson()).toMatchObject({ applied: 0, conflicts: 1 });

    const conflict = listOpenConflicts("user-1")[0]!;
    await run("conflicts", "resolve", conflict.id.slice(0, 8), "device1");
    expect(getKnowledgeItem("X")!.title).toBe("From B");
    expect(listOpenConflicts("user-1")).toEqual([]);
  });

  it("should record server changes and show them in the journal", async () => {
    await run("change", "tag", "t1", "create", "--data", '{"name":"inbox"}');
    await run("--json", "journal", "list");
    expect(lastJson()).toMatchObject([{ entity_type: "tag", entity_id: "t1", origin_device_id: null }]);
  });

  it("should print stats as JSON", async () => {
    await run("device", "register", "A", "--name", "Laptop");
    await run("--json", "stats");
    expect(lastJson()).toEqual({
      total_devices: 1,
      active_devices: 1,
      last_sync_at: null,
      pending_changes: 0,
      unresolved_conflicts: 0,
    });
  });

  it("should exit non-zero with the error message", async () => {
    const exit = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });

    await expect(run("pull", "ghost")).rejects.toThrow("process.exit");
    expect(exit).toHaveBeenCalledWith(1);
    expect(String(err.mock.calls[0]![0])).toContain("Device not found: ghost");
  });

  it("should reject an unknown resolution side", async () => {
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });

    await expect(run("conflicts", "resolve", "abc", "merge")).rejects.toThrow("process.exit");
    expect(String(err.mock.calls[0]![0])).toContain("Could not resolve conflict ID: abc");
  });
});
