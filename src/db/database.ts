import BetterSqlite3 from "better-sqlite3";
import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

export type Database = BetterSqlite3.Database;

function isInMemoryDb(path: string): boolean {
  return path === ":memory:" || path.startsWith("file::memory:");
}

function findNearestNotesyncDb(startDir: string): string | null {
  let dir = resolve(startDir);
  while (true) {
    const candidate = join(dir, ".notesync", "notesync.db");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function getDbPath(): string {
  // 1. Environment variable override
  if (process.env["NOTESYNC_DB_PATH"]) {
    return process.env["NOTESYNC_DB_PATH"];
  }

  // 2. .notesync/notesync.db in cwd or any parent
  const nearest = findNearestNotesyncDb(process.cwd());
  if (nearest) return nearest;

  // 3. Default: ~/.notesync/notesync.db
  const home = process.env["HOME"] || process.env["USERPROFILE"] || "~";
  return join(home, ".notesync", "notesync.db");
}

function ensureDir(filePath: string): void {
  if (isInMemoryDb(filePath)) return;
  const dir = dirname(resolve(filePath));
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

const MIGRATIONS = [
  // Migration 1: Device registry and change journal
  `
  CREATE TABLE IF NOT EXISTS sync_devices (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    device_type TEXT NOT NULL CHECK(device_type IN ('web', 'mobile', 'desktop')),
    device_id TEXT NOT NULL UNIQUE,
    last_sync_at TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_sync_devices_user ON sync_devices(user_id);

  CREATE TABLE IF NOT EXISTS sync_changes (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    entity_type TEXT NOT NULL,
    entity_id TEXT NOT NULL,
    operation TEXT NOT NULL CHECK(operation IN ('create', 'update', 'delete')),
    data TEXT NOT NULL DEFAULT '{}',
    origin_device_id TEXT,
    timestamp TEXT NOT NULL,
    delivered INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_sync_changes_user_ts ON sync_changes(user_id, timestamp);
  CREATE INDEX IF NOT EXISTS idx_sync_changes_entity ON sync_changes(user_id, entity_type, entity_id, timestamp);

  CREATE TABLE IF NOT EXISTS _migrations (
    id INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  INSERT OR IGNORE INTO _migrations (id) VALUES (1);
  `,
  // Migration 2: Conflicts
  `
  CREATE TABLE IF NOT EXISTS sync_conflicts (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    entity_type TEXT NOT NULL,
    entity_id TEXT NOT NULL,
    device1_id TEXT NOT NULL,
    device2_id TEXT NOT NULL,
    device1_data TEXT NOT NULL,
    device2_data TEXT NOT NULL,
    resolution TEXT CHECK(resolution IN ('device1', 'device2', 'merge', 'manual', 'superseded')),
    resolved INTEGER NOT NULL DEFAULT 0,
    resolved_at TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_sync_conflicts_user ON sync_conflicts(user_id, resolved);
  CREATE INDEX IF NOT EXISTS idx_sync_conflicts_entity ON sync_conflicts(user_id, entity_type, entity_id);

  INSERT OR IGNORE INTO _migrations (id) VALUES (2);
  `,
  // Migration 3: Sync operation log
  `
  CREATE TABLE IF NOT EXISTS sync_logs (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    device_id TEXT NOT NULL,
    sync_type TEXT NOT NULL CHECK(sync_type IN ('pull', 'push')),
    status TEXT NOT NULL CHECK(status IN ('completed', 'failed')),
    items_synced INTEGER NOT NULL DEFAULT 0,
    items_failed INTEGER NOT NULL DEFAULT 0,
    error_message TEXT,
    started_at TEXT NOT NULL,
    completed_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_sync_logs_device ON sync_logs(device_id, completed_at);

  INSERT OR IGNORE INTO _migrations (id) VALUES (3);
  `,
  // Migration 4: Entity stores
  `
  CREATE TABLE IF NOT EXISTS categories (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    description TEXT,
    parent_id TEXT REFERENCES categories(id) ON DELETE SET NULL,
    color TEXT NOT NULL DEFAULT '#3498db',
    icon TEXT,
    sort_order INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_categories_user ON categories(user_id);

  CREATE TABLE IF NOT EXISTS tags (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    description TEXT,
    color TEXT NOT NULL DEFAULT '#95a5a6',
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_tags_user ON tags(user_id);

  CREATE TABLE IF NOT EXISTS knowledge_items (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    content_type TEXT NOT NULL DEFAULT 'markdown',
    summary TEXT,
    category_id TEXT,
    metadata TEXT DEFAULT '{}',
    is_deleted INTEGER NOT NULL DEFAULT 0,
    deleted_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_knowledge_user ON knowledge_items(user_id);
  CREATE INDEX IF NOT EXISTS idx_knowledge_category ON knowledge_items(category_id);

  INSERT OR IGNORE INTO _migrations (id) VALUES (4);
  `,
  // Migration 5: Operation pushed by the conflicting device
  `
  ALTER TABLE sync_conflicts ADD COLUMN device1_operation TEXT NOT NULL DEFAULT 'update'
    CHECK(device1_operation IN ('create', 'update', 'delete'));

  INSERT OR IGNORE INTO _migrations (id) VALUES (5);
  `,
];

let _db: Database | null = null;

export function getDatabase(dbPath?: string): Database {
  if (_db) return _db;

  const path = dbPath || getDbPath();
  ensureDir(path);

  _db = new BetterSqlite3(path);

  // Enable WAL mode for concurrent access
  _db.pragma("journal_mode = WAL");
  _db.pragma("busy_timeout = 5000");
  _db.pragma("foreign_keys = ON");

  runMigrations(_db);

  return _db;
}

function runMigrations(db: Database): void {
  const hasTable = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  let currentLevel = 0;
  if (hasTable) {
    const result = db.prepare<[], { max_id: number | null }>("SELECT MAX(id) as max_id FROM _migrations").get();
    currentLevel = result?.max_id ?? 0;
  }

  const migrate = db.transaction(() => {
    for (const migration of MIGRATIONS.slice(currentLevel)) {
      db.exec(migration);
    }
  });
  migrate();
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

export function resetDatabase(): void {
  _db = null;
}

export function now(): string {
  return new Date().toISOString();
}

export function uuid(): string {
  return randomUUID();
}

export function shortUuid(): string {
  return randomUUID().slice(0, 8);
}

export function parseJsonObject(value: string | null): Record<string, unknown> {
  if (!value) return {};
  const parsed: unknown = JSON.parse(value);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

export type IdTable = "sync_conflicts" | "sync_changes" | "knowledge_items" | "categories" | "tags";

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Resolve a full or prefix id among the user's rows. */
export function resolvePartialId(db: Database, table: IdTable, partialId: string, userId: string): string | null {
  if (partialId.length >= 36) {
    // Full UUID
    const row = db
      .prepare<[string, string], { id: string }>(`SELECT id FROM ${table} WHERE id = ? AND user_id = ?`)
      .get(partialId, userId);
    return row?.id ?? null;
  }

  // Partial match (prefix); ambiguous prefixes resolve to nothing
  const rows = db
    .prepare<[string, string], { id: string }>(`SELECT id FROM ${table} WHERE id LIKE ? ESCAPE '\\' AND user_id = ?`)
    .all(`${escapeLike(partialId)}%`, userId);
  if (rows.length === 1 && rows[0]) {
    return rows[0].id;
  }
  return null;
}
