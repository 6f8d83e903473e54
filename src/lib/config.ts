import { existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { HOME, readJsonFile } from "./sync-utils.js";

export const CHECKPOINT_STRATEGIES = ["latest-change", "now"] as const;
export type CheckpointStrategy = (typeof CHECKPOINT_STRATEGIES)[number];

export const OPEN_CONFLICT_POLICIES = ["supersede", "reject", "append"] as const;
export type OpenConflictPolicy = (typeof OPEN_CONFLICT_POLICIES)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  user_id: z.string().min(1).optional(),
  pull_lookback_days: z.number().positive().optional(),
  checkpoint_strategy: z.enum(CHECKPOINT_STRATEGIES).optional(),
  open_conflict_policy: z.enum(OPEN_CONFLICT_POLICIES).optional(),
  journal_resolutions: z.boolean().optional(),
  journal_retention_days: z.number().positive().optional(),
  log_level: z.enum(LOG_LEVELS).optional(),
});

export type NotesyncConfig = z.infer<typeof configSchema>;

export interface SyncSettings {
  pull_lookback_days: number;
  checkpoint_strategy: CheckpointStrategy;
  open_conflict_policy: OpenConflictPolicy;
  journal_resolutions: boolean;
  journal_retention_days: number;
}

export const DEFAULT_SYNC_SETTINGS: SyncSettings = {
  pull_lookback_days: 30,
  checkpoint_strategy: "latest-change",
  open_conflict_policy: "supersede",
  journal_resolutions: true,
  journal_retention_days: 90,
};

let cached: NotesyncConfig | null = null;

export function getConfigPath(): string {
  return process.env["NOTESYNC_CONFIG_PATH"] || join(HOME, ".notesync", "config.json");
}

export function loadConfig(): NotesyncConfig {
  if (cached) return cached;
  const path = getConfigPath();
  if (!existsSync(path)) {
    cached = {};
    return cached;
  }
  const parsed = configSchema.safeParse(readJsonFile<unknown>(path) ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid config at ${path}: ${issues}`);
  }
  cached = parsed.data;
  return cached;
}

export function resetConfigCache(): void {
  cached = null;
}

/** Config-file settings over defaults, then explicit overrides on top. */
export function resolveSyncSettings(overrides: Partial<SyncSettings> = {}): SyncSettings {
  const config = loadConfig();
  return {
    pull_lookback_days:
      overrides.pull_lookback_days ?? config.pull_lookback_days ?? DEFAULT_SYNC_SETTINGS.pull_lookback_days,
    checkpoint_strategy:
      overrides.checkpoint_strategy ?? config.checkpoint_strategy ?? DEFAULT_SYNC_SETTINGS.checkpoint_strategy,
    open_conflict_policy:
      overrides.open_conflict_policy ?? config.open_conflict_policy ?? DEFAULT_SYNC_SETTINGS.open_conflict_policy,
    journal_resolutions:
      overrides.journal_resolutions ?? config.journal_resolutions ?? DEFAULT_SYNC_SETTINGS.journal_resolutions,
    journal_retention_days:
      overrides.journal_retention_days ?? config.journal_retention_days ?? DEFAULT_SYNC_SETTINGS.journal_retention_days,
  };
}

export function getLogLevel(): LogLevel {
  const env = process.env["NOTESYNC_LOG_LEVEL"];
  const fromEnv = LOG_LEVELS.find((l) => l === env);
  if (fromEnv) return fromEnv;
  return loadConfig().log_level || "info";
}

/** The acting user: explicit value, then NOTESYNC_USER_ID, then config. */
export function getCurrentUserId(explicit?: string): string | null {
  return explicit || process.env["NOTESYNC_USER_ID"] || loadConfig().user_id || null;
}
