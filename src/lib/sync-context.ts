import { type Database, getDatabase } from "../db/database.js";
import { resolveSyncSettings, type SyncSettings } from "./config.js";
import { type EntityRegistry, getDefaultEntityRegistry } from "./entities.js";
import { createLogger, type Logger } from "./logger.js";
import { noopNotifier, type SyncNotifier } from "./notifier.js";
import type { SyncOptions } from "./sync-types.js";

export interface SyncContext {
  settings: SyncSettings;
  entities: EntityRegistry;
  notifier: SyncNotifier;
  logger: Logger;
  db: Database;
}

export function resolveSyncContext(options: SyncOptions, context: string): SyncContext {
  return {
    settings: resolveSyncSettings(options.settings),
    entities: options.entities || getDefaultEntityRegistry(),
    notifier: options.notifier || noopNotifier,
    logger: options.logger || createLogger({ context }),
    db: options.db || getDatabase(),
  };
}
