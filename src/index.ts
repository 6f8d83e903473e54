// Core database
export { getDatabase, closeDatabase, resetDatabase, resolvePartialId, now, uuid } from "./db/database.js";
export type { Database } from "./db/database.js";

// Device registry
export {
  registerDevice,
  getDevice,
  getUserDevice,
  requireActiveDevice,
  listDevices,
  deactivateDevice,
  updateDeviceCheckpoint,
} from "./db/devices.js";

// Change journal
export {
  recordChange,
  getChange,
  queryChanges,
  findCompetingChanges,
  latestChangeTimestamp,
  countChangesSince,
  compactChanges,
} from "./db/changes.js";

// Conflicts
export {
  createConflict,
  getConflict,
  getOpenConflict,
  findOpenConflictForEntity,
  listOpenConflicts,
  countOpenConflicts,
  markConflictResolved,
} from "./db/conflicts.js";
export { listConflicts, resolveConflict } from "./lib/sync-conflicts.js";

// Sync logs
export { createSyncLog, listSyncLogs } from "./db/sync-logs.js";

// Entity stores
export {
  createKnowledgeItem,
  getKnowledgeItem,
  getUserKnowledgeItem,
  listKnowledgeItems,
  updateKnowledgeItem,
  deleteKnowledgeItem,
} from "./db/knowledge.js";
export {
  createCategory,
  getCategory,
  getUserCategory,
  listCategories,
  updateCategory,
  deactivateCategory,
} from "./db/categories.js";
export { createTag, getTag, getUserTag, listTags, updateTag, deactivateTag } from "./db/tags.js";

// Entity registry
export {
  defineEntityHandler,
  createEntityRegistry,
  getDefaultEntityRegistry,
  getEntityHandler,
  knowledgeHandler,
  categoryHandler,
  tagHandler,
  DEFAULT_ENTITY_HANDLERS,
} from "./lib/entities.js";
export type { EntityHandler, EntityRegistry } from "./lib/entities.js";

// Sync
export { pullChanges } from "./lib/sync-pull.js";
export { pushChanges } from "./lib/sync-push.js";
export { commitServerChange, serverChangeSchema } from "./lib/server-changes.js";
export type { ServerChangeInput } from "./lib/server-changes.js";
export { getSyncStats, compactJournal } from "./lib/sync.js";
export type { CompactOptions, CompactResult } from "./lib/sync.js";
export { clientChangeSchema, pushRequestSchema, pullRequestSchema, resolveRequestSchema } from "./lib/sync-types.js";
export type {
  ClientChange,
  PushRequest,
  PullRequest,
  PulledChange,
  PullResult,
  PushResult,
  SyncStats,
  SyncOptions,
} from "./lib/sync-types.js";

// Config
export {
  loadConfig,
  resetConfigCache,
  resolveSyncSettings,
  getCurrentUserId,
  DEFAULT_SYNC_SETTINGS,
  CHECKPOINT_STRATEGIES,
  OPEN_CONFLICT_POLICIES,
} from "./lib/config.js";
export type { NotesyncConfig, SyncSettings, CheckpointStrategy, OpenConflictPolicy, LogLevel } from "./lib/config.js";

// Logging and notifications
export { createLogger, noopLogger } from "./lib/logger.js";
export type { Logger, LogEntry, LoggerOptions } from "./lib/logger.js";
export { noopNotifier, emitSyncEvent } from "./lib/notifier.js";
export type { SyncEvent, SyncNotifier } from "./lib/notifier.js";

// Types
export type {
  Device,
  DeviceType,
  RegisterDeviceInput,
  ChangeRecord,
  ChangeOperation,
  ChangeData,
  RecordChangeInput,
  Conflict,
  ConflictResolution,
  ExecutableResolution,
  CreateConflictInput,
  SyncLog,
  SyncType,
  SyncLogStatus,
  CreateSyncLogInput,
  KnowledgeItem,
  CreateKnowledgeItemInput,
  UpdateKnowledgeItemInput,
  Category,
  CreateCategoryInput,
  UpdateCategoryInput,
  Tag,
  CreateTagInput,
  UpdateTagInput,
} from "./types/index.js";

export {
  DEVICE_TYPES,
  CHANGE_OPERATIONS,
  CONFLICT_RESOLUTIONS,
  EXECUTABLE_RESOLUTIONS,
  SERVER_DEVICE_ID,
  DeviceNotFoundError,
  DeviceOwnershipError,
  ConflictNotFoundError,
  EntityNotFoundError,
  ValidationError,
} from "./types/index.js";
