// Device classes
export const DEVICE_TYPES = ["web", "mobile", "desktop"] as const;
export type DeviceType = (typeof DEVICE_TYPES)[number];

// Journal operations
export const CHANGE_OPERATIONS = ["create", "update", "delete"] as const;
export type ChangeOperation = (typeof CHANGE_OPERATIONS)[number];

// Conflict resolutions. Only device1/device2 are executable; "superseded" is
// set when a newer conflict replaces an open one.
export const CONFLICT_RESOLUTIONS = ["device1", "device2", "merge", "manual", "superseded"] as const;
export type ConflictResolution = (typeof CONFLICT_RESOLUTIONS)[number];

export const EXECUTABLE_RESOLUTIONS = ["device1", "device2"] as const;
export type ExecutableResolution = (typeof EXECUTABLE_RESOLUTIONS)[number];

// Reserved device identifier for the server side of a conflict
export const SERVER_DEVICE_ID = "server";

// Sync log
export const SYNC_TYPES = ["pull", "push"] as const;
export type SyncType = (typeof SYNC_TYPES)[number];

export const SYNC_LOG_STATUSES = ["completed", "failed"] as const;
export type SyncLogStatus = (typeof SYNC_LOG_STATUSES)[number];

export type ChangeData = Record<string, unknown>;

// Device
export interface Device {
  id: string;
  user_id: string;
  name: string;
  device_type: DeviceType;
  device_id: string;
  last_sync_at: string | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface RegisterDeviceInput {
  name: string;
  device_type: DeviceType;
  device_id: string;
}

// Change journal
export interface ChangeRecord {
  id: string;
  user_id: string;
  entity_type: string;
  entity_id: string;
  operation: ChangeOperation;
  data: ChangeData;
  origin_device_id: string | null; // null = server-origin
  timestamp: string;
  delivered: boolean; // reserved, never set
}

export interface RecordChangeInput {
  entity_type: string;
  entity_id: string;
  operation: ChangeOperation;
  data: ChangeData;
  origin_device_id?: string | null;
}

// Conflict
export interface Conflict {
  id: string;
  user_id: string;
  entity_type: string;
  entity_id: string;
  device1_id: string;
  device2_id: string;
  /** The operation the device pushed; replayed when the device side wins. */
  device1_operation: ChangeOperation;
  device1_data: ChangeData;
  device2_data: ChangeData;
  resolution: ConflictResolution | null;
  resolved: boolean;
  resolved_at: string | null;
  created_at: string;
}

export interface CreateConflictInput {
  entity_type: string;
  entity_id: string;
  device1_id: string;
  device1_operation?: ChangeOperation;
  device1_data: ChangeData;
  device2_data: ChangeData;
}

// Sync log
export interface SyncLog {
  id: string;
  user_id: string;
  device_id: string;
  sync_type: SyncType;
  status: SyncLogStatus;
  items_synced: number;
  items_failed: number;
  error_message: string | null;
  started_at: string;
  completed_at: string;
}

export interface CreateSyncLogInput {
  device_id: string;
  sync_type: SyncType;
  status: SyncLogStatus;
  items_synced: number;
  items_failed?: number;
  error_message?: string | null;
  started_at: string;
}

// Entity stores
export interface KnowledgeItem {
  id: string;
  user_id: string;
  title: string;
  content: string;
  content_type: string;
  summary: string | null;
  category_id: string | null;
  metadata: Record<string, unknown>;
  is_deleted: boolean;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateKnowledgeItemInput {
  id?: string;
  title: string;
  content: string;
  content_type?: string;
  summary?: string | null;
  category_id?: string | null;
  metadata?: Record<string, unknown>;
}

export type UpdateKnowledgeItemInput = Partial<Omit<CreateKnowledgeItemInput, "id">>;

export interface Category {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  parent_id: string | null;
  color: string;
  icon: string | null;
  sort_order: number;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface CreateCategoryInput {
  id?: string;
  name: string;
  description?: string | null;
  parent_id?: string | null;
  color?: string;
  icon?: string | null;
  sort_order?: number;
}

export type UpdateCategoryInput = Partial<Omit<CreateCategoryInput, "id">>;

export interface Tag {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  color: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface CreateTagInput {
  id?: string;
  name: string;
  description?: string | null;
  color?: string;
}

export type UpdateTagInput = Partial<Omit<CreateTagInput, "id">>;

// DB row types (raw from SQLite - JSON fields are strings, booleans are 0/1)
export interface DeviceRow {
  id: string;
  user_id: string;
  name: string;
  device_type: string;
  device_id: string;
  last_sync_at: string | null;
  is_active: number;
  created_at: string;
  updated_at: string;
}

export interface ChangeRow {
  id: string;
  user_id: string;
  entity_type: string;
  entity_id: string;
  operation: string;
  data: string | null;
  origin_device_id: string | null;
  timestamp: string;
  delivered: number;
}

export interface ConflictRow {
  id: string;
  user_id: string;
  entity_type: string;
  entity_id: string;
  device1_id: string;
  device2_id: string;
  device1_operation: string;
  device1_data: string;
  device2_data: string;
  resolution: string | null;
  resolved: number;
  resolved_at: string | null;
  created_at: string;
}

export interface SyncLogRow {
  id: string;
  user_id: string;
  device_id: string;
  sync_type: string;
  status: string;
  items_synced: number;
  items_failed: number;
  error_message: string | null;
  started_at: string;
  completed_at: string;
}

export interface KnowledgeItemRow {
  id: string;
  user_id: string;
  title: string;
  content: string;
  content_type: string;
  summary: string | null;
  category_id: string | null;
  metadata: string | null;
  is_deleted: number;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface CategoryRow {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  parent_id: string | null;
  color: string;
  icon: string | null;
  sort_order: number;
  is_active: number;
  created_at: string;
  updated_at: string;
}

export interface TagRow {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  color: string;
  is_active: number;
  created_at: string;
  updated_at: string;
}

// Errors
export class DeviceNotFoundError extends Error {
  constructor(public deviceId: string) {
    super(`Device not found: ${deviceId}`);
    this.name = "DeviceNotFoundError";
  }
}

export class DeviceOwnershipError extends Error {
  constructor(public deviceId: string) {
    super(`Device ${deviceId} is registered to another user`);
    this.name = "DeviceOwnershipError";
  }
}

export class ConflictNotFoundError extends Error {
  constructor(public conflictId: string) {
    super(`Conflict not found: ${conflictId}`);
    this.name = "ConflictNotFoundError";
  }
}

export class EntityNotFoundError extends Error {
  constructor(
    public entityType: string,
    public entityId: string,
  ) {
    super(`${entityType} not found: ${entityId}`);
    this.name = "EntityNotFoundError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
