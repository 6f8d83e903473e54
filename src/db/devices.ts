import type { Device, DeviceRow, DeviceType, RegisterDeviceInput } from "../types/index.js";
import { DEVICE_TYPES, DeviceNotFoundError, DeviceOwnershipError, ValidationError } from "../types/index.js";
import { type Database, getDatabase, now, shortUuid } from "./database.js";

function isDeviceType(value: string): value is DeviceType {
  return DEVICE_TYPES.some((t) => t === value);
}

function rowToDevice(row: DeviceRow): Device {
  return {
    ...row,
    device_type: isDeviceType(row.device_type) ? row.device_type : "web",
    is_active: row.is_active === 1,
  };
}

function validateRegistration(input: RegisterDeviceInput): void {
  if (!input.device_id.trim()) throw new ValidationError("device_id is required");
  if (!input.name.trim()) throw new ValidationError("Device name is required");
  if (!isDeviceType(input.device_type)) {
    throw new ValidationError(`Invalid device type: ${input.device_type} (expected ${DEVICE_TYPES.join(", ")})`);
  }
}

/**
 * Register a device for sync. Idempotent by `device_id`: re-registering
 * updates name and type, reactivates the device and keeps its checkpoint.
 */
export function registerDevice(userId: string, input: RegisterDeviceInput, db?: Database): Device {
  const d = db || getDatabase();
  validateRegistration(input);

  const existing = getDevice(input.device_id, d);
  if (existing) {
    if (existing.user_id !== userId) throw new DeviceOwnershipError(input.device_id);
    d.prepare(
      "UPDATE sync_devices SET name = ?, device_type = ?, is_active = 1, updated_at = ? WHERE id = ?",
    ).run(input.name, input.device_type, now(), existing.id);
    return requireDevice(input.device_id, d);
  }

  const timestamp = now();
  d.prepare(
    `INSERT INTO sync_devices (id, user_id, name, device_type, device_id, last_sync_at, is_active, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, NULL, 1, ?, ?)`,
  ).run(shortUuid(), userId, input.name, input.device_type, input.device_id, timestamp, timestamp);

  return requireDevice(input.device_id, d);
}

export function getDevice(deviceId: string, db?: Database): Device | null {
  const d = db || getDatabase();
  const row = d.prepare<[string], DeviceRow>("SELECT * FROM sync_devices WHERE device_id = ?").get(deviceId);
  return row ? rowToDevice(row) : null;
}

function requireDevice(deviceId: string, db: Database): Device {
  const device = getDevice(deviceId, db);
  if (!device) throw new DeviceNotFoundError(deviceId);
  return device;
}

export function getUserDevice(userId: string, deviceId: string, db?: Database): Device | null {
  const device = getDevice(deviceId, db);
  return device && device.user_id === userId ? device : null;
}

/** The device must belong to the user and be active to take part in sync. */
export function requireActiveDevice(userId: string, deviceId: string, db?: Database): Device {
  const device = getUserDevice(userId, deviceId, db);
  if (!device || !device.is_active) throw new DeviceNotFoundError(deviceId);
  return device;
}

export function listDevices(userId: string, db?: Database): Device[] {
  const d = db || getDatabase();
  return d
    .prepare<[string], DeviceRow>(
      `SELECT * FROM sync_devices WHERE user_id = ? AND is_active = 1
       ORDER BY last_sync_at IS NULL, last_sync_at DESC, name`,
    )
    .all(userId)
    .map(rowToDevice);
}

export function deactivateDevice(userId: string, deviceId: string, db?: Database): boolean {
  const d = db || getDatabase();
  const device = getUserDevice(userId, deviceId, d);
  if (!device) throw new DeviceNotFoundError(deviceId);
  d.prepare("UPDATE sync_devices SET is_active = 0, updated_at = ? WHERE id = ?").run(now(), device.id);
  return true;
}

export function updateDeviceCheckpoint(deviceId: string, checkpoint: string, db?: Database): void {
  const d = db || getDatabase();
  d.prepare("UPDATE sync_devices SET last_sync_at = ?, updated_at = ? WHERE device_id = ?").run(
    checkpoint,
    now(),
    deviceId,
  );
}
