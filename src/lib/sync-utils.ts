import { readFileSync } from "node:fs";
import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "../types/index.js";

export const HOME = process.env["HOME"] || process.env["USERPROFILE"] || "~";

const DAY_MS = 24 * 60 * 60 * 1000;

export function readJsonFile<T>(path: string): T | null {
  try {
    return JSON.parse(readFileSync(path, "utf-8")) as T;
  } catch {
    return null;
  }
}

// Date and time with no zone designator
const NAIVE_DATETIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/** Epoch milliseconds for an ISO-8601 string. Values without an offset are UTC. */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value !== "string") return null;
  const naive = NAIVE_DATETIME.exec(value.trim());
  const parsed = Date.parse(naive ? `${naive[1]}T${naive[2]}Z` : value);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Normalize a caller-supplied timestamp to the journal's format
 * (`toISOString`, UTC) so stored and supplied values compare as strings.
 */
export function normalizeTimestamp(value: string, field = "timestamp"): string {
  const parsed = parseTimestamp(value);
  if (parsed === null) throw new ValidationError(`Invalid ${field}: ${value}`);
  return new Date(parsed).toISOString();
}

export function daysAgo(days: number, nowMs = Date.now()): string {
  return new Date(nowMs - days * DAY_MS).toISOString();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, label = "request"): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || label}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid ${label}: ${issues}`);
  }
  return parsed.data;
}
