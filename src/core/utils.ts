import { randomUUID } from "node:crypto";

export function isoNow(): string {
  return new Date().toISOString();
}

export function generateRunToken(): string {
  return randomUUID().replace(/-/g, "").slice(0, 12);
}

/** UTC `yyyymmdd-hhmmss-mmm`, used to prefix log directory names. */
export function datetimePath(date: Date = new Date()): string {
  const pad = (value: number, width = 2): string => String(value).padStart(width, "0");
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}-${time}-${pad(date.getUTCMilliseconds(), 3)}`;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
