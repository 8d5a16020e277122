import type { TimeOfDay } from "./types.js";

const SECONDS_PER_DAY = 24 * 60 * 60;
const TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse `HH:MM` or `HH:MM:SS` (24h clock). Returns null for anything else.
 */
export function parseTimeOfDay(raw: string): TimeOfDay | null {
  const m = TIME_RE.exec(raw.trim());
  if (!m) return null;
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  const second = m[3] === undefined ? 0 : Number(m[3]);
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { hour, minute, second };
}

/**
 * Accepts an already parsed value or a string; anything unparsable is null.
 */
export function coerceTimeOfDay(
  value: TimeOfDay | string | null | undefined
): TimeOfDay | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return parseTimeOfDay(value);
  return value;
}

export function secondsOfDay(t: TimeOfDay): number {
  return t.hour * 3600 + t.minute * 60 + t.second;
}

export function formatTimeOfDay(t: TimeOfDay): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`;
}

/**
 * Elapsed hours from start to end. An end before the start spans midnight.
 */
export function computeDurationHours(start: TimeOfDay, end: TimeOfDay): number {
  let seconds = secondsOfDay(end) - secondsOfDay(start);
  if (seconds < 0) seconds += SECONDS_PER_DAY;
  return seconds / 3600;
}

export function isIsoDate(raw: string): boolean {
  const m = DATE_RE.exec(raw);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  return (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === day
  );
}

/** Local wall-clock date as YYYY-MM-DD. */
export function localIsoDate(now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(
    now.getDate()
  )}`;
}
