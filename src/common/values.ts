import { isValid, parseISO } from "date-fns";
import type { RawValue } from "../types";

const NUMERIC = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

// Strings must carry their own offset; local wall-clock times are ambiguous
const HAS_OFFSET = /[T ]\d{2}:\d{2}.*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

export function coerceNumeric(value: RawValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const s = value.trim();
    if (!NUMERIC.test(s)) return null;
    const num = Number(s);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

export function toUtcDate(timestamp: Date | string | number): Date | null {
  if (timestamp instanceof Date) {
    return isValid(timestamp) ? timestamp : null;
  }
  if (typeof timestamp === "number") {
    const d = new Date(timestamp);
    return isValid(d) ? d : null;
  }
  const s = timestamp.trim();
  if (!HAS_OFFSET.test(s)) return null;
  const d = parseISO(s);
  return isValid(d) ? d : null;
}

// DuckDB TIMESTAMP literal (UTC, no zone suffix)
export function toSqlTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").replace("Z", "");
}

export function floorToHour(date: Date): Date {
  const d = new Date(date.getTime());
  d.setUTCMinutes(0, 0, 0);
  return d;
}

export function floorToDay(date: Date): Date {
  const d = new Date(date.getTime());
  d.setUTCHours(0, 0, 0, 0);
  return d;
}
