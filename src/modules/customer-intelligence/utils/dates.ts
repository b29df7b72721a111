import { isValid, parseISO } from "date-fns";

export const DAY_IN_MS = 24 * 60 * 60 * 1000;

const pad = (value: number, width: number): string =>
  String(value).padStart(width, "0");

/** Whole days elapsed from `then` to `now`, never negative. */
export function daysSince(now: Date, then: Date): number {
  return Math.max(0, Math.floor((now.getTime() - then.getTime()) / DAY_IN_MS));
}

/** UTC calendar month as `YYYY-MM`. */
export function toMonthKey(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}`;
}

export function shiftMonthKey(monthKey: string, offset: number): string {
  const [year, month] = monthKey.split("-").map(Number);
  const absolute = year * 12 + (month - 1) + offset;
  return `${pad(Math.floor(absolute / 12), 4)}-${pad((absolute % 12) + 1, 2)}`;
}

export function startOfUtcMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

/** UTC calendar date as `YYYY-MM-DD`. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function toDateOrNull(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = parseISO(value.trim());
    return isValid(parsed) ? parsed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return new Date(value);
  }
  return null;
}
