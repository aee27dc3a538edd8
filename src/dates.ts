// Calendar-date helpers. Dates are ISO "YYYY-MM-DD" strings handled as UTC
// midnight so day arithmetic never crosses a DST boundary.

import { Clock, Effect } from "effect";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const ms = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(ms) && toIsoDate(ms) === value;
}

export function toEpochMs(date: string): number {
  return Date.parse(`${date}T00:00:00Z`);
}

export function toIsoDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return toIsoDate(toEpochMs(date) + days * DAY_MS);
}

/** Absolute distance in whole days. */
export function daysBetween(a: string, b: string): number {
  return Math.abs(Math.round((toEpochMs(a) - toEpochMs(b)) / DAY_MS));
}

/** Calendar date of an epoch-seconds timestamp at the given UTC offset. */
export function exchangeDate(epochSeconds: number, gmtOffsetSeconds: number): string {
  return toIsoDate((epochSeconds + gmtOffsetSeconds) * 1000);
}

/** "2025-01-02" -> "02/01/2025" */
export function formatDdMmYyyy(date: string): string {
  if (!isIsoDate(date)) return date;
  const [year, month, day] = date.split("-");
  return `${day}/${month}/${year}`;
}

export const today: Effect.Effect<string> = Clock.currentTimeMillis.pipe(
  Effect.map(toIsoDate),
);
