import type { IsoDate } from "./schema.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

function toUtcMs(date: IsoDate): number {
  return Date.parse(`${date}T00:00:00.000Z`);
}

/** True only for real calendar dates in YYYY-MM-DD form (rejects 2024-02-30). */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const ms = toUtcMs(value);
  if (Number.isNaN(ms)) return false;
  return new Date(ms).toISOString().slice(0, 10) === value;
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return new Date(toUtcMs(date) + days * DAY_MS).toISOString().slice(0, 10);
}

export function maxDate(a: IsoDate, b: IsoDate): IsoDate {
  return a >= b ? a : b;
}

/** Announcement ordering key; accepts plain dates and full timestamps. */
export function announcementInstant(value: string): number {
  return isIsoDate(value) ? toUtcMs(value) : Date.parse(value);
}
