// packages/timeline/src/projector.ts
import { addDays, isIsoDate } from "../../schema/src/dates.js";
import { ValidationError } from "../../schema/src/errors.js";
import type { DraftInterval, IsoDate } from "../../schema/src/schema.js";

import type { TimelineStore } from "./store.js";

/** "No limit" answer; the simulator takes min() over its caps. */
export const UNLIMITED = Number.POSITIVE_INFINITY;

export type DailyLimit = {
  date: IsoDate;
  ceiling: number; // UNLIMITED outside every interval
};

export type DateRange = {
  from: IsoDate;
  to: IsoDate;
};

export type ProjectionOptions = {
  // answer for a restriction whose amount was never stated (default 0: suspended)
  unspecified_ceiling?: number;
};

type ProjectableInterval = Pick<DraftInterval, "start_date" | "end_date" | "ceiling">;

function assertDate(value: string, field: string): void {
  if (!isIsoDate(value)) {
    throw new ValidationError("INVALID_DATE", `${field} "${value}" is not a YYYY-MM-DD date`);
  }
}

export function enumerateDates(range: DateRange): IsoDate[] {
  assertDate(range.from, "from");
  assertDate(range.to, "to");

  const out: IsoDate[] = [];
  for (let d = range.from; d <= range.to; d = addDays(d, 1)) out.push(d);
  return out;
}

/**
 * One pass over ascending dates with a cursor over the sorted, disjoint
 * intervals. O(dates + intervals).
 */
export function projectOnDates(
  intervals: readonly ProjectableInterval[],
  dates: readonly IsoDate[],
  opts: ProjectionOptions = {}
): DailyLimit[] {
  const unspecified = opts.unspecified_ceiling ?? 0;
  const out: DailyLimit[] = [];

  let cursor = 0;
  let prev: IsoDate | null = null;

  for (const date of dates) {
    assertDate(date, "date");
    if (prev !== null && date < prev) {
      throw new ValidationError("UNSORTED_DATES", `dates must ascend: ${date} after ${prev}`);
    }
    prev = date;

    // skip intervals that ended before this date
    for (;;) {
      const cur = intervals[cursor];
      if (!cur || cur.end_date === null || cur.end_date >= date) break;
      cursor++;
    }

    const cur = intervals[cursor];
    const inside = cur !== undefined && cur.start_date <= date;
    out.push({ date, ceiling: inside ? (cur.ceiling ?? unspecified) : UNLIMITED });
  }

  return out;
}

export function projectIntervals(
  intervals: readonly ProjectableInterval[],
  range: DateRange,
  opts: ProjectionOptions = {}
): DailyLimit[] {
  return projectOnDates(intervals, enumerateDates(range), opts);
}

/** Query surface for the simulator: persisted intervals → per-date ceilings. */
export async function project(
  store: Pick<TimelineStore, "listIntervals">,
  fund_id: string,
  range: DateRange,
  opts: ProjectionOptions = {}
): Promise<DailyLimit[]> {
  const intervals = await store.listIntervals(fund_id);
  return projectIntervals(intervals, range, opts);
}
