// packages/timeline/src/interval.ts
import type { DraftInterval, IntervalBounds } from "../../schema/src/schema.js";

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Sorted, de-duplicated union. */
export function unionSourceIds(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])].sort(compareStrings);
}

export function sharesSource(a: Pick<DraftInterval, "source_ids">, b: Pick<DraftInterval, "source_ids">): boolean {
  const s = new Set(a.source_ids);
  return b.source_ids.some((id) => s.has(id));
}

/** Stricter ceiling wins; an unspecified ceiling never overrides a known one. */
export function stricterCeiling(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

/** Closed ranges intersect (an open end reaches forever). */
export function rangesIntersect(a: IntervalBounds, b: IntervalBounds): boolean {
  const aReachesB = a.end_date === null || a.end_date >= b.start_date;
  const bReachesA = b.end_date === null || b.end_date >= a.start_date;
  return aReachesB && bReachesA;
}

export function sameContent(a: DraftInterval, b: DraftInterval): boolean {
  return (
    a.start_date === b.start_date &&
    a.end_date === b.end_date &&
    a.ceiling === b.ceiling &&
    a.source_ids.length === b.source_ids.length &&
    a.source_ids.every((id, i) => id === b.source_ids[i])
  );
}

export function describeBounds(i: IntervalBounds): string {
  return `[${i.start_date}, ${i.end_date ?? "open"}${i.end_date === null ? ")" : "]"}`;
}
