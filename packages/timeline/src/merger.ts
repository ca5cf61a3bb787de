// packages/timeline/src/merger.ts
import { maxDate } from "../../schema/src/dates.js";
import { IntegrityViolation } from "../../schema/src/errors.js";
import { isOpenEnded, type AuditEntry, type DraftInterval, type IntervalBounds } from "../../schema/src/schema.js";

import { createAuditEntry, systemClock, type Clock } from "./audit.js";
import { compareStrings, describeBounds, stricterCeiling, unionSourceIds } from "./interval.js";

export type MergeOptions = {
  now?: Clock;
};

export type MergeResult = {
  fund_id: string;
  intervals: DraftInterval[];
  audit: AuditEntry[];
};

/** start asc; on equal start a bounded end sorts before an open one. */
export function compareDrafts(a: DraftInterval, b: DraftInterval): number {
  if (a.start_date !== b.start_date) return compareStrings(a.start_date, b.start_date);
  if (a.end_date !== b.end_date) {
    if (a.end_date === null) return 1;
    if (b.end_date === null) return -1;
    return compareStrings(a.end_date, b.end_date);
  }
  return compareStrings(a.source_ids.join("\u0000"), b.source_ids.join("\u0000"));
}

/**
 * Merge policy:
 * - an open end dominates, otherwise the later end wins
 * - the stricter (lower) ceiling wins; an unspecified one never overrides
 * - provenance is unioned
 */
export function mergeIntervals(acc: DraftInterval, d: DraftInterval): DraftInterval {
  return {
    fund_id: acc.fund_id,
    start_date: acc.start_date <= d.start_date ? acc.start_date : d.start_date,
    end_date: acc.end_date === null || d.end_date === null ? null : maxDate(acc.end_date, d.end_date),
    ceiling: stricterCeiling(acc.ceiling, d.ceiling),
    source_ids: unionSourceIds(acc.source_ids, d.source_ids),
  };
}

function lastSource(i: DraftInterval): string | null {
  return i.source_ids[i.source_ids.length - 1] ?? null;
}

/**
 * Post-conditions of a canonical set: sorted, pairwise disjoint, at most one
 * open-ended member and only in last position. Throws instead of guessing.
 */
export function assertCanonicalInvariants(fund_id: string, intervals: readonly IntervalBounds[]): void {
  const details: string[] = [];

  const open = intervals.filter(isOpenEnded);
  if (open.length > 1) {
    details.push(`${open.length} open-ended intervals: ${open.map(describeBounds).join(", ")}`);
  }

  intervals.forEach((cur, idx) => {
    if (cur.end_date !== null && cur.end_date < cur.start_date) {
      details.push(`${describeBounds(cur)} ends before it starts`);
    }
    if (idx === 0) return;
    const prev = intervals[idx - 1];
    if (!prev) return;
    if (prev.start_date > cur.start_date) {
      details.push(`${describeBounds(prev)} sorted before ${describeBounds(cur)}`);
    } else if (prev.end_date === null) {
      details.push(`open-ended ${describeBounds(prev)} is not the last interval`);
    } else if (prev.end_date >= cur.start_date) {
      details.push(`${describeBounds(prev)} overlaps ${describeBounds(cur)}`);
    }
  });

  if (details.length > 0) throw new IntegrityViolation(fund_id, details);
}

/**
 * Sort-and-sweep over one fund's drafts. Overlap and same-day adjacency
 * (`d.start_date <= acc.end_date`) merge; an open accumulator absorbs
 * everything after it.
 */
export function mergeDrafts(
  fund_id: string,
  drafts: readonly DraftInterval[],
  opts: MergeOptions = {}
): MergeResult {
  const now = opts.now ?? systemClock;
  const sorted = [...drafts].sort(compareDrafts);
  const first = sorted[0];
  if (!first) return { fund_id, intervals: [], audit: [] };

  const intervals: DraftInterval[] = [];
  const audit: AuditEntry[] = [];

  const close = (acc: DraftInterval) => {
    intervals.push(acc);
    audit.push(
      createAuditEntry({ fund_id, operation: "CREATE", next: acc, triggered_by: lastSource(acc) }, now)
    );
  };

  let acc: DraftInterval = { ...first, source_ids: [...first.source_ids] };

  for (const d of sorted.slice(1)) {
    if (acc.end_date === null || d.start_date <= acc.end_date) {
      const merged = mergeIntervals(acc, d);
      audit.push(
        createAuditEntry(
          {
            fund_id,
            operation: "MERGE",
            old: acc,
            next: merged,
            triggered_by: lastSource(d),
            related_id: describeBounds(d), // the absorbed draft
          },
          now
        )
      );
      acc = merged;
    } else {
      close(acc);
      acc = { ...d, source_ids: [...d.source_ids] };
    }
  }
  close(acc);

  assertCanonicalInvariants(fund_id, intervals);

  return { fund_id, intervals, audit };
}
