// packages/timeline/src/reconcile.ts
import { ReconciliationConflict } from "../../schema/src/errors.js";
import type { AuditEntry, CanonicalInterval, DraftInterval } from "../../schema/src/schema.js";

import { createAuditEntry, recordAll, systemClock, type AuditRecorder, type Clock } from "./audit.js";
import { intervalIdentity } from "./hash.js";
import { compareStrings, rangesIntersect, sameContent, sharesSource } from "./interval.js";
import type { IntervalRemoval, ReconcileDelta, TimelineStore } from "./store.js";

export type DiffOptions = {
  now?: Clock;
};

export type ReconcileOptions = DiffOptions & {
  max_reconcile_retries?: number; // default 3
  recorder?: AuditRecorder;
};

export type ReconcileResult = {
  fund_id: string;
  delta: ReconcileDelta;
  intervals: CanonicalInterval[]; // persisted set after this run
  revision: number;
  attempts: number;
  written: boolean;
};

type ReconcilePlan = {
  delta: ReconcileDelta;
  intervals: CanonicalInterval[];
};

function noteFor(i: DraftInterval, absorbed: readonly string[] = []): string {
  const n = i.source_ids.length;
  const sources = `${n} source announcement${n === 1 ? "" : "s"}`;
  return absorbed.length ? `${sources}; merged ${absorbed.join(", ")}` : sources;
}

/** Source that brought the change: one not seen before, else the last one. */
function introducedSource(next: DraftInterval, before: readonly DraftInterval[]): string | null {
  const seen = new Set(before.flatMap((b) => b.source_ids));
  const fresh = next.source_ids.filter((id) => !seen.has(id));
  return fresh[fresh.length - 1] ?? next.source_ids[next.source_ids.length - 1] ?? null;
}

export function isEmptyDelta(delta: ReconcileDelta): boolean {
  return delta.creates.length === 0 && delta.updates.length === 0 && delta.removals.length === 0;
}

function plan(
  fund_id: string,
  next: readonly DraftInterval[],
  prior: readonly CanonicalInterval[],
  opts: DiffOptions
): ReconcilePlan {
  const now = opts.now ?? systemClock;

  const creates: CanonicalInterval[] = [];
  const updates: CanonicalInterval[] = [];
  const removals: IntervalRemoval[] = [];
  const unchanged: string[] = [];
  const audit: AuditEntry[] = [];
  const intervals: CanonicalInterval[] = [];

  const claimed = new Set<string>();
  const used = new Set(prior.map((p) => p.id));

  const allocate = (i: DraftInterval): string => {
    const base = intervalIdentity(fund_id, i);
    let id = base;
    for (let k = 1; used.has(id); k++) id = `${base}-${k}`;
    used.add(id);
    return id;
  };

  const create = (n: DraftInterval) => {
    const created: CanonicalInterval = { ...n, id: allocate(n), note: noteFor(n) };
    creates.push(created);
    intervals.push(created);
    audit.push(
      createAuditEntry(
        { fund_id, operation: "CREATE", next: n, triggered_by: introducedSource(n, []), interval_id: created.id },
        now
      )
    );
  };

  for (const n of next) {
    const free = prior.filter((p) => !claimed.has(p.id) && (rangesIntersect(p, n) || sharesSource(p, n)));
    const [only] = free;

    if (!only) {
      create(n);
      continue;
    }

    // clear descent from one prior: keep its identity
    if (free.length === 1) {
      claimed.add(only.id);
      if (sameContent(only, n)) {
        unchanged.push(only.id);
        intervals.push(only);
        continue;
      }
      const updated: CanonicalInterval = { ...n, id: only.id, note: noteFor(n) };
      updates.push(updated);
      intervals.push(updated);
      audit.push(
        createAuditEntry(
          {
            fund_id,
            operation: "EXTEND",
            old: only,
            next: n,
            triggered_by: introducedSource(n, [only]),
            interval_id: only.id,
          },
          now
        )
      );
      continue;
    }

    // several priors collapsed into one: new identity, priors retired
    for (const p of free) claimed.add(p.id);
    const absorbed = free.map((p) => p.id);
    const merged: CanonicalInterval = { ...n, id: allocate(n), note: noteFor(n, absorbed) };
    const triggered_by = introducedSource(n, free);
    creates.push(merged);
    intervals.push(merged);

    for (const p of free) {
      audit.push(
        createAuditEntry(
          { fund_id, operation: "MERGE", old: p, next: n, triggered_by, interval_id: merged.id, related_id: p.id },
          now
        )
      );
    }
    for (const p of free) {
      removals.push({ id: p.id, absorbed_into: merged.id });
      audit.push(
        createAuditEntry(
          { fund_id, operation: "CLOSE", old: p, triggered_by, interval_id: p.id, related_id: merged.id },
          now
        )
      );
    }
  }

  // priors nothing descends from any more
  for (const p of prior) {
    if (claimed.has(p.id)) continue;
    removals.push({ id: p.id, absorbed_into: null });
    audit.push(
      createAuditEntry({ fund_id, operation: "CLOSE", old: p, triggered_by: null, interval_id: p.id }, now)
    );
  }

  intervals.sort((a, b) => compareStrings(a.start_date, b.start_date) || compareStrings(a.id, b.id));

  return {
    delta: { fund_id, creates, updates, removals, unchanged, audit },
    intervals,
  };
}

/**
 * Minimal delta turning `prior` (persisted) into `next` (freshly merged).
 * Identity follows descent: ranges that intersect or share a source.
 */
export function diffCanonicalSets(
  fund_id: string,
  next: readonly DraftInterval[],
  prior: readonly CanonicalInterval[],
  opts: DiffOptions = {}
): ReconcileDelta {
  return plan(fund_id, next, prior, opts).delta;
}

/**
 * Read → diff → write under the read revision. A stale revision means another
 * writer got there first; the diff is recomputed from a fresh read.
 */
export async function reconcileFund(
  store: Pick<TimelineStore, "readPriorState" | "applyDelta">,
  fund_id: string,
  next: readonly DraftInterval[],
  opts: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const retries = opts.max_reconcile_retries ?? 3;

  for (let attempt = 1; ; attempt++) {
    const prior = await store.readPriorState(fund_id);
    const { delta, intervals } = plan(fund_id, next, prior.intervals, opts);

    if (isEmptyDelta(delta)) {
      return { fund_id, delta, intervals, revision: prior.revision, attempts: attempt, written: false };
    }

    try {
      const { revision } = await store.applyDelta(fund_id, delta, prior.revision);
      recordAll(opts.recorder, delta.audit);
      return { fund_id, delta, intervals, revision, attempts: attempt, written: true };
    } catch (e) {
      if (e instanceof ReconciliationConflict && attempt <= retries) continue;
      recordAll(opts.recorder, delta.audit);
      throw e;
    }
  }
}
