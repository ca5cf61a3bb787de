// packages/timeline/src/batch.ts
import { isTimelineError, type TimelineErrorCode } from "../../schema/src/errors.js";
import { assertionFromParseRecord } from "../../schema/src/parse-record.js";

import { compareStrings } from "./interval.js";
import { rebuildFund } from "./pipeline.js";
import type { ReconcileOptions } from "./reconcile.js";
import type { ParseRecordStore, TimelineStore } from "./store.js";

export type FundBatch = {
  fund_id: string;
  inputs: unknown[];
  skipped_records?: number; // parse records the adapter could not use
};

export type BatchLogger = Pick<Console, "info" | "warn" | "error">;

export type BatchOptions = ReconcileOptions & {
  concurrency?: number; // default 4
  signal?: AbortSignal;
  logger?: BatchLogger;
};

export type FundFailure = {
  fund_id: string;
  code: TimelineErrorCode | "UNEXPECTED";
  message: string;
};

export type FundReport = {
  fund_id: string;
  intervals: number;
  invalid: number;
  ambiguous: number;
  anomalies: number;
  created: number;
  updated: number;
  removed: number;
  unchanged: number;
  written: boolean;
  attempts: number;
  fingerprint: string;
};

export type BatchSummary = {
  funds_total: number;
  funds_processed: number;
  funds_failed: FundFailure[];
  funds_cancelled: string[];
  invalid_assertions: number;
  ambiguous_assertions: number;
  skipped_records: number;
  integrity_violations: string[]; // fund ids for manual review
  reports: FundReport[];
};

function describeFailure(fund_id: string, e: unknown): FundFailure {
  if (isTimelineError(e)) return { fund_id, code: e.code, message: e.message };
  return { fund_id, code: "UNEXPECTED", message: e instanceof Error ? e.message : String(e) };
}

/**
 * Rebuilds many funds with at most `concurrency` in flight. Funds share
 * nothing, so one fund's failure is reported and the rest carry on.
 * Abort stops new funds from being picked up; in-flight writes finish.
 */
export async function runBatch(
  store: Pick<TimelineStore, "readPriorState" | "applyDelta">,
  batches: readonly FundBatch[],
  opts: BatchOptions = {}
): Promise<BatchSummary> {
  const concurrency = Math.max(1, Math.floor(opts.concurrency ?? 4));
  const log = opts.logger;

  const summary: BatchSummary = {
    funds_total: batches.length,
    funds_processed: 0,
    funds_failed: [],
    funds_cancelled: [],
    invalid_assertions: 0,
    ambiguous_assertions: 0,
    skipped_records: 0,
    integrity_violations: [],
    reports: [],
  };

  let next = 0;

  const lane = async (): Promise<void> => {
    for (;;) {
      const idx = next++;
      const batch = batches[idx];
      if (!batch) return;

      summary.skipped_records += batch.skipped_records ?? 0;

      if (opts.signal?.aborted) {
        summary.funds_cancelled.push(batch.fund_id);
        continue;
      }

      log?.info(`[limit-timeline] rebuilding ${batch.fund_id} (${batch.inputs.length} assertions)`);

      try {
        const r = await rebuildFund(store, batch.fund_id, batch.inputs, opts);

        summary.funds_processed += 1;
        summary.invalid_assertions += r.invalid.length;
        summary.ambiguous_assertions += r.ambiguous.length;
        for (const e of r.invalid) log?.warn(`[limit-timeline] ${batch.fund_id}: rejected ${e.source_id ?? "?"} (${e.rule})`);
        for (const e of r.ambiguous) log?.warn(`[limit-timeline] ${batch.fund_id}: ${e.message}`);

        summary.reports.push({
          fund_id: batch.fund_id,
          intervals: r.intervals.length,
          invalid: r.invalid.length,
          ambiguous: r.ambiguous.length,
          anomalies: r.anomalies.length,
          created: r.reconcile.delta.creates.length,
          updated: r.reconcile.delta.updates.length,
          removed: r.reconcile.delta.removals.length,
          unchanged: r.reconcile.delta.unchanged.length,
          written: r.reconcile.written,
          attempts: r.reconcile.attempts,
          fingerprint: r.fingerprint,
        });
      } catch (e) {
        const failure = describeFailure(batch.fund_id, e);
        summary.funds_failed.push(failure);
        if (failure.code === "INTEGRITY_VIOLATION") summary.integrity_violations.push(batch.fund_id);
        log?.error(`[limit-timeline] ${batch.fund_id} failed: ${failure.code}: ${failure.message}`);
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, batches.length) }, lane));

  summary.reports.sort((a, b) => compareStrings(a.fund_id, b.fund_id));
  summary.funds_failed.sort((a, b) => compareStrings(a.fund_id, b.fund_id));
  summary.funds_cancelled.sort(compareStrings);
  summary.integrity_violations.sort(compareStrings);

  log?.info(
    `[limit-timeline] done: ${summary.funds_processed}/${summary.funds_total} processed, ` +
      `${summary.funds_failed.length} failed, ${summary.funds_cancelled.length} cancelled`
  );

  return summary;
}

/** One batch per fund from stored parse records (all funds when none given). */
export async function loadFundBatches(
  store: Pick<ParseRecordStore, "listParseRecords" | "listParseRecordFunds">,
  fund_ids?: readonly string[]
): Promise<FundBatch[]> {
  const ids = fund_ids ? [...fund_ids] : await store.listParseRecordFunds();
  const out: FundBatch[] = [];

  for (const fund_id of ids) {
    const records = await store.listParseRecords(fund_id);
    const inputs: unknown[] = [];
    let skipped = 0;
    for (const record of records) {
      const r = assertionFromParseRecord(record);
      if (r.ok) inputs.push(r.input);
      else skipped += 1;
    }
    out.push({ fund_id, inputs, skipped_records: skipped });
  }

  return out;
}
