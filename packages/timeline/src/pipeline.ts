// packages/timeline/src/pipeline.ts
import { ValidationError, type AmbiguousInputError } from "../../schema/src/errors.js";
import type { AuditEntry, DraftInterval, RawAssertion } from "../../schema/src/schema.js";
import { validateAssertions } from "../../schema/src/validate.js";

import { recordAll, type Clock } from "./audit.js";
import { fingerprintIntervals } from "./hash.js";
import { mergeDrafts } from "./merger.js";
import { reconcileFund, type ReconcileOptions, type ReconcileResult } from "./reconcile.js";
import { sequenceAssertions, type SequencerAnomaly } from "./sequencer.js";
import type { TimelineStore } from "./store.js";

export type PipelineOptions = {
  now?: Clock;
};

export type FundBuildResult = {
  fund_id: string;
  intervals: DraftInterval[];
  invalid: ValidationError[];
  ambiguous: AmbiguousInputError[];
  anomalies: SequencerAnomaly[];
  build_audit: AuditEntry[]; // sequencer transitions, then merger entries
  fingerprint: string;
};

export type FundRunResult = FundBuildResult & {
  reconcile: ReconcileResult;
};

/**
 * validate → sort → sequence → merge → invariants, for one fund.
 * Pure apart from the clock; throws IntegrityViolation, nothing else.
 */
export function runFundPipeline(
  fund_id: string,
  inputs: readonly unknown[],
  opts: PipelineOptions = {}
): FundBuildResult {
  const { valid, rejected } = validateAssertions(inputs);

  const invalid = [...rejected];
  const mine: RawAssertion[] = [];
  for (const a of valid) {
    if (a.fund_id === fund_id) {
      mine.push(a);
    } else {
      invalid.push(
        new ValidationError("FUND_MISMATCH", `assertion for fund ${a.fund_id} in batch for ${fund_id}`, a.source_id)
      );
    }
  }

  const seq = sequenceAssertions(fund_id, mine, opts);
  const merged = mergeDrafts(fund_id, seq.drafts, opts);

  return {
    fund_id,
    intervals: merged.intervals,
    invalid,
    ambiguous: seq.skipped,
    anomalies: seq.anomalies,
    build_audit: [...seq.transitions, ...merged.audit],
    fingerprint: fingerprintIntervals(merged.intervals),
  };
}

/** Build, hand the build trace to the recorder, then reconcile against the store. */
export async function rebuildFund(
  store: Pick<TimelineStore, "readPriorState" | "applyDelta">,
  fund_id: string,
  inputs: readonly unknown[],
  opts: ReconcileOptions = {}
): Promise<FundRunResult> {
  const build = runFundPipeline(fund_id, inputs, opts);
  recordAll(opts.recorder, build.build_audit);

  const reconcile = await reconcileFund(store, fund_id, build.intervals, opts);
  return { ...build, reconcile };
}
