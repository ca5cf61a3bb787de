// packages/timeline/src/sequencer.ts
import { announcementInstant, maxDate } from "../../schema/src/dates.js";
import { AmbiguousInputError } from "../../schema/src/errors.js";
import type {
  AuditEntry,
  DraftInterval,
  EndOnlyAssertion,
  RawAssertion,
} from "../../schema/src/schema.js";

import { createAuditEntry, systemClock, type Clock } from "./audit.js";
import { compareStrings, unionSourceIds } from "./interval.js";

export type SequencerOptions = {
  now?: Clock;
};

export type SequencerAnomaly = {
  code: "CONCURRENT_OPEN";
  fund_id: string;
  source_id: string; // the OPEN_START that found another period still open
  superseded_start: string;
};

/**
 * Control state of the fold. Never shared between funds. Output (drafts,
 * transitions, skips) is not part of it: each step reports what it produced
 * and the fold appends that to arrays it owns.
 */
export type SequencerState = {
  fund_id: string;
  open: DraftInterval | null;
  // the most recently closed period and its slot among the emitted drafts
  last_closed: { index: number; draft: DraftInterval } | null;
  emitted: number; // drafts emitted so far
  last_ceiling: number | null; // most recent known ceiling, for inheritance
};

export type SequencerStep = {
  state: SequencerState;
  emit?: DraftInterval; // goes into slot `emitted` of the previous state
  replace?: { index: number; draft: DraftInterval };
  transition?: AuditEntry;
  skipped?: AmbiguousInputError;
  anomaly?: SequencerAnomaly;
};

export type SequenceResult = {
  fund_id: string;
  drafts: DraftInterval[];
  skipped: AmbiguousInputError[];
  anomalies: SequencerAnomaly[];
  transitions: AuditEntry[];
};

/** (announcement_time, source_id) ascending. Stable and deterministic. */
export function sortAssertions(assertions: readonly RawAssertion[]): RawAssertion[] {
  return [...assertions].sort((a, b) => {
    const ta = announcementInstant(a.announcement_time);
    const tb = announcementInstant(b.announcement_time);
    if (ta !== tb) return ta - tb;
    return compareStrings(a.source_id, b.source_id);
  });
}

export function initialSequencerState(fund_id: string): SequencerState {
  return { fund_id, open: null, last_closed: null, emitted: 0, last_ceiling: null };
}

function ambiguous(state: SequencerState, a: EndOnlyAssertion, why: string): SequencerStep {
  return {
    state,
    skipped: new AmbiguousInputError(state.fund_id, a.source_id, `END_ONLY ${a.end_date} from ${a.source_id}: ${why}`),
  };
}

function stepEndOnly(state: SequencerState, a: EndOnlyAssertion, now: Clock): SequencerStep {
  // resume: close the open period
  if (state.open) {
    const open = state.open;
    if (a.end_date < open.start_date) {
      return ambiguous(state, a, `ends before the open period starting ${open.start_date}`);
    }

    const closed: DraftInterval = {
      ...open,
      end_date: a.end_date,
      ceiling: open.ceiling ?? a.ceiling,
      source_ids: unionSourceIds(open.source_ids, [a.source_id]),
    };

    return {
      state: {
        ...state,
        open: null,
        last_closed: { index: state.emitted, draft: closed },
        emitted: state.emitted + 1,
        last_ceiling: closed.ceiling ?? state.last_ceiling,
      },
      emit: closed,
      transition: createAuditEntry(
        { fund_id: state.fund_id, operation: "CLOSE", old: open, next: closed, triggered_by: a.source_id },
        now
      ),
    };
  }

  // extend: push the most recently closed period's end outwards
  if (state.last_closed) {
    const { index, draft: prev } = state.last_closed;

    const end = prev.end_date === null ? a.end_date : maxDate(prev.end_date, a.end_date);
    const extended: DraftInterval = {
      ...prev,
      end_date: end,
      ceiling: prev.ceiling ?? a.ceiling,
      source_ids: unionSourceIds(prev.source_ids, [a.source_id]),
    };

    return {
      state: { ...state, last_closed: { index, draft: extended } },
      replace: { index, draft: extended },
      transition:
        end !== prev.end_date
          ? createAuditEntry(
              { fund_id: state.fund_id, operation: "EXTEND", old: prev, next: extended, triggered_by: a.source_id },
              now
            )
          : undefined,
    };
  }

  return ambiguous(state, a, "no open or previously closed period to resolve against");
}

/**
 * One transition of the open/extend/close state machine.
 * Pure: returns the next state and what the step produced, never mutates.
 */
export function stepSequencer(
  state: SequencerState,
  a: RawAssertion,
  opts: SequencerOptions = {}
): SequencerStep {
  const now = opts.now ?? systemClock;

  switch (a.kind) {
    case "COMPLETE": {
      // overlap with other drafts is the merger's job
      const draft: DraftInterval = {
        fund_id: state.fund_id,
        start_date: a.start_date,
        end_date: a.end_date,
        ceiling: a.ceiling ?? state.last_ceiling,
        source_ids: [a.source_id],
      };
      return {
        state: { ...state, emitted: state.emitted + 1, last_ceiling: draft.ceiling ?? state.last_ceiling },
        emit: draft,
      };
    }

    case "OPEN_START": {
      const draft: DraftInterval = {
        fund_id: state.fund_id,
        start_date: a.start_date,
        end_date: null,
        ceiling: a.ceiling ?? state.last_ceiling,
        source_ids: [a.source_id],
      };
      const last_ceiling = draft.ceiling ?? state.last_ceiling;

      if (!state.open) {
        return { state: { ...state, open: draft, last_ceiling } };
      }

      // a second open period: the first stays open-ended and is left to the merger
      return {
        state: { ...state, open: draft, emitted: state.emitted + 1, last_ceiling },
        emit: state.open,
        anomaly: {
          code: "CONCURRENT_OPEN",
          fund_id: state.fund_id,
          source_id: a.source_id,
          superseded_start: state.open.start_date,
        },
      };
    }

    case "END_ONLY":
      return stepEndOnly(state, a, now);
  }
}

/**
 * Folds one fund's validated assertions into draft intervals.
 * Sorts first; callers may pass assertions in arrival order.
 */
export function sequenceAssertions(
  fund_id: string,
  assertions: readonly RawAssertion[],
  opts: SequencerOptions = {}
): SequenceResult {
  const drafts: DraftInterval[] = [];
  const skipped: AmbiguousInputError[] = [];
  const anomalies: SequencerAnomaly[] = [];
  const transitions: AuditEntry[] = [];

  let state = initialSequencerState(fund_id);
  for (const a of sortAssertions(assertions)) {
    const step = stepSequencer(state, a, opts);
    if (step.emit) drafts.push(step.emit);
    if (step.replace) drafts[step.replace.index] = step.replace.draft;
    if (step.transition) transitions.push(step.transition);
    if (step.skipped) skipped.push(step.skipped);
    if (step.anomaly) anomalies.push(step.anomaly);
    state = step.state;
  }
  if (state.open) drafts.push(state.open);

  return { fund_id, drafts, skipped, anomalies, transitions };
}
