// Purchase-limit timeline schema.
// Types only. No functions beyond derived queries.

export type IsoDate = string; // YYYY-MM-DD
export type ISO8601 = string;

/* ----------------------------- Assertions ---------------------------- */

export const ASSERTION_KINDS = ["COMPLETE", "OPEN_START", "END_ONLY"] as const;
export type AssertionKind = (typeof ASSERTION_KINDS)[number];

type AssertionBase = {
  fund_id: string;
  announcement_time: ISO8601; // ordering key
  source_id: string; // originating announcement, tie-break + provenance
  ceiling: number | null; // null = unspecified, inherit context
  confidence: number; // 0..1, informational only
};

export type CompleteAssertion = AssertionBase & {
  kind: "COMPLETE";
  start_date: IsoDate;
  end_date: IsoDate;
};

export type OpenStartAssertion = AssertionBase & {
  kind: "OPEN_START";
  start_date: IsoDate;
};

export type EndOnlyAssertion = AssertionBase & {
  kind: "END_ONLY";
  end_date: IsoDate;
};

export type RawAssertion = CompleteAssertion | OpenStartAssertion | EndOnlyAssertion;

/**
 * Flat record as produced by the extraction step.
 * Only the validator turns it into a RawAssertion.
 */
export type RawAssertionInput = {
  fund_id: string;
  announcement_time: ISO8601;
  source_id: string;
  kind: string;
  start_date?: IsoDate | null;
  end_date?: IsoDate | null;
  ceiling?: number | null;
  confidence?: number | null;
};

/* ------------------------------ Intervals ---------------------------- */

export type DraftInterval = {
  fund_id: string;
  start_date: IsoDate;
  end_date: IsoDate | null; // null = open-ended
  ceiling: number | null;
  source_ids: string[]; // sorted, unique
};

export type CanonicalInterval = DraftInterval & {
  id: string;
  note: string | null;
};

export type IntervalBounds = Pick<DraftInterval, "start_date" | "end_date">;

export function isOpenEnded(interval: IntervalBounds): boolean {
  return interval.end_date === null;
}

/* -------------------------------- Audit ------------------------------ */

export const AUDIT_OPERATIONS = ["CREATE", "EXTEND", "CLOSE", "MERGE"] as const;
export type AuditOperation = (typeof AUDIT_OPERATIONS)[number];

export type AuditEntry = {
  fund_id: string;
  operation: AuditOperation;

  old_start: IsoDate | null;
  old_end: IsoDate | null;
  new_start: IsoDate | null;
  new_end: IsoDate | null;

  triggered_by: string | null; // source_id
  timestamp: ISO8601;

  interval_id: string | null;
  related_id: string | null; // absorbing / absorbed identity
};
