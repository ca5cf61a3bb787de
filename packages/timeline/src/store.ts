// packages/timeline/src/store.ts
import type { ParseRecord } from "../../schema/src/parse-record.js";
import type { AuditEntry, CanonicalInterval } from "../../schema/src/schema.js";

/**
 * Persisted canonical set for one fund plus the revision it was read at.
 * The revision is what makes a stale read detectable on write.
 */
export type PriorState = {
  fund_id: string;
  intervals: CanonicalInterval[]; // sorted by start_date
  revision: number; // 0 = never written
};

export type IntervalRemoval = {
  id: string;
  absorbed_into: string | null;
};

/**
 * Minimal write set for one fund, computed against one PriorState.
 * Applied as a single batch or not at all.
 */
export type ReconcileDelta = {
  fund_id: string;
  creates: CanonicalInterval[];
  updates: CanonicalInterval[]; // same id, new bounds/ceiling/provenance
  removals: IntervalRemoval[];
  unchanged: string[];
  audit: AuditEntry[];
};

/**
 * TimelineStore contract
 * - canonical intervals are replaced, never edited field by field
 * - audit entries are append-only
 * - applyDelta is atomic per fund and rejects a stale expected_revision
 *   with ReconciliationConflict
 */
export type TimelineStore = {
  readPriorState(fund_id: string): Promise<PriorState>;
  listIntervals(fund_id: string): Promise<CanonicalInterval[]>;

  applyDelta(
    fund_id: string,
    delta: ReconcileDelta,
    expected_revision: number
  ): Promise<{ revision: number }>;

  listAuditEntries(fund_id: string): Promise<AuditEntry[]>;
  listFunds(): Promise<string[]>;
};

/**
 * Raw extraction results, kept so a rebuild can replay every announcement
 * (including late corrections) from scratch.
 */
export type ParseRecordStore = {
  putParseRecord(record: ParseRecord): Promise<void>;
  listParseRecords(fund_id: string): Promise<ParseRecord[]>;
  listParseRecordFunds(): Promise<string[]>;
};
