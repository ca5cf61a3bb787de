// packages/timeline/__tests__/_helpers/fixtures.ts
import { ReconciliationConflict } from "../../../schema/src/errors.js";
import type {
  CanonicalInterval,
  CompleteAssertion,
  DraftInterval,
  EndOnlyAssertion,
  OpenStartAssertion,
} from "../../../schema/src/schema.js";

import { InMemoryTimelineStore } from "../../src/in-memory-store.js";
import type { PriorState, ReconcileDelta, TimelineStore } from "../../src/store.js";

export const FUND = "F001";
export const NOW = "2024-06-01T00:00:00.000Z";
export const fixedClock = () => NOW;

export function complete(
  source_id: string,
  announcement_time: string,
  start_date: string,
  end_date: string,
  ceiling: number | null = 100
): CompleteAssertion {
  return { fund_id: FUND, announcement_time, source_id, kind: "COMPLETE", start_date, end_date, ceiling, confidence: 0.9 };
}

export function openStart(
  source_id: string,
  announcement_time: string,
  start_date: string,
  ceiling: number | null = 100
): OpenStartAssertion {
  return { fund_id: FUND, announcement_time, source_id, kind: "OPEN_START", start_date, ceiling, confidence: 0.9 };
}

export function endOnly(
  source_id: string,
  announcement_time: string,
  end_date: string,
  ceiling: number | null = null
): EndOnlyAssertion {
  return { fund_id: FUND, announcement_time, source_id, kind: "END_ONLY", end_date, ceiling, confidence: 0.9 };
}

export function draft(
  start_date: string,
  end_date: string | null,
  ceiling: number | null,
  source_ids: string[]
): DraftInterval {
  return { fund_id: FUND, start_date, end_date, ceiling, source_ids };
}

export function canonical(id: string, d: DraftInterval, note: string | null = null): CanonicalInterval {
  return { ...d, id, note };
}

/**
 * Delegates to an in-memory store but reports a stale revision for the first
 * `conflicts` writes, the way a concurrent writer would.
 */
export class ContendedStore implements Pick<TimelineStore, "readPriorState" | "applyDelta"> {
  readonly inner = new InMemoryTimelineStore();
  writes = 0;

  constructor(private conflicts: number) {}

  async readPriorState(fund_id: string): Promise<PriorState> {
    return this.inner.readPriorState(fund_id);
  }

  async applyDelta(fund_id: string, delta: ReconcileDelta, expected_revision: number): Promise<{ revision: number }> {
    this.writes += 1;
    if (this.conflicts > 0) {
      this.conflicts -= 1;
      throw new ReconciliationConflict(fund_id, expected_revision, expected_revision + 1);
    }
    return this.inner.applyDelta(fund_id, delta, expected_revision);
  }
}
