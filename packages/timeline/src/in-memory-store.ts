import { ReconciliationConflict } from "../../schema/src/errors.js";
import type { ParseRecord } from "../../schema/src/parse-record.js";
import type { AuditEntry, CanonicalInterval } from "../../schema/src/schema.js";

import { compareStrings } from "./interval.js";
import type { ParseRecordStore, PriorState, ReconcileDelta, TimelineStore } from "./store.js";

function clone<T>(x: T): T {
  // intervals/records are plain JSON-safe objects here
  return JSON.parse(JSON.stringify(x)) as T;
}

type FundSlot = {
  intervals: Map<string, CanonicalInterval>;
  audit: AuditEntry[];
  revision: number;
};

function byStart(a: CanonicalInterval, b: CanonicalInterval): number {
  return compareStrings(a.start_date, b.start_date) || compareStrings(a.id, b.id);
}

export class InMemoryTimelineStore implements TimelineStore, ParseRecordStore {
  private funds = new Map<string, FundSlot>();
  private parses = new Map<string, Map<string, ParseRecord>>();

  private slot(fund_id: string): FundSlot {
    let s = this.funds.get(fund_id);
    if (!s) {
      s = { intervals: new Map(), audit: [], revision: 0 };
      this.funds.set(fund_id, s);
    }
    return s;
  }

  async readPriorState(fund_id: string): Promise<PriorState> {
    const s = this.funds.get(fund_id);
    return {
      fund_id,
      intervals: s ? [...s.intervals.values()].map(clone).sort(byStart) : [],
      revision: s?.revision ?? 0,
    };
  }

  async listIntervals(fund_id: string): Promise<CanonicalInterval[]> {
    return (await this.readPriorState(fund_id)).intervals;
  }

  async applyDelta(
    fund_id: string,
    delta: ReconcileDelta,
    expected_revision: number
  ): Promise<{ revision: number }> {
    const s = this.slot(fund_id);
    if (s.revision !== expected_revision) {
      throw new ReconciliationConflict(fund_id, expected_revision, s.revision);
    }

    // stage on a copy so a bad delta leaves nothing half-applied
    const next = new Map(s.intervals);
    for (const r of delta.removals) next.delete(r.id);
    for (const i of [...delta.creates, ...delta.updates]) next.set(i.id, clone(i));

    s.intervals = next;
    s.audit.push(...delta.audit.map(clone));
    s.revision += 1;
    return { revision: s.revision };
  }

  async listAuditEntries(fund_id: string): Promise<AuditEntry[]> {
    return (this.funds.get(fund_id)?.audit ?? []).map(clone);
  }

  async listFunds(): Promise<string[]> {
    const ids = new Set([...this.funds.keys(), ...this.parses.keys()]);
    return [...ids].sort(compareStrings);
  }

  // ---------------- parse records ----------------

  async putParseRecord(record: ParseRecord): Promise<void> {
    let m = this.parses.get(record.fund_id);
    if (!m) {
      m = new Map();
      this.parses.set(record.fund_id, m);
    }
    m.set(record.source_id, clone(record));
  }

  async listParseRecords(fund_id: string): Promise<ParseRecord[]> {
    const m = this.parses.get(fund_id);
    if (!m) return [];
    return [...m.values()]
      .map(clone)
      .sort(
        (a, b) =>
          compareStrings(a.announcement_date, b.announcement_date) || compareStrings(a.source_id, b.source_id)
      );
  }

  async listParseRecordFunds(): Promise<string[]> {
    return [...this.parses.keys()].sort(compareStrings);
  }
}
