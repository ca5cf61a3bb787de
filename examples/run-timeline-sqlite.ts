// examples/run-timeline-sqlite.ts
import { InMemoryAuditRecorder } from "../packages/timeline/src/audit.js";
import { rebuildFund } from "../packages/timeline/src/pipeline.js";
import { SqliteTimelineStore } from "../packages/timeline/src/sqlite-store.js";

function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

function makeDeterministicNow(startIso = "2025-01-01T00:00:00.000Z") {
  let t = Date.parse(startIso);
  return () => {
    const iso = new Date(t).toISOString();
    t += 1;
    return iso;
  };
}

async function main() {
  const store = new SqliteTimelineStore(":memory:");
  const recorder = new InMemoryAuditRecorder();
  const opts = { now: makeDeterministicNow(), recorder };

  const fund_id = "FUND_DEMO_001";
  const base = { fund_id, confidence: 0.9 };

  const announced = [
    { ...base, source_id: "a1.pdf", announcement_time: "2025-01-02", kind: "OPEN_START", start_date: "2025-01-06", ceiling: 1000 },
    { ...base, source_id: "a2.pdf", announcement_time: "2025-01-09", kind: "COMPLETE", start_date: "2025-01-08", end_date: "2025-01-20", ceiling: 500 },
  ];

  // run 1: one open period swallowed the complete one
  const r1 = await rebuildFund(store, fund_id, announced, opts);
  assert(r1.intervals.length === 1, "expected one interval");
  assert(r1.intervals[0]?.end_date === null, "expected an open tail");

  // run 2: a late announcement closes it
  const closing = { ...base, source_id: "a3.pdf", announcement_time: "2025-02-01", kind: "END_ONLY", end_date: "2025-01-31" };
  const r2 = await rebuildFund(store, fund_id, [...announced, closing], opts);
  assert(r2.reconcile.delta.updates.length === 1, "expected the open interval to keep its identity");

  // run 3: same input, nothing to write
  const r3 = await rebuildFund(store, fund_id, [...announced, closing], opts);
  assert(!r3.reconcile.written, "re-run must be a no-op");
  assert(r3.fingerprint === r2.fingerprint, "fingerprint changed on re-run");

  console.log(
    JSON.stringify(
      {
        fund_id,
        intervals: await store.listIntervals(fund_id),
        persisted_audit: await store.listAuditEntries(fund_id),
        recorded: recorder.size,
      },
      null,
      2
    )
  );
  store.close();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
