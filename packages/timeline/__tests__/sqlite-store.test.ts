// packages/timeline/__tests__/sqlite-store.test.ts
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";

import { ReconciliationConflict } from "../../schema/src/errors.js";
import { createAuditEntry } from "../src/audit.js";
import { SqliteTimelineStore } from "../src/sqlite-store.js";
import type { ReconcileDelta } from "../src/store.js";

import { FUND, canonical, draft, fixedClock } from "./_helpers/fixtures.js";

function delta(partial: Partial<ReconcileDelta>): ReconcileDelta {
  return { fund_id: FUND, creates: [], updates: [], removals: [], unchanged: [], audit: [], ...partial };
}

const closed = canonical("lim_a", draft("2024-01-01", "2024-01-05", 100, ["a"]), "1 source announcement");
const open = canonical("lim_b", draft("2024-02-01", null, null, ["b", "c"]), "2 source announcements");

describe("SqliteTimelineStore", () => {
  const cleanup: Array<() => void> = [];

  afterEach(() => {
    for (const fn of cleanup.splice(0)) fn();
  });

  it("round-trips intervals and bumps the revision per write", async () => {
    const store = new SqliteTimelineStore(":memory:");

    const r1 = await store.applyDelta(FUND, delta({ creates: [open, closed] }), 0);
    expect(r1.revision).toBe(1);

    const prior = await store.readPriorState(FUND);
    expect(prior).toEqual({ fund_id: FUND, intervals: [closed, open], revision: 1 });

    const widened = { ...closed, end_date: "2024-01-09" };
    await store.applyDelta(
      FUND,
      delta({ updates: [widened], removals: [{ id: "lim_b", absorbed_into: null }] }),
      1
    );
    expect(await store.listIntervals(FUND)).toEqual([widened]);
    expect((await store.readPriorState(FUND)).revision).toBe(2);
    store.close();
  });

  it("rejects a stale revision and leaves the fund untouched", async () => {
    const store = new SqliteTimelineStore(":memory:");
    await store.applyDelta(FUND, delta({ creates: [closed] }), 0);

    await expect(store.applyDelta(FUND, delta({ creates: [open] }), 0)).rejects.toBeInstanceOf(
      ReconciliationConflict
    );
    expect(await store.listIntervals(FUND)).toEqual([closed]);

    // the failed transaction was rolled back, so the next write goes through
    await store.applyDelta(FUND, delta({ creates: [open] }), 1);
    expect((await store.listIntervals(FUND)).map((i) => i.id)).toEqual(["lim_a", "lim_b"]);
    store.close();
  });

  it("appends audit entries in write order", async () => {
    const store = new SqliteTimelineStore(":memory:");
    const create = createAuditEntry(
      { fund_id: FUND, operation: "CREATE", next: closed, triggered_by: "a", interval_id: "lim_a" },
      fixedClock
    );
    const close = createAuditEntry(
      { fund_id: FUND, operation: "CLOSE", old: closed, triggered_by: null, interval_id: "lim_a" },
      fixedClock
    );

    await store.applyDelta(FUND, delta({ creates: [closed], audit: [create] }), 0);
    await store.applyDelta(FUND, delta({ removals: [{ id: "lim_a", absorbed_into: null }], audit: [close] }), 1);

    expect(await store.listAuditEntries(FUND)).toEqual([create, close]);
    expect(await store.listAuditEntries("OTHER")).toEqual([]);
    store.close();
  });

  it("derives is_open_ended from end_date", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "limit-timeline-"));
    cleanup.push(() => fs.rmSync(dir, { recursive: true, force: true }));
    const file = path.join(dir, "limits.sqlite");

    const store = new SqliteTimelineStore(file);
    await store.applyDelta(FUND, delta({ creates: [closed, open] }), 0);
    store.close();

    const db = new Database(file, { readonly: true });
    const rows = db.prepare(`SELECT id, is_open_ended FROM limit_events ORDER BY id`).all();
    db.close();

    expect(rows).toEqual([
      { id: "lim_a", is_open_ended: 0 },
      { id: "lim_b", is_open_ended: 1 },
    ]);
  });

  it("keeps one parse record per announcement, replaced on re-processing", async () => {
    const store = new SqliteTimelineStore(":memory:");

    await store.putParseRecord({
      fund_id: FUND,
      announcement_date: "2024-01-05",
      source_id: "b.pdf",
      parse_result: { announcement_type: "complete", confidence: 0.5 },
      created_at: "2024-01-05T00:00:00.000Z",
    });
    await store.putParseRecord({
      fund_id: FUND,
      announcement_date: "2024-01-02",
      source_id: "a.pdf",
      parse_result: { announcement_type: "open-start" },
      created_at: "2024-01-02T00:00:00.000Z",
    });
    await store.putParseRecord({
      fund_id: FUND,
      announcement_date: "2024-01-05",
      source_id: "b.pdf",
      parse_result: { announcement_type: "end-only" },
      created_at: "2024-01-06T00:00:00.000Z",
    });
    await store.putParseRecord({
      fund_id: "F002",
      announcement_date: "2024-01-03",
      source_id: "c.pdf",
      parse_result: null,
      created_at: "2024-01-03T00:00:00.000Z",
    });

    const records = await store.listParseRecords(FUND);
    expect(records.map((r) => [r.source_id, r.parse_result])).toEqual([
      ["a.pdf", { announcement_type: "open-start" }],
      ["b.pdf", { announcement_type: "end-only" }],
    ]);
    expect(await store.listParseRecordFunds()).toEqual([FUND, "F002"]);

    await store.applyDelta("F000", delta({ fund_id: "F000", creates: [{ ...closed, fund_id: "F000", id: "x" }] }), 0);
    expect(await store.listFunds()).toEqual(["F000", FUND, "F002"]);
    store.close();
  });

  it("keeps a concurrent fund's write when another fund's write rolls back", async () => {
    const store = new SqliteTimelineStore(":memory:");
    const a = { ...closed, fund_id: "FA", id: "lim_x" };
    const b = { ...closed, fund_id: "FB", id: "lim_y" };

    const [stale, fresh] = await Promise.allSettled([
      store.applyDelta("FA", delta({ fund_id: "FA", creates: [a] }), 99),
      store.applyDelta("FB", delta({ fund_id: "FB", creates: [b] }), 0),
    ]);

    expect(stale.status).toBe("rejected");
    if (stale.status === "rejected") expect(stale.reason).toBeInstanceOf(ReconciliationConflict);
    expect(fresh).toEqual({ status: "fulfilled", value: { revision: 1 } });

    expect(await store.readPriorState("FB")).toEqual({ fund_id: "FB", intervals: [b], revision: 1 });
    expect(await store.readPriorState("FA")).toEqual({ fund_id: "FA", intervals: [], revision: 0 });
    store.close();
  });

  it("runs overlapping writes for different funds one after another", async () => {
    const store = new SqliteTimelineStore(":memory:");
    const funds = ["F1", "F2", "F3", "F4"];

    const results = await Promise.all(
      funds.map((f) =>
        store.applyDelta(f, delta({ fund_id: f, creates: [{ ...closed, fund_id: f, id: `lim_${f}` }] }), 0)
      )
    );

    expect(results).toEqual(funds.map(() => ({ revision: 1 })));
    for (const f of funds) {
      expect((await store.listIntervals(f)).map((i) => i.id)).toEqual([`lim_${f}`]);
    }
    store.close();
  });
});
