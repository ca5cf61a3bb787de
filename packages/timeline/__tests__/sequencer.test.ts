// packages/timeline/__tests__/sequencer.test.ts
import { describe, expect, it } from "vitest";

import { AmbiguousInputError } from "../../schema/src/errors.js";
import { initialSequencerState, sequenceAssertions, sortAssertions, stepSequencer } from "../src/sequencer.js";

import { FUND, NOW, complete, draft, endOnly, fixedClock, openStart } from "./_helpers/fixtures.js";

const opts = { now: fixedClock };

describe("sequencer", () => {
  it("emits a COMPLETE assertion as its own draft", () => {
    const r = sequenceAssertions(FUND, [complete("a", "2024-01-02", "2024-01-05", "2024-01-10", 100)], opts);

    expect(r.drafts).toEqual([draft("2024-01-05", "2024-01-10", 100, ["a"])]);
    expect(r.transitions).toEqual([]);
    expect(r.skipped).toEqual([]);
  });

  it("closes the open period on END_ONLY (resume)", () => {
    const r = sequenceAssertions(
      FUND,
      [openStart("a", "2024-01-01", "2024-01-05", 50), endOnly("b", "2024-01-20", "2024-01-19")],
      opts
    );

    expect(r.drafts).toEqual([draft("2024-01-05", "2024-01-19", 50, ["a", "b"])]);
    expect(r.transitions).toEqual([
      {
        fund_id: FUND,
        operation: "CLOSE",
        old_start: "2024-01-05",
        old_end: null,
        new_start: "2024-01-05",
        new_end: "2024-01-19",
        triggered_by: "b",
        timestamp: NOW,
        interval_id: null,
        related_id: null,
      },
    ]);
  });

  it("extends the last closed period in place instead of duplicating it", () => {
    const r = sequenceAssertions(
      FUND,
      [
        openStart("a", "2024-01-01", "2024-01-05"),
        endOnly("b", "2024-01-08", "2024-01-09"),
        endOnly("c", "2024-01-12", "2024-01-13"),
      ],
      opts
    );

    expect(r.drafts).toEqual([draft("2024-01-05", "2024-01-13", 100, ["a", "b", "c"])]);
    expect(r.transitions.map((t) => [t.operation, t.old_end, t.new_end, t.triggered_by])).toEqual([
      ["CLOSE", null, "2024-01-09", "b"],
      ["EXTEND", "2024-01-09", "2024-01-13", "c"],
    ]);
  });

  it("never shortens a period on a later, earlier-ending END_ONLY", () => {
    const r = sequenceAssertions(
      FUND,
      [
        openStart("a", "2024-01-01", "2024-01-05"),
        endOnly("b", "2024-01-08", "2024-01-20"),
        endOnly("c", "2024-01-12", "2024-01-10"),
      ],
      opts
    );

    expect(r.drafts).toEqual([draft("2024-01-05", "2024-01-20", 100, ["a", "b", "c"])]);
    expect(r.transitions.map((t) => t.operation)).toEqual(["CLOSE"]);
  });

  it("skips an END_ONLY with nothing to resolve against", () => {
    const r = sequenceAssertions(FUND, [endOnly("x", "2024-01-02", "2024-01-09")], opts);

    expect(r.drafts).toEqual([]);
    expect(r.skipped).toHaveLength(1);
    expect(r.skipped[0]).toBeInstanceOf(AmbiguousInputError);
    expect(r.skipped[0]?.source_id).toBe("x");
    expect(r.skipped[0]?.code).toBe("AMBIGUOUS_INPUT");
  });

  it("does not let a COMPLETE period be extended by END_ONLY", () => {
    const r = sequenceAssertions(
      FUND,
      [complete("a", "2024-01-02", "2024-01-05", "2024-01-10"), endOnly("b", "2024-01-09", "2024-01-15")],
      opts
    );

    expect(r.drafts).toEqual([draft("2024-01-05", "2024-01-10", 100, ["a"])]);
    expect(r.skipped.map((e) => e.source_id)).toEqual(["b"]);
  });

  it("skips an END_ONLY that ends before the open period starts", () => {
    const r = sequenceAssertions(
      FUND,
      [openStart("a", "2024-01-01", "2024-01-10"), endOnly("b", "2024-01-03", "2024-01-05")],
      opts
    );

    expect(r.skipped.map((e) => e.source_id)).toEqual(["b"]);
    expect(r.drafts).toEqual([draft("2024-01-10", null, 100, ["a"])]);
  });

  it("sorts by announcement time before folding", () => {
    const inOrder = sequenceAssertions(
      FUND,
      [openStart("a", "2024-01-01", "2024-01-05", 50), endOnly("b", "2024-01-20", "2024-01-19")],
      opts
    );
    const arrived = sequenceAssertions(
      FUND,
      [endOnly("b", "2024-01-20", "2024-01-19"), openStart("a", "2024-01-01", "2024-01-05", 50)],
      opts
    );

    expect(arrived).toEqual(inOrder);
  });

  it("breaks announcement-time ties by source id", () => {
    const sorted = sortAssertions([
      openStart("b", "2024-01-01", "2024-01-05"),
      endOnly("a", "2024-01-01", "2024-01-09"),
    ]);
    expect(sorted.map((a) => a.source_id)).toEqual(["a", "b"]);

    // "a" is folded first and finds no context
    const r = sequenceAssertions(FUND, sorted, opts);
    expect(r.skipped.map((e) => e.source_id)).toEqual(["a"]);
    expect(r.drafts).toEqual([draft("2024-01-05", null, 100, ["b"])]);
  });

  it("emits a superseded open period and flags the anomaly", () => {
    const r = sequenceAssertions(
      FUND,
      [openStart("a", "2024-01-01", "2024-01-05"), openStart("b", "2024-01-10", "2024-01-12")],
      opts
    );

    expect(r.drafts).toEqual([draft("2024-01-05", null, 100, ["a"]), draft("2024-01-12", null, 100, ["b"])]);
    expect(r.anomalies).toEqual([
      { code: "CONCURRENT_OPEN", fund_id: FUND, source_id: "b", superseded_start: "2024-01-05" },
    ]);
  });

  it("inherits the most recent known ceiling when none is stated", () => {
    const r = sequenceAssertions(
      FUND,
      [
        openStart("a", "2024-01-01", "2024-01-05", 500),
        endOnly("b", "2024-01-08", "2024-01-09"),
        complete("c", "2024-02-01", "2024-02-05", "2024-02-06", null),
      ],
      opts
    );

    expect(r.drafts.map((d) => d.ceiling)).toEqual([500, 500]);
  });

  it("fills an unspecified ceiling from the closing announcement", () => {
    const r = sequenceAssertions(
      FUND,
      [openStart("a", "2024-01-01", "2024-01-05", null), endOnly("b", "2024-01-08", "2024-01-09", 1000)],
      opts
    );

    expect(r.drafts).toEqual([draft("2024-01-05", "2024-01-09", 1000, ["a", "b"])]);
  });

  it("steps without mutating the previous state", () => {
    const s0 = initialSequencerState(FUND);
    const step1 = stepSequencer(s0, openStart("a", "2024-01-01", "2024-01-05"), opts);
    const step2 = stepSequencer(step1.state, endOnly("b", "2024-01-08", "2024-01-09"), opts);
    const step3 = stepSequencer(step2.state, endOnly("c", "2024-01-10", "2024-01-12"), opts);

    const closed = draft("2024-01-05", "2024-01-09", 100, ["a", "b"]);
    const extended = draft("2024-01-05", "2024-01-12", 100, ["a", "b", "c"]);

    expect(s0).toEqual({ fund_id: FUND, open: null, last_closed: null, emitted: 0, last_ceiling: null });
    expect(step1.state.open).toEqual(draft("2024-01-05", null, 100, ["a"]));
    expect(step1.emit).toBeUndefined();

    expect(step2.emit).toEqual(closed);
    expect(step2.transition?.operation).toBe("CLOSE");
    expect(step2.state).toMatchObject({ open: null, last_closed: { index: 0, draft: closed }, emitted: 1 });

    expect(step3.emit).toBeUndefined();
    expect(step3.replace).toEqual({ index: 0, draft: extended });
    expect(step3.transition?.operation).toBe("EXTEND");
    expect(step2.state.last_closed?.draft).toEqual(closed);
  });

  it("folds a long run of assertions in announcement order", () => {
    const inputs = Array.from({ length: 200 }, (_, i) => {
      const day = String((i % 28) + 1).padStart(2, "0");
      const month = String(Math.floor(i / 28) + 1).padStart(2, "0");
      const date = `2024-${month}-${day}`;
      return complete(`s${String(i).padStart(3, "0")}`, date, date, date);
    });

    const r = sequenceAssertions(FUND, inputs, opts);
    expect(r.drafts).toHaveLength(200);
    expect(r.drafts[199]).toEqual(draft("2024-08-04", "2024-08-04", 100, ["s199"]));
  });
});
