// examples/run-projection.ts
import { mergeDrafts } from "../packages/timeline/src/merger.js";
import { UNLIMITED, projectOnDates } from "../packages/timeline/src/projector.js";
import { sequenceAssertions } from "../packages/timeline/src/sequencer.js";
import { validateAssertions } from "../packages/schema/src/validate.js";

const fund_id = "FUND_DEMO_002";
const base = { fund_id, confidence: 1 };

const { valid, rejected } = validateAssertions([
  { ...base, source_id: "n1.pdf", announcement_time: "2025-03-01", kind: "COMPLETE", start_date: "2025-03-03", end_date: "2025-03-05", ceiling: 100 },
  { ...base, source_id: "n2.pdf", announcement_time: "2025-03-04", kind: "COMPLETE", start_date: "2025-03-05", end_date: "2025-03-07", ceiling: 80 },
  { ...base, source_id: "n3.pdf", announcement_time: "2025-03-06", kind: "OPEN_START", start_date: "2025-03-12" },
  { ...base, source_id: "n4.pdf", announcement_time: "2025-03-06", kind: "END_ONLY", start_date: "2025-03-01", end_date: "2025-03-09" },
]);

const seq = sequenceAssertions(fund_id, valid);
const { intervals } = mergeDrafts(fund_id, seq.drafts);

// trading days only
const days = ["2025-03-03", "2025-03-04", "2025-03-06", "2025-03-07", "2025-03-10", "2025-03-12", "2025-03-13"];

for (const l of projectOnDates(intervals, days)) {
  console.log(`${l.date}  ${l.ceiling === UNLIMITED ? "unlimited" : l.ceiling}`);
}
console.log(`rejected: ${rejected.map((e) => `${e.source_id ?? "?"}:${e.rule}`).join(", ") || "none"}`);
