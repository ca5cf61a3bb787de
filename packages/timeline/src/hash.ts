// packages/timeline/src/hash.ts
import { createHash } from "node:crypto";

import type { DraftInterval } from "../../schema/src/schema.js";

import { compareStrings } from "./interval.js";

type Field = string | number | null | readonly string[];

/** JSON of a flat record with its keys sorted. */
export function canonicalJson(record: Readonly<Record<string, Field>>): string {
  const fields = Object.keys(record)
    .sort(compareStrings)
    .map((k) => `${JSON.stringify(k)}:${JSON.stringify(record[k])}`);
  return `{${fields.join(",")}}`;
}

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/** Deterministic identity for a freshly created canonical interval. */
export function intervalIdentity(
  fund_id: string,
  interval: Pick<DraftInterval, "start_date" | "source_ids">
): string {
  const digest = sha256Hex(
    canonicalJson({ fund_id, start_date: interval.start_date, source_ids: interval.source_ids })
  );
  return `lim_${digest.slice(0, 16)}`;
}

/** Fingerprint of a canonical set; equal inputs give byte-identical output. */
export function fingerprintIntervals(intervals: readonly DraftInterval[]): string {
  const rows = intervals.map((i) =>
    canonicalJson({
      fund_id: i.fund_id,
      start_date: i.start_date,
      end_date: i.end_date,
      ceiling: i.ceiling,
      source_ids: i.source_ids,
    })
  );
  return sha256Hex(`[${rows.join(",")}]`);
}
