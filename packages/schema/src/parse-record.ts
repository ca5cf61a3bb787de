import { z } from "zod";

import type { IsoDate, RawAssertionInput } from "./schema.js";

/**
 * One stored extraction result for one announcement file.
 * `parse_result` is whatever the extraction step wrote; it is checked here,
 * not trusted.
 */
export type ParseRecord = {
  fund_id: string;
  announcement_date: IsoDate;
  source_id: string; // announcement file name
  parse_result: unknown;
  created_at?: string;
};

export const ParseRecordSchema = z.object({
  fund_id: z.string().trim().min(1),
  announcement_date: z.string().min(1),
  source_id: z.string().trim().min(1),
  parse_result: z.unknown(),
  created_at: z.string().optional(),
});

// Numbers sometimes come back as strings ("100", "0.9").
const LooseNumber = z.union([z.number(), z.string(), z.null()]).optional();

export const ParseResultSchema = z.object({
  ticker: z.string().nullish(),
  limit_amount: LooseNumber,
  start_date: z.string().nullish(),
  end_date: z.string().nullish(),
  announcement_type: z.string().nullish(),
  is_purchase_limit_announcement: z.boolean().optional(),
  confidence: LooseNumber,
  error: z.string().nullish(),
});

const TYPE_TO_KIND = new Map<string, RawAssertionInput["kind"]>([
  ["complete", "COMPLETE"],
  ["open-start", "OPEN_START"],
  ["end-only", "END_ONLY"],
]);

export type ParseRecordSkipReason =
  | "MALFORMED_RESULT"
  | "PARSE_FAILED"
  | "NOT_LIMIT_ANNOUNCEMENT"
  | "UNSUPPORTED_TYPE";

export type ParseRecordAdaptResult =
  | { ok: true; input: RawAssertionInput }
  | { ok: false; source_id: string; reason: ParseRecordSkipReason; message: string };

function toNumber(v: number | string | null | undefined): number | null {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return v;
  const s = v.trim();
  if (!s) return null;
  const n = Number(s);
  return Number.isNaN(n) ? null : n;
}

function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

/** Parse type column value for a stored record, if it has one. */
export function parseTypeOf(parse_result: unknown): string | null {
  const r = ParseResultSchema.safeParse(parse_result);
  return r.success ? (r.data.announcement_type ?? null) : null;
}

export function confidenceOf(parse_result: unknown): number | null {
  const r = ParseResultSchema.safeParse(parse_result);
  if (!r.success) return null;
  const c = toNumber(r.data.confidence);
  return c === null ? null : clamp01(c);
}

/**
 * Maps a stored extraction result to a raw assertion input.
 * Dates and amounts pass through as extracted; the validator judges them.
 */
export function assertionFromParseRecord(record: ParseRecord): ParseRecordAdaptResult {
  const skip = (reason: ParseRecordSkipReason, message: string): ParseRecordAdaptResult => ({
    ok: false,
    source_id: record.source_id,
    reason,
    message,
  });

  const r = ParseResultSchema.safeParse(record.parse_result);
  if (!r.success) return skip("MALFORMED_RESULT", r.error.issues.map((i) => i.message).join("; "));

  const p = r.data;
  if (p.error) return skip("PARSE_FAILED", p.error);
  if (p.is_purchase_limit_announcement !== true) {
    return skip("NOT_LIMIT_ANNOUNCEMENT", "not a purchase limit announcement");
  }

  const label = p.announcement_type ? TYPE_TO_KIND.get(p.announcement_type) : undefined;
  if (!label) return skip("UNSUPPORTED_TYPE", `unsupported announcement_type: ${String(p.announcement_type ?? null)}`);

  let kind = label;
  let start_date = p.start_date ?? null;
  const end_date = p.end_date ?? null;

  // "open-start" means the limit is already running and only its end is
  // announced; with no start it runs from the announcement day.
  if (label === "OPEN_START" && end_date !== null) {
    kind = "COMPLETE";
    if (start_date === null) start_date = record.announcement_date.slice(0, 10);
  }

  const confidence = toNumber(p.confidence);

  return {
    ok: true,
    input: {
      fund_id: record.fund_id,
      announcement_time: record.announcement_date,
      source_id: record.source_id,
      kind,
      start_date,
      end_date,
      ceiling: toNumber(p.limit_amount),
      confidence: confidence === null ? null : clamp01(confidence),
    },
  };
}
