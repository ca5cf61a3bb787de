import { z } from "zod";

import { isIsoDate } from "./dates.js";
import { ValidationError } from "./errors.js";
import { ASSERTION_KINDS } from "./schema.js";
import type { RawAssertion } from "./schema.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const ISO8601 = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Invalid ISO-8601 timestamp");

const Id = z.string().trim().min(1);

/* ------------------------------------------------------------------ */
/*                          Structural schema                         */
/* ------------------------------------------------------------------ */

// Shape only. The per-kind rules below need their own rule codes, so
// dates, ceiling and confidence are checked by hand after this passes.
export const RawAssertionInputSchema = z.object({
  fund_id: Id,
  source_id: Id,
  announcement_time: ISO8601,
  kind: z.enum(ASSERTION_KINDS),
  start_date: z.string().nullish(),
  end_date: z.string().nullish(),
  ceiling: z.unknown().optional(),
  confidence: z.unknown().optional(),
});

export type ValidationResult =
  | { ok: true; assertion: RawAssertion }
  | { ok: false; error: ValidationError };

function fail(error: ValidationError): ValidationResult {
  return { ok: false, error };
}

function sourceIdOf(input: unknown): string | null {
  if (typeof input !== "object" || input === null) return null;
  const v: unknown = Reflect.get(input, "source_id");
  return typeof v === "string" && v.length ? v : null;
}

function readAmount(v: unknown): number | null | undefined {
  if (v === undefined || v === null) return null;
  if (typeof v !== "number" || !Number.isFinite(v)) return undefined;
  return v;
}

/**
 * Checks one raw assertion. Pure; returns the tagged assertion unchanged in
 * meaning, or the first violated rule.
 */
export function validateAssertion(input: unknown): ValidationResult {
  const parsed = RawAssertionInputSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return fail(new ValidationError("MALFORMED", message, sourceIdOf(input)));
  }

  const a = parsed.data;
  const sid = a.source_id;
  const start = a.start_date ?? null;
  const end = a.end_date ?? null;

  for (const [field, value] of [
    ["start_date", start],
    ["end_date", end],
  ] as const) {
    if (value !== null && !isIsoDate(value)) {
      return fail(new ValidationError("INVALID_DATE", `${field} "${value}" is not a YYYY-MM-DD date`, sid));
    }
  }

  const ceiling = readAmount(a.ceiling);
  if (ceiling === undefined || (ceiling !== null && ceiling < 0)) {
    return fail(new ValidationError("INVALID_CEILING", `ceiling must be a finite amount >= 0`, sid));
  }

  const confidence = readAmount(a.confidence);
  if (confidence === undefined || (confidence !== null && (confidence < 0 || confidence > 1))) {
    return fail(new ValidationError("INVALID_CONFIDENCE", `confidence must be within [0, 1]`, sid));
  }

  const base = {
    fund_id: a.fund_id,
    announcement_time: a.announcement_time,
    source_id: sid,
    ceiling,
    confidence: confidence ?? 0,
  };

  switch (a.kind) {
    case "COMPLETE": {
      if (start === null) return fail(new ValidationError("MISSING_START_DATE", "COMPLETE requires start_date", sid));
      if (end === null) return fail(new ValidationError("MISSING_END_DATE", "COMPLETE requires end_date", sid));
      if (start > end) {
        return fail(new ValidationError("START_AFTER_END", `start_date ${start} is after end_date ${end}`, sid));
      }
      return { ok: true, assertion: { ...base, kind: "COMPLETE", start_date: start, end_date: end } };
    }

    case "OPEN_START": {
      if (start === null) return fail(new ValidationError("MISSING_START_DATE", "OPEN_START requires start_date", sid));
      if (end !== null) return fail(new ValidationError("FORBIDDEN_END_DATE", "OPEN_START must not carry end_date", sid));
      return { ok: true, assertion: { ...base, kind: "OPEN_START", start_date: start } };
    }

    case "END_ONLY": {
      if (end === null) return fail(new ValidationError("MISSING_END_DATE", "END_ONLY requires end_date", sid));
      if (start !== null) {
        return fail(new ValidationError("FORBIDDEN_START_DATE", "END_ONLY must not carry start_date", sid));
      }
      return { ok: true, assertion: { ...base, kind: "END_ONLY", end_date: end } };
    }
  }
}

export type ValidatedBatch = {
  valid: RawAssertion[];
  rejected: ValidationError[];
};

export function validateAssertions(inputs: readonly unknown[]): ValidatedBatch {
  const valid: RawAssertion[] = [];
  const rejected: ValidationError[] = [];
  for (const input of inputs) {
    const r = validateAssertion(input);
    if (r.ok) valid.push(r.assertion);
    else rejected.push(r.error);
  }
  return { valid, rejected };
}
