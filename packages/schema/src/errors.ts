export type TimelineErrorCode =
  | "VALIDATION_ERROR"
  | "AMBIGUOUS_INPUT"
  | "INTEGRITY_VIOLATION"
  | "RECONCILIATION_CONFLICT"
  | "CONFIG_ERROR";

export class TimelineError extends Error {
  readonly code: TimelineErrorCode;

  constructor(code: TimelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ValidationRule =
  | "MALFORMED"
  | "INVALID_DATE"
  | "MISSING_START_DATE"
  | "MISSING_END_DATE"
  | "FORBIDDEN_START_DATE"
  | "FORBIDDEN_END_DATE"
  | "START_AFTER_END"
  | "INVALID_CEILING"
  | "INVALID_CONFIDENCE"
  | "FUND_MISMATCH"
  | "UNSORTED_DATES";

export class ValidationError extends TimelineError {
  readonly rule: ValidationRule;
  readonly source_id: string | null;

  constructor(rule: ValidationRule, message: string, source_id: string | null = null) {
    super("VALIDATION_ERROR", message);
    this.rule = rule;
    this.source_id = source_id;
  }
}

/** END_ONLY with nothing to close or extend. */
export class AmbiguousInputError extends TimelineError {
  readonly fund_id: string;
  readonly source_id: string;

  constructor(fund_id: string, source_id: string, message: string) {
    super("AMBIGUOUS_INPUT", message);
    this.fund_id = fund_id;
    this.source_id = source_id;
  }
}

export class IntegrityViolation extends TimelineError {
  readonly fund_id: string;
  readonly details: string[];

  constructor(fund_id: string, details: string[]) {
    super("INTEGRITY_VIOLATION", `Integrity violation for fund ${fund_id}: ${details.join("; ")}`);
    this.fund_id = fund_id;
    this.details = details;
  }
}

export class ReconciliationConflict extends TimelineError {
  readonly fund_id: string;
  readonly expected_revision: number;
  readonly actual_revision: number;

  constructor(fund_id: string, expected_revision: number, actual_revision: number) {
    super(
      "RECONCILIATION_CONFLICT",
      `Expected revision ${expected_revision} for fund ${fund_id} but current is ${actual_revision}.`
    );
    this.fund_id = fund_id;
    this.expected_revision = expected_revision;
    this.actual_revision = actual_revision;
  }
}

export class ConfigError extends TimelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_ERROR", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function isTimelineError(e: unknown): e is TimelineError {
  return e instanceof TimelineError;
}
