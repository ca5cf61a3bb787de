// packages/timeline/src/audit.ts
import { z } from "zod";

import { AUDIT_OPERATIONS } from "../../schema/src/schema.js";
import type { AuditEntry, AuditOperation, IsoDate } from "../../schema/src/schema.js";

export const AuditEntrySchema = z.object({
  fund_id: z.string(),
  operation: z.enum(AUDIT_OPERATIONS),
  old_start: z.string().nullable(),
  old_end: z.string().nullable(),
  new_start: z.string().nullable(),
  new_end: z.string().nullable(),
  triggered_by: z.string().nullable(),
  timestamp: z.string(), // ISO
  interval_id: z.string().nullable(),
  related_id: z.string().nullable(),
});

export type Clock = () => string; // ISO timestamp

export function systemClock(): string {
  return new Date().toISOString();
}

export type AuditEntryInput = {
  fund_id: string;
  operation: AuditOperation;
  old?: { start_date: IsoDate; end_date: IsoDate | null } | null;
  next?: { start_date: IsoDate; end_date: IsoDate | null } | null;
  triggered_by: string | null;
  interval_id?: string | null;
  related_id?: string | null;
};

/** Entries are frozen on creation; nothing downstream may edit them. */
export function createAuditEntry(input: AuditEntryInput, now: Clock = systemClock): AuditEntry {
  return Object.freeze({
    fund_id: input.fund_id,
    operation: input.operation,
    old_start: input.old?.start_date ?? null,
    old_end: input.old?.end_date ?? null,
    new_start: input.next?.start_date ?? null,
    new_end: input.next?.end_date ?? null,
    triggered_by: input.triggered_by,
    timestamp: now(),
    interval_id: input.interval_id ?? null,
    related_id: input.related_id ?? null,
  });
}

export type AuditRecorder = {
  record(entry: AuditEntry): void;
};

/**
 * Append-only in-process log. Receives the build trace and the reconcile
 * delta whether or not the store write succeeds.
 */
export class InMemoryAuditRecorder implements AuditRecorder {
  private log: AuditEntry[] = [];

  record(entry: AuditEntry): void {
    this.log.push(Object.isFrozen(entry) ? entry : Object.freeze({ ...entry }));
  }

  entries(): AuditEntry[] {
    return [...this.log];
  }

  forFund(fund_id: string): AuditEntry[] {
    return this.log.filter((e) => e.fund_id === fund_id);
  }

  get size(): number {
    return this.log.length;
  }
}

export function recordAll(recorder: AuditRecorder | undefined, entries: readonly AuditEntry[]): void {
  if (!recorder) return;
  for (const e of entries) recorder.record(e);
}
