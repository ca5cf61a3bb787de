// packages/timeline/src/sqlite-store.ts
import Database from "better-sqlite3";
import { z } from "zod";

import { ReconciliationConflict } from "../../schema/src/errors.js";
import { confidenceOf, parseTypeOf, type ParseRecord } from "../../schema/src/parse-record.js";
import type { AuditEntry, CanonicalInterval } from "../../schema/src/schema.js";

import { AuditEntrySchema } from "./audit.js";
import type { ParseRecordStore, PriorState, ReconcileDelta, TimelineStore } from "./store.js";

type IntervalRow = {
  id: string;
  fund_id: string;
  start_date: string;
  end_date: string | null;
  ceiling: number | null;
  source_ids: string;
  note: string | null;
};

type AuditRow = {
  fund_id: string;
  operation: string;
  old_start: string | null;
  old_end: string | null;
  new_start: string | null;
  new_end: string | null;
  triggered_by: string | null;
  interval_id: string | null;
  related_id: string | null;
  created_at: string;
};

type ParseRow = {
  fund_id: string;
  announcement_date: string;
  source_id: string;
  parse_result: string;
  created_at: string;
};

const SourceIdsSchema = z.array(z.string());

function toInterval(r: IntervalRow): CanonicalInterval {
  return {
    id: r.id,
    fund_id: r.fund_id,
    start_date: r.start_date,
    end_date: r.end_date,
    ceiling: r.ceiling,
    source_ids: SourceIdsSchema.parse(JSON.parse(r.source_ids)),
    note: r.note,
  };
}

function toAuditEntry(r: AuditRow): AuditEntry {
  return AuditEntrySchema.parse({
    fund_id: r.fund_id,
    operation: r.operation,
    old_start: r.old_start,
    old_end: r.old_end,
    new_start: r.new_start,
    new_end: r.new_end,
    triggered_by: r.triggered_by,
    timestamp: r.created_at,
    interval_id: r.interval_id,
    related_id: r.related_id,
  });
}

export class SqliteTimelineStore implements TimelineStore, ParseRecordStore {
  private db: Database.Database;
  private txQueue: Promise<void> = Promise.resolve();

  constructor(filename = "limit-timeline.sqlite") {
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  close(): void {
    this.db.close();
  }

  // Async transaction wrapper (no better-sqlite3 transaction(fn) here).
  // Callers are queued one behind another, so fn must not call back into it.
  async runInTransaction<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.txQueue.then(() => this.transact(fn));
    this.txQueue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async transact<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec("BEGIN IMMEDIATE;");
    try {
      const out = await fn();
      this.db.exec("COMMIT;");
      return out;
    } catch (e) {
      try {
        this.db.exec("ROLLBACK;");
      } catch (rollbackError) {
        throw new AggregateError([e, rollbackError], "transaction failed and rollback failed");
      }
      throw e;
    }
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS limit_events (
        id            TEXT PRIMARY KEY,
        fund_id       TEXT NOT NULL,
        start_date    TEXT NOT NULL,
        end_date      TEXT,             -- NULL = open-ended
        ceiling       REAL,             -- NULL = amount never stated
        source_ids    TEXT NOT NULL DEFAULT '[]',
        note          TEXT,
        is_open_ended INTEGER GENERATED ALWAYS AS (
          CASE WHEN end_date IS NULL THEN 1 ELSE 0 END
        ) STORED
      );

      CREATE INDEX IF NOT EXISTS idx_limit_events_fund
        ON limit_events(fund_id, start_date);

      CREATE INDEX IF NOT EXISTS idx_limit_events_is_open_ended
        ON limit_events(is_open_ended);

      CREATE TABLE IF NOT EXISTS limit_event_log (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        fund_id      TEXT NOT NULL,
        operation    TEXT NOT NULL, -- CREATE | EXTEND | CLOSE | MERGE
        old_start    TEXT,
        old_end      TEXT,
        new_start    TEXT,
        new_end      TEXT,
        triggered_by TEXT,
        interval_id  TEXT,
        related_id   TEXT,
        created_at   TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_limit_event_log_fund
        ON limit_event_log(fund_id, id);

      CREATE TABLE IF NOT EXISTS fund_revisions (
        fund_id  TEXT PRIMARY KEY,
        revision INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS announcement_parses (
        fund_id           TEXT NOT NULL,
        announcement_date TEXT NOT NULL,
        source_id         TEXT NOT NULL,
        parse_result      TEXT NOT NULL,
        parse_type        TEXT,
        confidence        REAL,
        created_at        TEXT NOT NULL,
        PRIMARY KEY (fund_id, source_id)
      );

      CREATE INDEX IF NOT EXISTS idx_announcement_parses_date
        ON announcement_parses(fund_id, announcement_date);
    `);
  }

  private currentRevision(fund_id: string): number {
    const row = this.db
      .prepare(`SELECT revision FROM fund_revisions WHERE fund_id = ? LIMIT 1`)
      .get(fund_id) as { revision: number } | undefined;
    return row?.revision ?? 0;
  }

  private selectIntervals(fund_id: string): CanonicalInterval[] {
    const rows = this.db
      .prepare(
        `SELECT id, fund_id, start_date, end_date, ceiling, source_ids, note
         FROM limit_events
         WHERE fund_id = ?
         ORDER BY start_date ASC, id ASC`
      )
      .all(fund_id) as IntervalRow[];
    return rows.map(toInterval);
  }

  // ---------------- canonical intervals ----------------

  async readPriorState(fund_id: string): Promise<PriorState> {
    // one snapshot: revision and rows must agree
    const read = this.db.transaction(() => ({
      intervals: this.selectIntervals(fund_id),
      revision: this.currentRevision(fund_id),
    }));
    return { fund_id, ...read() };
  }

  async listIntervals(fund_id: string): Promise<CanonicalInterval[]> {
    return this.selectIntervals(fund_id);
  }

  async applyDelta(
    fund_id: string,
    delta: ReconcileDelta,
    expected_revision: number
  ): Promise<{ revision: number }> {
    return this.runInTransaction(async () => {
      const actual = this.currentRevision(fund_id);
      if (actual !== expected_revision) {
        throw new ReconciliationConflict(fund_id, expected_revision, actual);
      }

      const del = this.db.prepare(`DELETE FROM limit_events WHERE id = ? AND fund_id = ?`);
      for (const r of delta.removals) del.run(r.id, fund_id);

      const upsert = this.db.prepare(
        `INSERT INTO limit_events(id, fund_id, start_date, end_date, ceiling, source_ids, note)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           start_date = excluded.start_date,
           end_date   = excluded.end_date,
           ceiling    = excluded.ceiling,
           source_ids = excluded.source_ids,
           note       = excluded.note`
      );
      for (const i of [...delta.creates, ...delta.updates]) {
        upsert.run(i.id, fund_id, i.start_date, i.end_date, i.ceiling, JSON.stringify(i.source_ids), i.note);
      }

      const log = this.db.prepare(
        `INSERT INTO limit_event_log
           (fund_id, operation, old_start, old_end, new_start, new_end, triggered_by, interval_id, related_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      );
      for (const e of delta.audit) {
        log.run(
          e.fund_id,
          e.operation,
          e.old_start,
          e.old_end,
          e.new_start,
          e.new_end,
          e.triggered_by,
          e.interval_id,
          e.related_id,
          e.timestamp
        );
      }

      const revision = actual + 1;
      this.db
        .prepare(
          `INSERT INTO fund_revisions(fund_id, revision)
           VALUES (?, ?)
           ON CONFLICT(fund_id) DO UPDATE SET revision = excluded.revision`
        )
        .run(fund_id, revision);

      return { revision };
    });
  }

  async listAuditEntries(fund_id: string): Promise<AuditEntry[]> {
    const rows = this.db
      .prepare(
        `SELECT fund_id, operation, old_start, old_end, new_start, new_end,
                triggered_by, interval_id, related_id, created_at
         FROM limit_event_log
         WHERE fund_id = ?
         ORDER BY id ASC`
      )
      .all(fund_id) as AuditRow[];
    return rows.map(toAuditEntry);
  }

  async listFunds(): Promise<string[]> {
    const rows = this.db
      .prepare(
        `SELECT fund_id FROM limit_events
         UNION
         SELECT fund_id FROM announcement_parses
         ORDER BY fund_id ASC`
      )
      .all() as Array<{ fund_id: string }>;
    return rows.map((r) => r.fund_id);
  }

  // ---------------- parse records ----------------

  async putParseRecord(record: ParseRecord): Promise<void> {
    // re-processing an announcement replaces its earlier result
    this.db
      .prepare(
        `INSERT INTO announcement_parses
           (fund_id, announcement_date, source_id, parse_result, parse_type, confidence, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(fund_id, source_id) DO UPDATE SET
           announcement_date = excluded.announcement_date,
           parse_result      = excluded.parse_result,
           parse_type        = excluded.parse_type,
           confidence        = excluded.confidence,
           created_at        = excluded.created_at`
      )
      .run(
        record.fund_id,
        record.announcement_date,
        record.source_id,
        JSON.stringify(record.parse_result ?? null),
        parseTypeOf(record.parse_result),
        confidenceOf(record.parse_result),
        record.created_at ?? new Date().toISOString()
      );
  }

  async listParseRecords(fund_id: string): Promise<ParseRecord[]> {
    const rows = this.db
      .prepare(
        `SELECT fund_id, announcement_date, source_id, parse_result, created_at
         FROM announcement_parses
         WHERE fund_id = ?
         ORDER BY announcement_date ASC, source_id ASC`
      )
      .all(fund_id) as ParseRow[];

    return rows.map((r) => ({
      fund_id: r.fund_id,
      announcement_date: r.announcement_date,
      source_id: r.source_id,
      parse_result: JSON.parse(r.parse_result) as unknown,
      created_at: r.created_at,
    }));
  }

  async listParseRecordFunds(): Promise<string[]> {
    const rows = this.db
      .prepare(`SELECT DISTINCT fund_id FROM announcement_parses ORDER BY fund_id ASC`)
      .all() as Array<{ fund_id: string }>;
    return rows.map((r) => r.fund_id);
  }
}
