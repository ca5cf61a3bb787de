// packages/timeline/src/cli/limit-timeline.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";

import dotenv from "dotenv";

import { ParseRecordSchema } from "../../../schema/src/parse-record.js";

import { loadFundBatches, runBatch, type BatchLogger, type BatchSummary } from "../batch.js";
import { loadConfig, type TimelineConfigOverrides } from "../config.js";
import { describeBounds } from "../interval.js";
import { project, UNLIMITED } from "../projector.js";
import { SqliteTimelineStore } from "../sqlite-store.js";

export type CliIo = {
  out(line: string): void;
  err(line: string): void;
  env: NodeJS.ProcessEnv;
};

const defaultIo: CliIo = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
  env: process.env,
};

function usage(): string {
  return `limit-timeline - purchase-limit timeline builder

Usage:
  limit-timeline --help

  limit-timeline ingest <records.json> --db <path>
  limit-timeline rebuild --db <path> [--fund <id>] [--concurrency <n>] [--json]
  limit-timeline project --db <path> --fund <id> --from <date> --to <date> [--json]
  limit-timeline audit --db <path> --fund <id> [--json]

Environment:
  LIMIT_TIMELINE_DB, LIMIT_TIMELINE_CONCURRENCY,
  LIMIT_TIMELINE_MAX_RETRIES, LIMIT_TIMELINE_UNSPECIFIED_CEILING

Examples:
  limit-timeline ingest parses.json --db ./limits.sqlite
  limit-timeline rebuild --db ./limits.sqlite --concurrency 8
  limit-timeline project --db ./limits.sqlite --fund 161725 --from 2024-01-01 --to 2024-01-31
`;
}

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function writeJsonPretty(io: CliIo, obj: unknown): void {
  io.out(JSON.stringify(obj, null, 2));
}

function stderrLogger(io: CliIo): BatchLogger {
  return {
    info: (message?: unknown) => io.err(String(message)),
    warn: (message?: unknown) => io.err(String(message)),
    error: (message?: unknown) => io.err(String(message)),
  };
}

// -------------------- commands --------------------

async function cmdIngest(io: CliIo, file: string, store: SqliteTimelineStore): Promise<number> {
  const abs = path.resolve(process.cwd(), file);
  const raw: unknown = JSON.parse(fs.readFileSync(abs, "utf8"));
  if (!Array.isArray(raw)) {
    io.err(`[limit-timeline] "${file}" must contain a JSON array of parse records.`);
    return 1;
  }

  let stored = 0;
  let rejected = 0;
  for (const [idx, item] of raw.entries()) {
    const r = ParseRecordSchema.safeParse(item);
    if (!r.success) {
      rejected += 1;
      io.err(`[limit-timeline] record #${idx} rejected: ${r.error.issues.map((i) => i.message).join("; ")}`);
      continue;
    }
    await store.putParseRecord(r.data);
    stored += 1;
  }

  io.out(`ingested ${stored} record(s), rejected ${rejected}`);
  return rejected > 0 ? 2 : 0;
}

function printSummary(io: CliIo, s: BatchSummary): void {
  io.out(`funds: ${s.funds_processed}/${s.funds_total} processed, ${s.funds_failed.length} failed, ${s.funds_cancelled.length} cancelled`);
  io.out(`assertions: ${s.invalid_assertions} invalid, ${s.ambiguous_assertions} ambiguous; parse records skipped: ${s.skipped_records}`);
  for (const r of s.reports) {
    io.out(
      `  ${r.fund_id}: ${r.intervals} interval(s) ` +
        `+${r.created} ~${r.updated} -${r.removed} =${r.unchanged}${r.written ? "" : " (no change)"}`
    );
  }
  for (const f of s.funds_failed) io.out(`  ${f.fund_id}: FAILED ${f.code}: ${f.message}`);
  if (s.integrity_violations.length) {
    io.out(`manual review: ${s.integrity_violations.join(", ")}`);
  }
}

async function cmdRebuild(
  io: CliIo,
  args: string[],
  store: SqliteTimelineStore,
  overrides: TimelineConfigOverrides
): Promise<number> {
  const config = loadConfig(io.env, overrides);
  const fund = getFlagValue(args, "--fund");
  const json = args.includes("--json");

  const batches = await loadFundBatches(store, fund ? [fund] : undefined);
  const summary = await runBatch(store, batches, {
    concurrency: config.concurrency,
    max_reconcile_retries: config.max_reconcile_retries,
    logger: json ? stderrLogger(io) : console,
  });

  if (json) writeJsonPretty(io, summary);
  else printSummary(io, summary);

  return summary.funds_failed.length > 0 ? 2 : 0;
}

async function cmdProject(
  io: CliIo,
  args: string[],
  store: SqliteTimelineStore,
  overrides: TimelineConfigOverrides
): Promise<number> {
  const config = loadConfig(io.env, overrides);
  const fund = getFlagValue(args, "--fund");
  const from = getFlagValue(args, "--from");
  const to = getFlagValue(args, "--to");
  if (!fund || !from || !to) {
    io.err("Missing --fund <id>, --from <date> or --to <date>\n");
    io.err(usage());
    return 1;
  }

  const limits = await project(store, fund, { from, to }, { unspecified_ceiling: config.unspecified_ceiling });

  if (args.includes("--json")) {
    // JSON has no Infinity; unlimited is null
    writeJsonPretty(
      io,
      limits.map((l) => ({ date: l.date, ceiling: l.ceiling === UNLIMITED ? null : l.ceiling }))
    );
  } else {
    for (const l of limits) io.out(`${l.date}\t${l.ceiling === UNLIMITED ? "unlimited" : String(l.ceiling)}`);
  }
  return 0;
}

async function cmdAudit(io: CliIo, args: string[], store: SqliteTimelineStore): Promise<number> {
  const fund = getFlagValue(args, "--fund");
  if (!fund) {
    io.err("Missing --fund <id>\n");
    io.err(usage());
    return 1;
  }

  const entries = await store.listAuditEntries(fund);
  if (args.includes("--json")) {
    writeJsonPretty(io, { fund_id: fund, intervals: await store.listIntervals(fund), audit: entries });
    return 0;
  }

  for (const i of await store.listIntervals(fund)) {
    io.out(`${i.id} ${describeBounds(i)} ceiling=${i.ceiling ?? "unspecified"} sources=${i.source_ids.join(",")}`);
  }
  for (const e of entries) {
    const before = e.old_start === null ? "-" : describeBounds({ start_date: e.old_start, end_date: e.old_end });
    const after = e.new_start === null ? "-" : describeBounds({ start_date: e.new_start, end_date: e.new_end });
    io.out(`${e.timestamp} ${e.operation} ${e.interval_id ?? "-"} ${before} -> ${after} by ${e.triggered_by ?? "-"}`);
  }
  return 0;
}

export async function run(argv: string[] = process.argv, io: CliIo = defaultIo): Promise<number> {
  const args = argv.slice(2);
  const cmd = args[0];

  if (!cmd || cmd === "--help" || cmd === "-h") {
    io.out(usage());
    return 0;
  }

  if (!["ingest", "rebuild", "project", "audit"].includes(cmd)) {
    io.err(`Unknown command: ${cmd}\n`);
    io.err(usage());
    return 1;
  }

  const overrides: TimelineConfigOverrides = {
    db_path: getFlagValue(args, "--db"),
    concurrency: getFlagValue(args, "--concurrency"),
  };

  try {
    const config = loadConfig(io.env, overrides);
    const store = new SqliteTimelineStore(config.db_path);
    try {
      switch (cmd) {
        case "ingest": {
          const file = args[1];
          if (!file || file.startsWith("--")) {
            io.err("Missing file.\n");
            io.err(usage());
            return 1;
          }
          return await cmdIngest(io, file, store);
        }
        case "rebuild":
          return await cmdRebuild(io, args, store, overrides);
        case "project":
          return await cmdProject(io, args, store, overrides);
        default:
          return await cmdAudit(io, args, store);
      }
    } finally {
      store.close();
    }
  } catch (e) {
    // Error instances end the command; anything else propagates
    if (!(e instanceof Error)) throw e;
    io.err(`[limit-timeline] ${e.message}`);
    return 1;
  }
}

// Entrypoint: run when this file (or the installed bin) is the invoked script
const argv1 = process.argv[1] ?? "";
if (/limit-timeline(\.ts|\.js)?$/.test(argv1)) {
  dotenv.config();
  void run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    }
  );
}
