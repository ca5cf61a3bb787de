// packages/timeline/src/config.ts
import { z } from "zod";

import { ConfigError } from "../../schema/src/errors.js";

export const TimelineConfigSchema = z.object({
  db_path: z.string().min(1).default("limit-timeline.sqlite"),
  concurrency: z.coerce.number().int().min(1).max(64).default(4),
  max_reconcile_retries: z.coerce.number().int().min(0).max(20).default(3),
  unspecified_ceiling: z.coerce.number().min(0).default(0),
});

export type TimelineConfig = z.infer<typeof TimelineConfigSchema>;

export type TimelineConfigOverrides = Partial<Record<keyof TimelineConfig, string | number | null | undefined>>;

const ENV_KEYS = {
  db_path: "LIMIT_TIMELINE_DB",
  concurrency: "LIMIT_TIMELINE_CONCURRENCY",
  max_reconcile_retries: "LIMIT_TIMELINE_MAX_RETRIES",
  unspecified_ceiling: "LIMIT_TIMELINE_UNSPECIFIED_CEILING",
} as const satisfies Record<keyof TimelineConfig, string>;

function present(v: string | number | null | undefined): string | number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === "string" && v.trim() === "") return undefined;
  return v;
}

/** Defaults ← environment ← overrides (CLI flags). */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: TimelineConfigOverrides = {}
): TimelineConfig {
  const raw = {
    db_path: present(overrides.db_path) ?? present(env[ENV_KEYS.db_path]),
    concurrency: present(overrides.concurrency) ?? present(env[ENV_KEYS.concurrency]),
    max_reconcile_retries:
      present(overrides.max_reconcile_retries) ?? present(env[ENV_KEYS.max_reconcile_retries]),
    unspecified_ceiling: present(overrides.unspecified_ceiling) ?? present(env[ENV_KEYS.unspecified_ceiling]),
  };

  const r = TimelineConfigSchema.safeParse(raw);
  if (!r.success) {
    throw new ConfigError(r.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`));
  }
  return r.data;
}
