// packages/core/src/schema.ts
import { z } from "zod";
import { InvalidConfigError } from "./errors.js";
import {
  AGGREGATES,
  type MeasurementMeta,
  type OverviewConfig,
  type Pass1Config,
  type Pass1Result,
} from "./types.js";

/* ------------------------------------------------------------------ */
/*                          Caller configuration                      */
/* ------------------------------------------------------------------ */

const FiniteNumber = z.number().refine(Number.isFinite, "Must be a finite number");

const AggregateList = z
  .array(z.enum(AGGREGATES))
  .min(1)
  .refine((xs) => new Set(xs).size === xs.length, "Aggregates must be distinct");

export const OverviewConfigSchema = z.strictObject({
  signals: z
    .union([
      z.literal("infer"),
      z
        .array(z.string().min(1))
        .min(1)
        .refine((xs) => new Set(xs).size === xs.length, "Signals must be distinct"),
    ])
    .default("infer"),
  hz: FiniteNumber.refine((v) => v > 0, "hz must be positive").default(1),
  agg: AggregateList.default(["min", "mean", "max"]),
  time_col: z.string().min(1).default("timestamp"),
});

export const Pass1ConfigSchema = z.strictObject({
  missing_rate: z.number().min(0).max(1).default(0.1),
  flatline_eps: FiniteNumber.refine((v) => v >= 0, "flatline_eps must be >= 0").default(0.01),
  flatline_min_run: z.number().int().min(1).default(10),
  spike_mad_z: FiniteNumber.refine((v) => v > 0, "spike_mad_z must be positive").default(5),
  top_k_windows: z.number().int().min(1).default(5),
  top_n_signals: z.number().int().min(1).default(3),
});

export type OverviewConfigInput = z.input<typeof OverviewConfigSchema>;
export type Pass1ConfigInput = z.input<typeof Pass1ConfigSchema>;

export function parseOverviewConfig(input: unknown = {}): OverviewConfig {
  return parseOrThrow(OverviewConfigSchema, input, "overview config");
}

export function parsePass1Config(input: unknown = {}): Pass1Config {
  return parseOrThrow(Pass1ConfigSchema, input, "pass1 config");
}

function parseOrThrow<T>(schema: z.ZodType<T>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map(
    (i) => `${i.path.length ? i.path.map(String).join(".") : "(root)"}: ${i.message}`
  );
  throw new InvalidConfigError(`invalid ${what}`, issues);
}

/* ------------------------------------------------------------------ */
/*                         Persisted artifacts                        */
/* ------------------------------------------------------------------ */

export const MeasurementMetaSchema: z.ZodType<MeasurementMeta> = z.looseObject({
  measurement_id: z.string(),
  file_fingerprint: z.string(),
  path: z.string(),
  label: z.string().nullable(),
  created_at: z.string(),
  format: z.string(),
});

const PerSignalStatsSchema = z.object({
  missing_rate: z.number(),
  missing_rate_flagged: z.boolean(),
  flatline_run_count: z.number().int(),
  flatline_max_run: z.number().int(),
  spike_mad_z_max: z.number(),
  flagged_bucket_count: z.number().int(),
  flagged_buckets: z.array(z.number().int()),
});

const WindowTimeSchema = z.union([z.number(), z.string()]);

const AnomalyWindowSchema = z.object({
  start_bucket: z.number().int(),
  end_bucket: z.number().int(),
  start_time: WindowTimeSchema,
  end_time: WindowTimeSchema,
  duration_buckets: z.number().int(),
  score: z.number(),
  signals: z.array(
    z.object({
      signal: z.string(),
      flagged_bucket_count: z.number().int(),
      spike_mad_z_max: z.number(),
      score: z.number(),
    })
  ),
});

export const Pass1ResultSchema: z.ZodType<Pass1Result> = z.object({
  measurement_id: z.string(),
  overview_cfg: OverviewConfigSchema,
  pass1_cfg: Pass1ConfigSchema,
  key: z.string(),
  created_at: z.string(),
  per_signal: z.record(z.string(), PerSignalStatsSchema),
  timestamp_checks: z.object({
    monotonic: z.boolean(),
    gap_count: z.number().int(),
    gap_indices: z.array(z.number().int()),
    gap_buckets: z.array(z.number().int()),
    expected_gap_seconds: z.number(),
  }),
  windows: z.array(AnomalyWindowSchema),
  cache_hit: z.boolean(),
});
