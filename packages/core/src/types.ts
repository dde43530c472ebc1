// packages/core/src/types.ts
// Domain shapes shared by the store, overview and pass1 packages.

export const AGGREGATES = ["min", "mean", "max"] as const;
export type Aggregate = (typeof AGGREGATES)[number];

export type OverviewConfig = {
  signals: string[] | "infer";
  hz: number;
  agg: Aggregate[];
  time_col: string;
};

export type Pass1Config = {
  missing_rate: number;
  flatline_eps: number;
  flatline_min_run: number;
  spike_mad_z: number;
  top_k_windows: number;
  top_n_signals: number;
};

/* ----------------------------- Measurements ----------------------------- */

export type MeasurementRef = {
  id: string;
  path: string;
  label: string | null;
};

/**
 * Metadata record, one per unique file fingerprint.
 * Format extractors contribute extra best-effort fields (column lists,
 * header start time) or a `metadata_error` diagnostic.
 */
export type MeasurementMeta = {
  measurement_id: string;
  file_fingerprint: string;
  path: string;
  label: string | null;
  created_at: string; // ISO timestamp
  format: string;
  [extra: string]: unknown;
};

/* ------------------------------- Overview ------------------------------- */

export type TimeKind = "seconds" | "datetime";

/**
 * Columnar bucket table. `time` holds seconds: bucket_index / hz, which is
 * epoch seconds when `time_kind` is "datetime".
 */
export type OverviewTable = {
  time_col: string;
  time_kind: TimeKind;
  hz: number;
  signals: string[];
  agg: Aggregate[];
  columns: string[]; // `${signal}_${agg}` in signal-major order
  buckets: number[];
  time: number[];
  values: Record<string, Array<number | null>>;
};

export type OverviewBuildResult = {
  path: string;
  key: string;
  config: OverviewConfig & { measurement_id: string };
  cache_hit: boolean;
};

/* -------------------------------- Pass 1 -------------------------------- */

export type PerSignalStats = {
  missing_rate: number;
  missing_rate_flagged: boolean;
  flatline_run_count: number;
  flatline_max_run: number;
  spike_mad_z_max: number;
  flagged_bucket_count: number;
  flagged_buckets: number[];
};

export type TimestampChecks = {
  monotonic: boolean;
  gap_count: number;
  gap_indices: number[]; // row positions in the overview
  gap_buckets: number[];
  expected_gap_seconds: number;
};

export type WindowTime = number | string;

export type WindowSignal = {
  signal: string;
  flagged_bucket_count: number;
  spike_mad_z_max: number;
  score: number;
};

export type AnomalyWindow = {
  start_bucket: number;
  end_bucket: number;
  start_time: WindowTime;
  end_time: WindowTime;
  duration_buckets: number;
  score: number;
  signals: WindowSignal[];
};

export type Pass1Result = {
  measurement_id: string;
  overview_cfg: OverviewConfig;
  pass1_cfg: Pass1Config;
  key: string;
  created_at: string;
  per_signal: Record<string, PerSignalStats>;
  timestamp_checks: TimestampChecks;
  windows: AnomalyWindow[];
  cache_hit: boolean;
};

export type Pass1Summary = {
  measurement_id: string;
  key: string;
  window_count: number;
  windows: AnomalyWindow[];
};
