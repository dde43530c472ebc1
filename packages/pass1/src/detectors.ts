// packages/pass1/src/detectors.ts
import { DataShapeError } from "../../core/src/errors.js";
import type { OverviewTable, Pass1Config, PerSignalStats } from "../../core/src/types.js";
import { firstDifference, madZScores } from "./robust-stats.js";
import { flatlineMask } from "./runs.js";

export type SignalDetection = {
  stats: PerSignalStats;
  flags: boolean[]; // one per overview row
};

export type SignalColumns = { mean: string; min: string; max: string };

/** Fails on the first missing column so no partial result is ever built. */
export function requireSignalColumns(table: OverviewTable, signals: string[]): Map<string, SignalColumns> {
  const out = new Map<string, SignalColumns>();
  for (const signal of signals) {
    const cols = { mean: `${signal}_mean`, min: `${signal}_min`, max: `${signal}_max` };
    for (const col of [cols.mean, cols.min, cols.max]) {
      if (!(col in table.values)) {
        throw new DataShapeError(col, `missing ${col} in overview for signal '${signal}'`);
      }
    }
    out.set(signal, cols);
  }
  return out;
}

/**
 * Per-signal Pass 1 flags. A row is flagged when any of:
 * - missing: mean absent AND the signal's overall missing rate >= missing_rate
 * - flatline: inside a run of >= flatline_min_run rows with max - min <= flatline_eps
 * - spike: |MAD z| of the mean's first difference >= spike_mad_z
 */
export function detectSignal(table: OverviewTable, cols: SignalColumns, cfg: Pass1Config): SignalDetection {
  const means = table.values[cols.mean];
  const mins = table.values[cols.min];
  const maxs = table.values[cols.max];
  const n = table.buckets.length;

  // missing
  const missing = means.map((v) => v === null);
  const missingCount = missing.filter(Boolean).length;
  const missingRate = n === 0 ? 0 : missingCount / n;
  const missingGate = n > 0 && missingRate >= cfg.missing_rate;

  // flatline
  const candidates = mins.map((lo, i) => {
    const hi = maxs[i];
    return lo !== null && hi !== null && hi - lo <= cfg.flatline_eps;
  });
  const flat = flatlineMask(candidates, cfg.flatline_min_run);

  // spike
  const zAbs = madZScores(firstDifference(means)).map((z) => Math.abs(z));
  const spikeMax = zAbs.reduce((m, z) => (z > m ? z : m), 0);

  const flags = missing.map((m, i) => (m && missingGate) || flat.mask[i] || zAbs[i] >= cfg.spike_mad_z);
  const flagged_buckets = table.buckets.filter((_, i) => flags[i]);

  return {
    flags,
    stats: {
      missing_rate: missingRate,
      missing_rate_flagged: missingGate,
      flatline_run_count: flat.runs.length,
      flatline_max_run: flat.runs.reduce((m, r) => Math.max(m, r.length), 0),
      spike_mad_z_max: spikeMax,
      flagged_bucket_count: flagged_buckets.length,
      flagged_buckets,
    },
  };
}
