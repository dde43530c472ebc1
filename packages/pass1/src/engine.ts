// packages/pass1/src/engine.ts
import type { OverviewConfig, OverviewTable, Pass1Config, Pass1Result, PerSignalStats } from "../../core/src/types.js";
import { inferSignals } from "../../overview/src/overview-builder.js";
import { detectSignal, requireSignalColumns } from "./detectors.js";
import { checkTimestamps } from "./timestamp-checks.js";
import { mergeWindows } from "./windows.js";

export type Pass1Input = {
  measurement_id: string;
  overview_cfg: OverviewConfig;
  pass1_cfg: Pass1Config;
};

export type Pass1Options = {
  key: string;
  cache_hit?: boolean;
  now?: () => string;
};

/** Signals Pass 1 scans: configured ones, or those inferable from the overview columns. */
export function pass1Signals(table: OverviewTable, overview_cfg: OverviewConfig): string[] {
  return overview_cfg.signals === "infer" ? inferSignals(table.columns, overview_cfg.agg) : overview_cfg.signals;
}

/**
 * Deterministic first pass over an overview:
 * A) per-signal missing/flatline/spike flags,
 * B) union into windows, score and rank.
 * Everything is computed before anything is returned; a shape error aborts the run.
 */
export function computePass1(table: OverviewTable, input: Pass1Input, opts: Pass1Options): Pass1Result {
  const signals = pass1Signals(table, input.overview_cfg);
  const columns = requireSignalColumns(table, signals);

  const per_signal: Record<string, PerSignalStats> = {};
  const flagsBySignal = new Map<string, boolean[]>();

  for (const [signal, cols] of columns) {
    const detection = detectSignal(table, cols, input.pass1_cfg);
    per_signal[signal] = detection.stats;
    flagsBySignal.set(signal, detection.flags);
  }

  return {
    measurement_id: input.measurement_id,
    overview_cfg: input.overview_cfg,
    pass1_cfg: input.pass1_cfg,
    key: opts.key,
    created_at: (opts.now ?? (() => new Date().toISOString()))(),
    per_signal,
    timestamp_checks: checkTimestamps(table),
    windows: mergeWindows(table, signals, flagsBySignal, per_signal),
    cache_hit: opts.cache_hit ?? false,
  };
}
