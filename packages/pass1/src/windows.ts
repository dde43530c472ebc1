// packages/pass1/src/windows.ts
import type { AnomalyWindow, OverviewTable, PerSignalStats, WindowSignal, WindowTime } from "../../core/src/types.js";
import { formatEpochSeconds } from "../../overview/src/time.js";
import { trueRuns } from "./runs.js";

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function windowTime(table: OverviewTable, row: number): WindowTime {
  const t = table.time[row];
  return table.time_kind === "datetime" ? formatEpochSeconds(t) : t;
}

/**
 * Union per-signal flags, cut maximal flagged runs into windows, then rank.
 *
 * Signal score in a window = flagged rows of that signal inside the window
 * + the signal's spike_mad_z_max over the WHOLE series, not just this window.
 * Window score = sum of its signal scores.
 *
 * Order: windows by score desc then start_bucket asc; signals by score desc
 * then name asc.
 */
export function mergeWindows(
  table: OverviewTable,
  signals: string[],
  flagsBySignal: Map<string, boolean[]>,
  perSignal: Record<string, PerSignalStats>
): AnomalyWindow[] {
  const union = table.buckets.map((_, i) => signals.some((s) => flagsBySignal.get(s)?.[i] === true));

  const windows = trueRuns(union).map((run): AnomalyWindow => {
    const start_bucket = table.buckets[run.start];
    const end_bucket = table.buckets[run.end];

    const scored: WindowSignal[] = signals.map((signal) => {
      const flags = flagsBySignal.get(signal) ?? [];
      let flagged = 0;
      for (let i = run.start; i <= run.end; i++) if (flags[i]) flagged += 1;
      const spike = perSignal[signal]?.spike_mad_z_max ?? 0;
      return {
        signal,
        flagged_bucket_count: flagged,
        spike_mad_z_max: spike,
        score: flagged + spike,
      };
    });
    const score = scored.reduce((sum, s) => sum + s.score, 0);
    scored.sort((a, b) => b.score - a.score || byName(a.signal, b.signal));

    return {
      start_bucket,
      end_bucket,
      start_time: windowTime(table, run.start),
      end_time: windowTime(table, run.end),
      duration_buckets: end_bucket - start_bucket + 1,
      score,
      signals: scored,
    };
  });

  return windows.sort((a, b) => b.score - a.score || a.start_bucket - b.start_bucket);
}
