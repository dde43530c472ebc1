// packages/pass1/src/summary.ts
import type { Pass1Result, Pass1Summary } from "../../core/src/types.js";

/**
 * What a presentation layer surfaces: the top_k_windows best windows with
 * their top_n_signals signals. The stored result keeps the full ranking.
 */
export function summarizePass1(result: Pass1Result): Pass1Summary {
  const { top_k_windows, top_n_signals } = result.pass1_cfg;
  return {
    measurement_id: result.measurement_id,
    key: result.key,
    window_count: result.windows.length,
    windows: result.windows.slice(0, top_k_windows).map((w) => ({
      ...w,
      signals: w.signals.slice(0, top_n_signals),
    })),
  };
}
