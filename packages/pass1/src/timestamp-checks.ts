// packages/pass1/src/timestamp-checks.ts
import type { OverviewTable, TimestampChecks } from "../../core/src/types.js";

// a delta beyond this many expected bucket widths counts as a gap
export const GAP_FACTOR = 1.5;

/**
 * Monotonicity and gap scan over the overview's time column.
 * The first row has no predecessor and is treated as one expected gap.
 */
export function checkTimestamps(table: OverviewTable): TimestampChecks {
  const expected = 1 / table.hz;
  const gap_indices: number[] = [];
  let monotonic = true;

  for (let i = 1; i < table.time.length; i++) {
    const delta = table.time[i] - table.time[i - 1];
    const step = Number.isNaN(delta) ? expected : delta;
    if (step < 0) monotonic = false;
    if (delta > expected * GAP_FACTOR) gap_indices.push(i);
  }

  return {
    monotonic,
    gap_count: gap_indices.length,
    gap_indices,
    gap_buckets: gap_indices.map((i) => table.buckets[i]),
    expected_gap_seconds: expected,
  };
}
