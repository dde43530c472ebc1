// packages/pass1/src/robust-stats.ts

// 0.6745 is the consistency constant for the normal distribution
export const MAD_Z_CONSTANT = 0.6745;

/** Median ignoring NaN; NaN when nothing is left. */
export function median(values: number[]): number {
  const sorted = values.filter((v) => !Number.isNaN(v)).sort((a, b) => a - b);
  if (sorted.length === 0) return NaN;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 !== 0 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function medianAbsoluteDeviation(values: number[], center: number = median(values)): number {
  return median(values.map((v) => Math.abs(v - center)));
}

/**
 * Robust z-scores: 0.6745 * (x - median) / MAD.
 * A zero or non-finite MAD (perfectly smooth series) yields all zeros.
 */
export function madZScores(values: number[]): number[] {
  if (values.length === 0) return [];
  const center = median(values);
  const mad = medianAbsoluteDeviation(values, center);
  if (mad === 0 || !Number.isFinite(mad)) return values.map(() => 0);
  return values.map((v) => (MAD_Z_CONSTANT * (v - center)) / mad);
}

/**
 * First difference of a bucket series. The first element and any step
 * touching an absent value count as a zero difference.
 */
export function firstDifference(series: Array<number | null>): number[] {
  return series.map((cur, i) => {
    if (i === 0) return 0;
    const prev = series[i - 1];
    return cur === null || prev === null ? 0 : cur - prev;
  });
}
