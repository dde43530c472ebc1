import { describe, expect, it } from "vitest";

import { firstDifference, madZScores, median, medianAbsoluteDeviation } from "../src/robust-stats.js";
import { flatlineMask, trueRuns } from "../src/runs.js";

describe("robust statistics", () => {
  it("takes the median of odd and even lengths, ignoring NaN", () => {
    expect(median([5, 1, 3])).toBe(3);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([NaN, 2, 8])).toBe(5);
    expect(median([])).toBeNaN();
  });

  it("computes the median absolute deviation", () => {
    expect(medianAbsoluteDeviation([1, 2, 3, 4, 100])).toBe(1);
  });

  it("scores outliers by robust z", () => {
    const z = madZScores([1, 2, 3, 4, 100]);
    expect(z[2]).toBe(0);
    expect(z[0]).toBeCloseTo(-1.349, 6);
    expect(z[4]).toBeCloseTo(65.4265, 6);
  });

  it("returns zeros when the MAD is zero", () => {
    expect(madZScores([1, 1, 1, 50])).toEqual([0, 0, 0, 0]);
    expect(madZScores([])).toEqual([]);
  });

  it("differences with zero at the start and around absent values", () => {
    expect(firstDifference([null, 1, 3, null, 4, 10])).toEqual([0, 0, 2, 0, 0, 6]);
  });
});

describe("runs", () => {
  it("finds maximal true runs", () => {
    expect(trueRuns([true, true, false, true, false, false, true])).toEqual([
      { start: 0, end: 1, length: 2 },
      { start: 3, end: 3, length: 1 },
      { start: 6, end: 6, length: 1 },
    ]);
    expect(trueRuns([])).toEqual([]);
  });

  it("keeps only runs that reach the minimum length", () => {
    const { mask, runs } = flatlineMask([true, true, true, false, true, true], 3);
    expect(mask).toEqual([true, true, true, false, false, false]);
    expect(runs).toEqual([{ start: 0, end: 2, length: 3 }]);
  });
});
