// packages/pass1/src/runs.ts

export type Run = {
  start: number; // row position, inclusive
  end: number; // inclusive
  length: number;
};

/** Maximal runs of `true`, in order. */
export function trueRuns(mask: boolean[]): Run[] {
  const runs: Run[] = [];
  let start = -1;

  mask.forEach((v, i) => {
    if (v && start < 0) start = i;
    else if (!v && start >= 0) {
      runs.push({ start, end: i - 1, length: i - start });
      start = -1;
    }
  });
  if (start >= 0) runs.push({ start, end: mask.length - 1, length: mask.length - start });

  return runs;
}

/**
 * Keep only candidate runs at least `minRun` long.
 * `runs` lists the qualifying runs (what gets reported as flatlines).
 */
export function flatlineMask(candidates: boolean[], minRun: number): { mask: boolean[]; runs: Run[] } {
  const mask = candidates.map(() => false);
  const runs = trueRuns(candidates).filter((r) => r.length >= minRun);
  for (const r of runs) {
    for (let i = r.start; i <= r.end; i++) mask[i] = true;
  }
  return { mask, runs };
}
