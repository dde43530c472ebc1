// packages/overview/src/bucket-accumulator.ts
import type { Aggregate } from "../../core/src/types.js";

type Cell = { count: number; sum: number; min: number; max: number };

function emptyCell(): Cell {
  return { count: 0, sum: 0, min: Infinity, max: -Infinity };
}

export type AccumulatedColumns = {
  buckets: number[];
  columns: string[];
  values: Record<string, Array<number | null>>;
};

export function aggregateColumn(signal: string, agg: Aggregate): string {
  return `${signal}_${agg}`;
}

/**
 * Per-bucket running count/sum/min/max for each signal. All three
 * aggregates are associative, so rows can be fed in any chunking and
 * partial accumulators merged.
 */
export class BucketAccumulator {
  private readonly cells = new Map<number, Cell[]>();

  constructor(readonly signals: string[]) {}

  get bucketCount(): number {
    return this.cells.size;
  }

  /** `values[i]` belongs to `signals[i]`; null means absent. */
  add(bucket: number, values: Array<number | null>): void {
    const row = this.row(bucket);
    for (let i = 0; i < this.signals.length; i++) {
      const v = values[i];
      if (v === null || v === undefined) continue;
      const c = row[i];
      c.count += 1;
      c.sum += v;
      if (v < c.min) c.min = v;
      if (v > c.max) c.max = v;
    }
  }

  merge(other: BucketAccumulator): void {
    if (other.signals.join("\u0000") !== this.signals.join("\u0000")) {
      throw new Error("ACCUMULATOR_SIGNAL_MISMATCH: cannot merge accumulators over different signals");
    }
    for (const [bucket, cells] of other.cells) {
      const row = this.row(bucket);
      cells.forEach((c, i) => {
        const mine = row[i];
        mine.count += c.count;
        mine.sum += c.sum;
        mine.min = Math.min(mine.min, c.min);
        mine.max = Math.max(mine.max, c.max);
      });
    }
  }

  finish(agg: Aggregate[]): AccumulatedColumns {
    const buckets = [...this.cells.keys()].sort((a, b) => a - b);
    const columns: string[] = [];
    const values: Record<string, Array<number | null>> = {};

    this.signals.forEach((signal, i) => {
      for (const a of agg) {
        const col = aggregateColumn(signal, a);
        columns.push(col);
        values[col] = buckets.map((b) => {
          const cells = this.cells.get(b);
          const c = cells ? cells[i] : undefined;
          if (!c || c.count === 0) return null;
          if (a === "min") return c.min;
          if (a === "max") return c.max;
          return c.sum / c.count;
        });
      }
    });

    return { buckets, columns, values };
  }

  private row(bucket: number): Cell[] {
    let row = this.cells.get(bucket);
    if (!row) {
      row = this.signals.map(emptyCell);
      this.cells.set(bucket, row);
    }
    return row;
  }
}
