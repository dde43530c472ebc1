// packages/overview/src/overview-builder.ts
import { DataShapeError, InvalidConfigError } from "../../core/src/errors.js";
import type { Logger } from "../../core/src/logger.js";
import type { Aggregate, OverviewConfig, OverviewTable, TimeKind } from "../../core/src/types.js";
import { BucketAccumulator } from "./bucket-accumulator.js";
import { isBlank, numericCell, timestampCell } from "./cell-values.js";
import type { TabularSource } from "./delimited-source.js";

export type OverviewBuildStats = {
  rows_in: number;
  rows_dropped: number; // time value missing or unparseable
};

/**
 * Bucket raw rows into 1/hz-second intervals and aggregate every signal per
 * bucket. Pure: the same source and config give the same table.
 *
 * Time per row:
 * - time_col present, all numeric → seconds as-is
 * - time_col present otherwise → absolute timestamps, epoch seconds
 * - time_col absent → row ordinal as a 1 Hz clock
 */
export function buildOverviewTable(
  source: TabularSource,
  config: OverviewConfig,
  opts: { logger?: Logger } = {}
): { table: OverviewTable; stats: OverviewBuildStats } {
  const { hz, agg, time_col } = config;
  if (!(hz > 0) || !Number.isFinite(hz)) {
    throw new InvalidConfigError(`hz must be positive, got ${hz}`);
  }

  const hasTime = source.columns.includes(time_col);
  const timeKind = hasTime ? detectTimeKind(source, time_col) : "seconds";
  const signals = resolveSourceSignals(source, config);

  const acc = new BucketAccumulator(signals);
  let dropped = 0;

  source.rows.forEach((row, i) => {
    const seconds = !hasTime
      ? i
      : timeKind === "seconds"
        ? numericCell(row[time_col])
        : timestampCell(row[time_col]);

    if (seconds === null) {
      dropped += 1;
      return;
    }

    acc.add(
      Math.floor(seconds * hz),
      signals.map((s) => numericCell(row[s]))
    );
  });

  if (dropped > 0) {
    opts.logger?.debug("rows dropped for unparseable time", { time_col, rows_dropped: dropped });
  }

  const { buckets, columns, values } = acc.finish(agg);

  return {
    table: {
      time_col,
      time_kind: timeKind,
      hz,
      signals,
      agg: [...agg],
      columns,
      buckets,
      time: buckets.map((b) => b / hz),
      values,
    },
    stats: { rows_in: source.rows.length, rows_dropped: dropped },
  };
}

function detectTimeKind(source: TabularSource, time_col: string): TimeKind {
  for (const row of source.rows) {
    const v = row[time_col];
    if (isBlank(v)) continue;
    if (numericCell(v) === null) return "datetime";
  }
  return "seconds";
}

function resolveSourceSignals(source: TabularSource, config: OverviewConfig): string[] {
  if (config.signals !== "infer") {
    for (const s of config.signals) {
      if (!source.columns.includes(s)) {
        throw new DataShapeError(s, `signal '${s}' has no column in the source`);
      }
    }
    return [...config.signals];
  }

  // every non-time column that carries at least one number
  return source.columns.filter(
    (c) => c !== config.time_col && source.rows.some((row) => numericCell(row[c]) !== null)
  );
}

/**
 * Signals present in an aggregated column list: prefixes (text before the
 * last "_") that have a column for every requested aggregate. Sorted.
 */
export function inferSignals(columns: string[], agg: Aggregate[]): string[] {
  const wanted = new Set<string>(agg);
  const present = new Set(columns);
  const prefixes = new Set<string>();

  for (const c of columns) {
    const cut = c.lastIndexOf("_");
    if (cut <= 0) continue;
    if (wanted.has(c.slice(cut + 1))) prefixes.add(c.slice(0, cut));
  }

  return [...prefixes]
    .filter((p) => agg.every((a) => present.has(`${p}_${a}`)))
    .sort();
}
