// packages/overview/src/overview-artifact.ts
import Database from "better-sqlite3";
import { z } from "zod";

import { DataShapeError } from "../../core/src/errors.js";
import { AGGREGATES, type OverviewTable } from "../../core/src/types.js";

/*
 * Overview artifact = one SQLite file:
 *   overview(bucket INTEGER PRIMARY KEY, t REAL NOT NULL, c0 REAL, c1 REAL, ...)
 *   overview_meta(key TEXT PRIMARY KEY, value TEXT)  -- JSON values
 * Stored column names are positional; the real time column and aggregate
 * column names live in overview_meta (`time_col`, `columns`, same order as
 * c0..cN). SQLite folds identifier case, source headers do not.
 * Datetime overviews store epoch seconds in `t`; `time_kind` says how to
 * present them.
 */

export const OVERVIEW_FORMAT_VERSION = 1;

const BUCKET_FIELD = "bucket";
const TIME_FIELD = "t";

function valueField(i: number): string {
  return `c${i}`;
}

const OverviewMetaSchema = z.object({
  format_version: z.literal(OVERVIEW_FORMAT_VERSION),
  time_col: z.string(),
  time_kind: z.enum(["seconds", "datetime"]),
  hz: z.number().positive(),
  signals: z.array(z.string()),
  agg: z.array(z.enum(AGGREGATES)),
  columns: z.array(z.string()),
});

type MetaRow = { key: string; value: string };
type CellRow = Array<number | bigint | string | Buffer | null>;

export function writeOverviewArtifact(file: string, table: OverviewTable): void {
  const seen = new Set<string>();
  for (const c of table.columns) {
    if (seen.has(c)) throw new DataShapeError(c, `aggregate column '${c}' appears twice in the overview`);
    seen.add(c);
  }

  const fields = table.columns.map((_, i) => valueField(i));

  const db = new Database(file);
  try {
    db.exec(`
      CREATE TABLE overview_meta (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
      CREATE TABLE overview (
        ${BUCKET_FIELD} INTEGER PRIMARY KEY,
        ${TIME_FIELD} REAL NOT NULL${fields.map((f) => `,\n        ${f} REAL`).join("")}
      );
    `);

    const meta = {
      format_version: OVERVIEW_FORMAT_VERSION,
      time_col: table.time_col,
      time_kind: table.time_kind,
      hz: table.hz,
      signals: table.signals,
      agg: table.agg,
      columns: table.columns,
    };

    const putMeta = db.prepare<[string, string]>(`INSERT INTO overview_meta(key, value) VALUES (?, ?)`);
    const putRow = db.prepare<Array<number | null>>(
      `INSERT INTO overview VALUES (${["?", "?", ...fields.map(() => "?")].join(", ")})`
    );

    db.transaction(() => {
      for (const [k, v] of Object.entries(meta)) putMeta.run(k, JSON.stringify(v));
      table.buckets.forEach((bucket, i) => {
        putRow.run(bucket, table.time[i], ...table.columns.map((c) => table.values[c]?.[i] ?? null));
      });
    })();
  } finally {
    db.close();
  }
}

export function readOverviewArtifact(file: string): OverviewTable {
  const db = new Database(file, { readonly: true, fileMustExist: true });
  try {
    const metaRows = db.prepare<[], MetaRow>(`SELECT key, value FROM overview_meta`).all();
    const meta = OverviewMetaSchema.parse(
      Object.fromEntries(metaRows.map((r) => [r.key, JSON.parse(r.value)]))
    );

    const select = [BUCKET_FIELD, TIME_FIELD, ...meta.columns.map((_, i) => valueField(i))].join(", ");
    const rows = db
      .prepare<[], CellRow>(`SELECT ${select} FROM overview ORDER BY ${BUCKET_FIELD}`)
      .raw(true)
      .all();

    const buckets: number[] = [];
    const time: number[] = [];
    const values: Record<string, Array<number | null>> = {};
    for (const c of meta.columns) values[c] = [];

    for (const row of rows) {
      buckets.push(requireNumber(row[0], BUCKET_FIELD));
      time.push(requireNumber(row[1], meta.time_col));
      meta.columns.forEach((c, j) => {
        values[c].push(optionalNumber(row[j + 2], c));
      });
    }

    return {
      time_col: meta.time_col,
      time_kind: meta.time_kind,
      hz: meta.hz,
      signals: meta.signals,
      agg: meta.agg,
      columns: meta.columns,
      buckets,
      time,
      values,
    };
  } finally {
    db.close();
  }
}

function optionalNumber(v: CellRow[number] | undefined, column: string): number | null {
  if (v === null || v === undefined) return null;
  return requireNumber(v, column);
}

function requireNumber(v: CellRow[number] | undefined, column: string): number {
  if (typeof v === "number") return v;
  if (typeof v === "bigint") return Number(v);
  throw new Error(`OVERVIEW_CELL_INVALID: column '${column}' holds ${v === null ? "null" : typeof v}`);
}
