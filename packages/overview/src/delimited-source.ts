// packages/overview/src/delimited-source.ts
import * as fs from "node:fs";
import Papa from "papaparse";

import { SourceIOError, UnsupportedFormatError } from "../../core/src/errors.js";
import { formatTagFor } from "../../store/src/extractors.js";

export type SourceRow = Record<string, unknown>;

/**
 * Raw rows as read from a tabular file, header order preserved. Cells read
 * from text stay strings; typing happens in the builder.
 */
export type TabularSource = {
  columns: string[];
  rows: SourceRow[];
};

const DELIMITERS: Record<string, string> = {
  csv: ",",
  tsv: "\t",
};

/**
 * Materializes the whole file. Fine for the log sizes this is used on today;
 * BucketAccumulator is already incremental if this needs to become chunked.
 */
export function readDelimitedSource(filePath: string): TabularSource {
  const format = formatTagFor(filePath);
  const delimiter = DELIMITERS[format];
  if (delimiter === undefined) {
    throw new UnsupportedFormatError(format, `overview building only supports delimited text (csv, tsv), got '${format || "<none>"}'`);
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new SourceIOError(filePath, e);
  }

  return parseDelimitedText(text, delimiter);
}

export function parseDelimitedText(text: string, delimiter = ","): TabularSource {
  const parsed = Papa.parse<SourceRow>(text, {
    delimiter,
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  return {
    columns: parsed.meta.fields ?? [],
    rows: parsed.data,
  };
}
