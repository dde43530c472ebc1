// packages/overview/src/time.ts
import { fromUnixTime, isValid, parseISO } from "date-fns";

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * ISO-8601 text → epoch seconds. Timestamps without a zone are read as UTC.
 * Returns null for anything that does not parse.
 */
export function parseTimestampSeconds(raw: string): number | null {
  const s = raw.trim().replace(/^(\d{4}-\d{2}-\d{2}) (?=\d)/, "$1T");
  if (!s) return null;

  const tIdx = s.indexOf("T");
  let normalized: string;
  if (tIdx < 0) normalized = `${s}T00:00:00Z`;
  else if (ZONE_SUFFIX.test(s.slice(tIdx))) normalized = s;
  else normalized = `${s}Z`;

  const d = parseISO(normalized);
  return isValid(d) ? d.getTime() / 1000 : null;
}

export function formatEpochSeconds(seconds: number): string {
  return fromUnixTime(seconds).toISOString();
}
