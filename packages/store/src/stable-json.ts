// packages/store/src/stable-json.ts
import { createHash } from "node:crypto";

/**
 * Stable (canonical) JSON stringify:
 * - object keys are sorted
 * - arrays preserve order (signals/agg order is meaningful and hashed verbatim)
 * - undefined is omitted in objects (like JSON.stringify)
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (value === null) return null;

  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  if (Array.isArray(value)) return value.map(canonicalize);

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (typeof v === "undefined") continue;
      out[k] = canonicalize(v);
    }
    return out;
  }

  // functions/symbols/bigints are not representable in JSON
  return null;
}

export function sha256Hex(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex");
}

export const CONFIG_KEY_LENGTH = 16;
export const MEASUREMENT_ID_PREFIX_LENGTH = 12;

/** Short deterministic key addressing artifacts built from `config`. */
export function configKey(config: unknown): string {
  return sha256Hex(canonicalJson(config)).slice(0, CONFIG_KEY_LENGTH);
}

export function measurementIdFor(fingerprint: string): string {
  return `m_${fingerprint.slice(0, MEASUREMENT_ID_PREFIX_LENGTH)}`;
}
