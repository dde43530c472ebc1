// packages/core/src/settings.ts
import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const SettingsSchema = z.object({
  AUTOPSY_CACHE_DIR: z.string().min(1).default(".autopsy_cache"),
  AUTOPSY_HEAD_BYTES: z.coerce.number().int().positive().default(2_000_000),
  AUTOPSY_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type Settings = {
  cache_dir: string;
  head_bytes: number;
  log_level: LogLevel;
};

/**
 * Process-level defaults. Only consulted when a caller leaves the matching
 * store option out.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse({
    AUTOPSY_CACHE_DIR: emptyToUndefined(env.AUTOPSY_CACHE_DIR),
    AUTOPSY_HEAD_BYTES: emptyToUndefined(env.AUTOPSY_HEAD_BYTES),
    AUTOPSY_LOG_LEVEL: emptyToUndefined(env.AUTOPSY_LOG_LEVEL),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`);
    throw new Error(`INVALID_SETTINGS: ${issues.join("; ")}`);
  }

  return {
    cache_dir: parsed.data.AUTOPSY_CACHE_DIR,
    head_bytes: parsed.data.AUTOPSY_HEAD_BYTES,
    log_level: parsed.data.AUTOPSY_LOG_LEVEL,
  };
}

function emptyToUndefined(v: string | undefined): string | undefined {
  return v === undefined || v.trim() === "" ? undefined : v;
}
