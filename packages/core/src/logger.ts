// packages/core/src/logger.ts
import { loadSettings, type LogLevel } from "./settings.js";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
};

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Emit = (line: string) => void;

const SINKS: Record<Exclude<LogLevel, "silent">, Emit> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * JSON-lines logger over console. `scope` is stamped on every record so
 * output from the registry, overview and pass1 layers can be told apart.
 */
export function createLogger(opts: { level?: LogLevel; scope?: string } = {}): Logger {
  const threshold = RANK[opts.level ?? loadSettings().log_level];

  const write = (level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta) => {
    if (RANK[level] < threshold) return;
    SINKS[level](
      JSON.stringify({
        level,
        ...(opts.scope ? { scope: opts.scope } : {}),
        message,
        ...meta,
        timestamp: new Date().toISOString(),
      })
    );
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
