export * from "./errors.js";
export * from "./types.js";
export * from "./schema.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LogMeta } from "./logger.js";
export { loadSettings, LOG_LEVELS } from "./settings.js";
export type { LogLevel, Settings } from "./settings.js";
