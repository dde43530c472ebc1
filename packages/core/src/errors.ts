// packages/core/src/errors.ts

export type AutopsyErrorCode =
  | "NOT_FOUND"
  | "INVALID_CONFIG"
  | "DATA_SHAPE"
  | "UNSUPPORTED_FORMAT"
  | "IO_ERROR";

/**
 * Base class for every failure the engine reports to its caller.
 * Messages follow the `CODE: detail` convention so they stay greppable in logs.
 */
export class AutopsyError extends Error {
  readonly code: AutopsyErrorCode;

  constructor(code: AutopsyErrorCode, detail: string, options?: { cause?: unknown }) {
    super(`${code}: ${detail}`, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unknown measurement id, or an explicit load of an artifact that was never computed. */
export class NotFoundError extends AutopsyError {
  constructor(detail: string) {
    super("NOT_FOUND", detail);
  }
}

export class InvalidConfigError extends AutopsyError {
  readonly issues: string[];

  constructor(detail: string, issues: string[] = []) {
    super("INVALID_CONFIG", issues.length ? `${detail} (${issues.join("; ")})` : detail);
    this.issues = issues;
  }
}

/** A configured or inferred signal lacks the aggregate column it needs. */
export class DataShapeError extends AutopsyError {
  readonly column: string;

  constructor(column: string, detail?: string) {
    super("DATA_SHAPE", detail ?? `missing column '${column}'`);
    this.column = column;
  }
}

export class UnsupportedFormatError extends AutopsyError {
  readonly format: string;

  constructor(format: string, detail: string) {
    super("UNSUPPORTED_FORMAT", detail);
    this.format = format;
  }
}

export class SourceIOError extends AutopsyError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("IO_ERROR", `cannot read '${path}': ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

export function isAutopsyError(e: unknown, code?: AutopsyErrorCode): e is AutopsyError {
  if (!(e instanceof AutopsyError)) return false;
  return code === undefined || e.code === code;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Narrow a thrown value to a Node system error carrying an errno code. */
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e && typeof e.code === "string";
}
