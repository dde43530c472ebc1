// packages/store/src/atomic-file.ts
import { randomBytes } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";

import { isErrnoException } from "../../core/src/errors.js";

export type PublishOptions = {
  /**
   * true: replace whatever is at the target (rename).
   * false: first writer wins; if the target already exists this call's
   * artifact is discarded (hard link fails with EEXIST).
   */
  overwrite: boolean;
};

/**
 * Build an artifact at a unique temporary sibling and publish it in one
 * step, so readers see either nothing or the complete file.
 * Returns true when this call's artifact is the one now at `target`.
 */
export function publishFile(
  target: string,
  write: (tmpPath: string) => void,
  opts: PublishOptions
): boolean {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tmp = `${target}.tmp-${process.pid}-${randomBytes(6).toString("hex")}`;

  try {
    write(tmp);

    if (opts.overwrite) {
      fs.renameSync(tmp, target);
      return true;
    }

    try {
      fs.linkSync(tmp, target);
      return true;
    } catch (e) {
      if (isErrnoException(e) && e.code === "EEXIST") return false;
      throw e;
    }
  } finally {
    fs.rmSync(tmp, { force: true });
  }
}

export function publishJson(target: string, value: unknown, opts: PublishOptions): boolean {
  return publishFile(target, (tmp) => writeDurable(tmp, JSON.stringify(value, null, 2) + "\n"), opts);
}

/** Parsed JSON at `file`, or null when there is no such file. */
export function readJsonFile(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return null;
    throw e;
  }
  return JSON.parse(raw);
}

function writeDurable(file: string, content: string) {
  const fd = fs.openSync(file, "wx");
  try {
    fs.writeSync(fd, content);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}
