// packages/store/src/fingerprint.ts
import { createHash } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";

import { SourceIOError } from "../../core/src/errors.js";

export const DEFAULT_HEAD_BYTES = 2_000_000;

/**
 * Identity signature for huge files without hashing them whole:
 * sha256(size, truncated mtime seconds, first `head_bytes` bytes).
 *
 * A change that lands strictly after the head window while size and mtime
 * stay the same is NOT detected.
 */
export function fingerprintFile(filePath: string, head_bytes: number = DEFAULT_HEAD_BYTES): string {
  const abs = path.resolve(filePath);

  let stat: fs.Stats;
  let head: Buffer;
  try {
    stat = fs.statSync(abs);
    if (!stat.isFile()) throw new Error("not a regular file");
    head = readHead(abs, head_bytes);
  } catch (e) {
    throw new SourceIOError(abs, e);
  }

  return createHash("sha256")
    .update(String(stat.size))
    .update(String(Math.trunc(stat.mtimeMs / 1000)))
    .update(head)
    .digest("hex");
}

/** Read at most `maxBytes` from the start of a file. */
export function readHead(filePath: string, maxBytes: number): Buffer {
  const buf = Buffer.alloc(Math.max(0, maxBytes));
  const fd = fs.openSync(filePath, "r");
  try {
    let filled = 0;
    while (filled < buf.length) {
      const n = fs.readSync(fd, buf, filled, buf.length - filled, filled);
      if (n === 0) break;
      filled += n;
    }
    return buf.subarray(0, filled);
  } finally {
    fs.closeSync(fd);
  }
}
