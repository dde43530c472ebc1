// packages/store/src/cache-layout.ts
import * as path from "node:path";

import { InvalidConfigError } from "../../core/src/errors.js";

/*
 * <root>/
 *   meta/<measurement_id>.json
 *   artifacts/<measurement_id>/<kind>/<key><suffix>
 *
 * Pure path arithmetic: nothing here touches the filesystem, so the same
 * inputs give the same path in any process and in any call order.
 */

export function metaDir(root: string): string {
  return path.join(root, "meta");
}

export function metaPath(root: string, measurement_id: string): string {
  assertSegment("measurement_id", measurement_id);
  return path.join(metaDir(root), `${measurement_id}.json`);
}

export function cachePath(
  root: string,
  measurement_id: string,
  kind: string,
  key: string,
  suffix: string
): string {
  assertSegment("measurement_id", measurement_id);
  assertSegment("kind", kind);
  assertSegment("key", key);
  if (suffix !== "" && !/^\.[A-Za-z0-9_.-]+$/.test(suffix)) {
    throw new InvalidConfigError(`cache suffix must look like '.ext', got '${suffix}'`);
  }
  return path.join(root, "artifacts", measurement_id, kind, `${key}${suffix}`);
}

function assertSegment(name: string, value: string) {
  if (!value || value === "." || value === ".." || /[\\/\0]/.test(value)) {
    throw new InvalidConfigError(`${name} must be a plain path segment, got '${value}'`);
  }
}
