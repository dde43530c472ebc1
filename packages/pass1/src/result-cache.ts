// packages/pass1/src/result-cache.ts
import * as fs from "node:fs";

import { NotFoundError, SourceIOError, errorMessage } from "../../core/src/errors.js";
import { createLogger, type Logger } from "../../core/src/logger.js";
import { Pass1ResultSchema } from "../../core/src/schema.js";
import type { Pass1Result } from "../../core/src/types.js";
import { publishJson, readJsonFile } from "../../store/src/atomic-file.js";
import type { MeasurementRegistry } from "../../store/src/registry.js";
import type { Pass1Input } from "./engine.js";

export const PASS1_KIND = "pass1";
export const PASS1_SUFFIX = ".json";

/**
 * Config-keyed memo for Pass 1 results.
 * - key = configKey({ measurement_id, overview_cfg, pass1_cfg })
 * - stored with cache_hit=false, served back with cache_hit=true
 * - publish is all-or-nothing; the first complete artifact for a key wins
 */
export class ResultCache {
  private readonly logger: Logger;

  constructor(
    private readonly registry: MeasurementRegistry,
    opts: { logger?: Logger } = {}
  ) {
    this.logger = opts.logger ?? createLogger({ scope: "pass1" });
  }

  locate(input: Pass1Input): { key: string; path: string } {
    const key = this.registry.configKey({
      measurement_id: input.measurement_id,
      overview_cfg: input.overview_cfg,
      pass1_cfg: input.pass1_cfg,
    });
    return { key, path: this.registry.cachePath(input.measurement_id, PASS1_KIND, key, PASS1_SUFFIX) };
  }

  run(input: Pass1Input, compute: (key: string) => Pass1Result): Pass1Result {
    const { key, path } = this.locate(input);

    const cached = this.read(path);
    if (cached) {
      this.logger.debug("pass1 cache hit", { measurement_id: input.measurement_id, key });
      return { ...cached, cache_hit: true };
    }

    const result: Pass1Result = { ...compute(key), key, cache_hit: false };
    if (publishJson(path, result, { overwrite: false })) {
      this.logger.info("pass1 computed", {
        measurement_id: input.measurement_id,
        key,
        windows: result.windows.length,
      });
      return result;
    }

    // another writer published the same key first; serve its artifact
    this.logger.debug("pass1 artifact already published by another writer", { key });
    return { ...this.load(input), cache_hit: false };
  }

  /** Explicit load: fails with NotFound when the result was never computed. */
  load(input: Pass1Input): Pass1Result {
    const { key, path } = this.locate(input);
    const cached = this.read(path);
    if (!cached) throw new NotFoundError(`no pass1 result for ${input.measurement_id} under key ${key}`);
    return { ...cached, cache_hit: true };
  }

  has(input: Pass1Input): boolean {
    return fs.existsSync(this.locate(input).path);
  }

  private read(path: string): Pass1Result | null {
    let raw: unknown;
    try {
      raw = readJsonFile(path);
    } catch (e) {
      throw new SourceIOError(path, e);
    }
    if (raw === null) return null;

    const parsed = Pass1ResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SourceIOError(path, new Error(`invalid pass1 artifact: ${errorMessage(parsed.error)}`));
    }
    return parsed.data;
  }
}
