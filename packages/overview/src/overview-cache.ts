// packages/overview/src/overview-cache.ts
import * as fs from "node:fs";

import { NotFoundError } from "../../core/src/errors.js";
import { createLogger, type Logger } from "../../core/src/logger.js";
import type { OverviewBuildResult, OverviewConfig, OverviewTable } from "../../core/src/types.js";
import { publishFile } from "../../store/src/atomic-file.js";
import type { MeasurementRegistry } from "../../store/src/registry.js";
import { readDelimitedSource } from "./delimited-source.js";
import { readOverviewArtifact, writeOverviewArtifact } from "./overview-artifact.js";
import { buildOverviewTable } from "./overview-builder.js";

export const OVERVIEW_KIND = "overview";
export const OVERVIEW_SUFFIX = ".sqlite";

export type OverviewKeyed = {
  key: string;
  path: string;
  config: OverviewConfig & { measurement_id: string };
};

/**
 * Overview artifacts addressed by (measurement_id, config_key).
 * A present artifact is never rebuilt or touched.
 */
export class OverviewCache {
  private readonly logger: Logger;

  constructor(
    private readonly registry: MeasurementRegistry,
    opts: { logger?: Logger } = {}
  ) {
    this.logger = opts.logger ?? createLogger({ scope: "overview" });
  }

  locate(measurement_id: string, config: OverviewConfig): OverviewKeyed {
    const keyed = {
      measurement_id,
      signals: config.signals,
      hz: config.hz,
      agg: config.agg,
      time_col: config.time_col,
    };
    const key = this.registry.configKey(keyed);
    return {
      key,
      path: this.registry.cachePath(measurement_id, OVERVIEW_KIND, key, OVERVIEW_SUFFIX),
      config: keyed,
    };
  }

  build(measurement_id: string, config: OverviewConfig): OverviewBuildResult {
    const meta = this.registry.metadata(measurement_id);
    const { key, path, config: keyed } = this.locate(measurement_id, config);

    if (fs.existsSync(path)) {
      this.logger.debug("overview cache hit", { measurement_id, key });
      return { path, key, config: keyed, cache_hit: true };
    }

    const source = readDelimitedSource(meta.path);
    const { table, stats } = buildOverviewTable(source, config, { logger: this.logger });

    const published = publishFile(path, (tmp) => writeOverviewArtifact(tmp, table), { overwrite: false });
    this.logger.info("overview built", {
      measurement_id,
      key,
      rows_in: stats.rows_in,
      rows_dropped: stats.rows_dropped,
      buckets: table.buckets.length,
      signals: table.signals.length,
      published,
    });

    return { path, key, config: keyed, cache_hit: false };
  }

  /** Explicit load: the artifact must already exist. */
  load(measurement_id: string, configOrKey: OverviewConfig | string): OverviewTable {
    const path =
      typeof configOrKey === "string"
        ? this.registry.cachePath(measurement_id, OVERVIEW_KIND, configOrKey, OVERVIEW_SUFFIX)
        : this.locate(measurement_id, configOrKey).path;

    if (!fs.existsSync(path)) {
      throw new NotFoundError(`no overview artifact for ${measurement_id} at ${path}`);
    }
    return readOverviewArtifact(path);
  }
}
