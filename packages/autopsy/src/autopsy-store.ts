// packages/autopsy/src/autopsy-store.ts
import { createLogger, type Logger } from "../../core/src/logger.js";
import {
  parseOverviewConfig,
  parsePass1Config,
  type OverviewConfigInput,
  type Pass1ConfigInput,
} from "../../core/src/schema.js";
import { loadSettings } from "../../core/src/settings.js";
import type {
  MeasurementMeta,
  MeasurementRef,
  OverviewBuildResult,
  OverviewTable,
  Pass1Result,
  Pass1Summary,
} from "../../core/src/types.js";
import { OverviewCache } from "../../overview/src/overview-cache.js";
import { computePass1, type Pass1Input } from "../../pass1/src/engine.js";
import { ResultCache } from "../../pass1/src/result-cache.js";
import { summarizePass1 } from "../../pass1/src/summary.js";
import type { MetadataExtractorRegistry } from "../../store/src/extractors.js";
import { MeasurementRegistry } from "../../store/src/registry.js";

export type AutopsyStoreOptions = {
  root?: string; // defaults to AUTOPSY_CACHE_DIR
  head_bytes?: number; // defaults to AUTOPSY_HEAD_BYTES
  logger?: Logger;
  now?: () => string;
  extractors?: MetadataExtractorRegistry;
};

/**
 * One explicit store/context object per cache root:
 * register → overview → pass1, every step content-addressed and idempotent.
 */
export class AutopsyStore {
  readonly registry: MeasurementRegistry;
  private readonly overviews: OverviewCache;
  private readonly results: ResultCache;
  private readonly now: () => string;

  constructor(opts: AutopsyStoreOptions = {}) {
    const needsSettings = opts.root === undefined || opts.head_bytes === undefined || opts.logger === undefined;
    const settings = needsSettings ? loadSettings() : null;
    const logger = opts.logger ?? createLogger({ level: settings?.log_level, scope: "autopsy" });

    this.now = opts.now ?? (() => new Date().toISOString());
    this.registry = new MeasurementRegistry({
      root: opts.root ?? settings?.cache_dir ?? ".autopsy_cache",
      head_bytes: opts.head_bytes ?? settings?.head_bytes,
      now: this.now,
      logger,
      extractors: opts.extractors,
    });
    this.overviews = new OverviewCache(this.registry, { logger });
    this.results = new ResultCache(this.registry, { logger });
  }

  get root(): string {
    return this.registry.root;
  }

  add(path: string, label?: string): MeasurementRef {
    return this.registry.register(path, label);
  }

  meta(measurement_id: string): MeasurementMeta {
    return this.registry.metadata(measurement_id);
  }

  list(): MeasurementMeta[] {
    return this.registry.list();
  }

  configKey(config: unknown): string {
    return this.registry.configKey(config);
  }

  cachePath(measurement_id: string, kind: string, key: string, suffix: string): string {
    return this.registry.cachePath(measurement_id, kind, key, suffix);
  }

  buildOverview(measurement_id: string, config: OverviewConfigInput = {}): OverviewBuildResult {
    return this.overviews.build(measurement_id, parseOverviewConfig(config));
  }

  loadOverview(measurement_id: string, configOrKey: OverviewConfigInput | string = {}): OverviewTable {
    return this.overviews.load(
      measurement_id,
      typeof configOrKey === "string" ? configOrKey : parseOverviewConfig(configOrKey)
    );
  }

  runPass1(
    measurement_id: string,
    overviewConfig: OverviewConfigInput = {},
    pass1Config: Pass1ConfigInput = {}
  ): Pass1Result {
    const input = this.pass1Input(measurement_id, overviewConfig, pass1Config);

    return this.results.run(input, (key) => {
      this.overviews.build(measurement_id, input.overview_cfg);
      const table = this.overviews.load(measurement_id, input.overview_cfg);
      return computePass1(table, input, { key, now: this.now });
    });
  }

  loadPass1(
    measurement_id: string,
    overviewConfig: OverviewConfigInput = {},
    pass1Config: Pass1ConfigInput = {}
  ): Pass1Result {
    return this.results.load(this.pass1Input(measurement_id, overviewConfig, pass1Config));
  }

  summarize(result: Pass1Result): Pass1Summary {
    return summarizePass1(result);
  }

  private pass1Input(
    measurement_id: string,
    overviewConfig: OverviewConfigInput,
    pass1Config: Pass1ConfigInput
  ): Pass1Input {
    return {
      measurement_id,
      overview_cfg: parseOverviewConfig(overviewConfig),
      pass1_cfg: parsePass1Config(pass1Config),
    };
  }
}
