// packages/store/src/registry.ts
import * as fs from "node:fs";
import * as path from "node:path";

import { NotFoundError, SourceIOError, errorMessage, isErrnoException } from "../../core/src/errors.js";
import { createLogger, type Logger } from "../../core/src/logger.js";
import { MeasurementMetaSchema } from "../../core/src/schema.js";
import type { MeasurementMeta, MeasurementRef } from "../../core/src/types.js";
import { publishJson, readJsonFile } from "./atomic-file.js";
import { cachePath, metaDir, metaPath } from "./cache-layout.js";
import { defaultExtractors, type MetadataExtractorRegistry } from "./extractors.js";
import { DEFAULT_HEAD_BYTES, fingerprintFile } from "./fingerprint.js";
import { configKey, measurementIdFor } from "./stable-json.js";

export type MeasurementRegistryOptions = {
  root: string;
  head_bytes?: number;
  now?: () => string;
  logger?: Logger;
  extractors?: MetadataExtractorRegistry;
};

/**
 * Durable file identity → measurement id mapping.
 * - Metadata is created once per fingerprint (first writer wins).
 * - Only `label` is ever rewritten afterwards.
 * - Nothing here deletes metadata.
 */
export class MeasurementRegistry {
  readonly root: string;
  private readonly headBytes: number;
  private readonly now: () => string;
  private readonly logger: Logger;
  private readonly extractors: MetadataExtractorRegistry;

  constructor(opts: MeasurementRegistryOptions) {
    this.root = path.resolve(opts.root);
    this.headBytes = opts.head_bytes ?? DEFAULT_HEAD_BYTES;
    this.now = opts.now ?? (() => new Date().toISOString());
    this.logger = opts.logger ?? createLogger({ scope: "registry" });
    this.extractors = opts.extractors ?? defaultExtractors();
  }

  register(filePath: string, label?: string): MeasurementRef {
    const abs = path.resolve(filePath);
    const fingerprint = fingerprintFile(abs, this.headBytes);
    const id = measurementIdFor(fingerprint);
    const target = metaPath(this.root, id);

    let meta = this.readMeta(id);

    if (!meta) {
      const created: MeasurementMeta = {
        ...this.extractors.extract(abs),
        measurement_id: id,
        file_fingerprint: fingerprint,
        path: abs,
        label: label ?? null,
        created_at: this.now(),
      };

      if (typeof created.metadata_error === "string") {
        this.logger.warn("metadata extraction failed", {
          measurement_id: id,
          path: abs,
          error: created.metadata_error,
        });
      }

      if (publishJson(target, created, { overwrite: false })) {
        this.logger.info("measurement registered", { measurement_id: id, path: abs, format: created.format });
        meta = created;
      } else {
        this.logger.debug("metadata already published by another writer", { measurement_id: id });
        meta = this.metadata(id);
      }
    }

    if (label !== undefined && meta.label !== label) {
      meta = { ...meta, label };
      publishJson(target, meta, { overwrite: true });
      this.logger.info("measurement label updated", { measurement_id: id, label });
    }

    return { id, path: abs, label: meta.label };
  }

  metadata(measurement_id: string): MeasurementMeta {
    const meta = this.readMeta(measurement_id);
    if (!meta) throw new NotFoundError(`unknown measurement_id: ${measurement_id}`);
    return meta;
  }

  has(measurement_id: string): boolean {
    return this.readMeta(measurement_id) !== null;
  }

  list(): MeasurementMeta[] {
    let names: string[];
    try {
      names = fs.readdirSync(metaDir(this.root));
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return [];
      throw e;
    }

    return names
      .filter((n) => n.endsWith(".json"))
      .map((n) => n.slice(0, -".json".length))
      .sort()
      .map((id) => this.metadata(id));
  }

  configKey(config: unknown): string {
    return configKey(config);
  }

  cachePath(measurement_id: string, kind: string, key: string, suffix: string): string {
    return cachePath(this.root, measurement_id, kind, key, suffix);
  }

  private readMeta(measurement_id: string): MeasurementMeta | null {
    const file = metaPath(this.root, measurement_id);

    let raw: unknown;
    try {
      raw = readJsonFile(file);
    } catch (e) {
      throw new SourceIOError(file, e);
    }
    if (raw === null) return null;

    const parsed = MeasurementMetaSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SourceIOError(file, new Error(`invalid metadata record: ${errorMessage(parsed.error)}`));
    }
    return parsed.data;
  }
}
