export { MeasurementRegistry } from "./registry.js";
export type { MeasurementRegistryOptions } from "./registry.js";
export { fingerprintFile, readHead, DEFAULT_HEAD_BYTES } from "./fingerprint.js";
export { canonicalJson, configKey, measurementIdFor, sha256Hex } from "./stable-json.js";
export { cachePath, metaPath } from "./cache-layout.js";
export { publishFile, publishJson, readJsonFile } from "./atomic-file.js";
export type { PublishOptions } from "./atomic-file.js";
export {
  MetadataExtractorRegistry,
  defaultExtractors,
  delimitedTextExtractor,
  mdfExtractor,
  MAX_LISTED_COLUMNS,
} from "./extractors.js";
export type { ExtractedMetadata, MetadataExtractor } from "./extractors.js";
