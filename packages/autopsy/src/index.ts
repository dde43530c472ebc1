export { AutopsyStore } from "./autopsy-store.js";
export type { AutopsyStoreOptions } from "./autopsy-store.js";

export * from "../../core/src/index.js";
export {
  MeasurementRegistry,
  MetadataExtractorRegistry,
  defaultExtractors,
  fingerprintFile,
  configKey,
  canonicalJson,
} from "../../store/src/index.js";
export type { MetadataExtractor } from "../../store/src/index.js";
export { buildOverviewTable, inferSignals, parseDelimitedText } from "../../overview/src/index.js";
export { computePass1, summarizePass1 } from "../../pass1/src/index.js";
