export { OverviewCache, OVERVIEW_KIND, OVERVIEW_SUFFIX } from "./overview-cache.js";
export type { OverviewKeyed } from "./overview-cache.js";
export { buildOverviewTable, inferSignals } from "./overview-builder.js";
export type { OverviewBuildStats } from "./overview-builder.js";
export { BucketAccumulator, aggregateColumn } from "./bucket-accumulator.js";
export { readOverviewArtifact, writeOverviewArtifact } from "./overview-artifact.js";
export { parseDelimitedText, readDelimitedSource } from "./delimited-source.js";
export type { SourceRow, TabularSource } from "./delimited-source.js";
export { formatEpochSeconds, parseTimestampSeconds } from "./time.js";
