export { computePass1, pass1Signals } from "./engine.js";
export type { Pass1Input, Pass1Options } from "./engine.js";
export { ResultCache, PASS1_KIND, PASS1_SUFFIX } from "./result-cache.js";
export { summarizePass1 } from "./summary.js";
export { detectSignal, requireSignalColumns } from "./detectors.js";
export type { SignalColumns, SignalDetection } from "./detectors.js";
export { checkTimestamps, GAP_FACTOR } from "./timestamp-checks.js";
export { mergeWindows, windowTime } from "./windows.js";
export { firstDifference, madZScores, median, medianAbsoluteDeviation, MAD_Z_CONSTANT } from "./robust-stats.js";
export { flatlineMask, trueRuns } from "./runs.js";
export type { Run } from "./runs.js";
