import { ExecSccCommandRunner, SccLineCounter } from "./infrastructure/scc-line-counter.js";

export {
  DEFAULT_METRICS_CONFIG,
  createEffectiveMetricsConfig,
  type MetricsEngineConfig,
  type SpoilageAlgorithm,
} from "./config.js";
export { dayRange, minDay, toUtcDay } from "./domain/calendar.js";
export { computeProjectSizePerCommit, computeProjectSizePerDay } from "./domain/size-aggregation.js";
export type { ProjectSizePerDayInput } from "./domain/size-aggregation.js";
export { computeProductivityPerCommit, computeProductivityPerDay } from "./domain/productivity.js";
export { computeBusFactorPerDay, type CommitActivity } from "./domain/bus-factor.js";
export { computeIssueSpoilagePerDay, type IssueSpoilageInput } from "./domain/issue-spoilage.js";
export { computeIssueDensityPerDay } from "./domain/issue-density.js";
export type { FileMeasurement, LineCounter, RevisionCheckout } from "./application/line-counter.js";
export {
  measureFileSizes,
  type FileSizeMeasurement,
  type FileSizeProgressEvent,
  type MeasureFileSizesInput,
} from "./application/measure-file-sizes.js";
export {
  ExecSccCommandRunner,
  LineCounterError,
  SccLineCounter,
  type SccCommandRunner,
} from "./infrastructure/scc-line-counter.js";
export { parseSccCsv } from "./parsing/scc-csv-parser.js";

export const createSccLineCounter = (binary = "scc"): SccLineCounter =>
  new SccLineCounter(new ExecSccCommandRunner(binary));
