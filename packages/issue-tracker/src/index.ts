export {
  DEFAULT_TRACKER_CONFIG,
  createEffectiveTrackerConfig,
  type TrackerConfig,
} from "./config.js";
export type { RateLimit, TrackerItem, TrackerPage } from "./domain/tracker-types.js";
export {
  normalizeTrackerItems,
  type NormalizeTrackerItemsInput,
} from "./domain/normalize-tracker-items.js";
export type { TrackerClient } from "./application/tracker-client.js";
export {
  fetchAllTrackerItems,
  type FetchAllTrackerItemsResult,
  type TrackerFetchProgressEvent,
} from "./application/fetch-all-tracker-items.js";
export {
  fetchJsonWithRetry,
  type FetchFunction,
  type FetchJsonResult,
  type FetchRetryOptions,
} from "./infrastructure/fetch-json-with-retry.js";
export {
  GitHubTrackerClient,
  type GitHubTrackerClientOptions,
} from "./infrastructure/github-tracker-client.js";
