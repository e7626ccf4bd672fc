export type TrackerConfig = {
  endpoint: string;
  pageSize: number;
  retries: number;
  baseDelayMs: number;
};

export const DEFAULT_TRACKER_CONFIG: TrackerConfig = {
  endpoint: "https://api.github.com/graphql",
  // GitHub caps connection pages at 100 nodes.
  pageSize: 100,
  retries: 3,
  baseDelayMs: 500,
};

export const createEffectiveTrackerConfig = (
  overrides: Partial<TrackerConfig> | undefined,
): TrackerConfig => ({
  ...DEFAULT_TRACKER_CONFIG,
  ...overrides,
});
