export type SpoilageAlgorithm = "dense" | "sweep_line";

export type MetricsEngineConfig = {
  spoilageAlgorithm: SpoilageAlgorithm;
};

export const DEFAULT_METRICS_CONFIG: MetricsEngineConfig = {
  // Pairwise day × issue comparison; the sweep line yields the same rows in n log n.
  spoilageAlgorithm: "dense",
};

export const createEffectiveMetricsConfig = (
  overrides: Partial<MetricsEngineConfig> | undefined,
): MetricsEngineConfig => ({
  ...DEFAULT_METRICS_CONFIG,
  ...overrides,
});
