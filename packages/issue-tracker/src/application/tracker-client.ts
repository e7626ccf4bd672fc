import type { TrackerKind } from "@repometrics/core";
import type { RateLimit, TrackerPage } from "../domain/tracker-types.js";

export interface TrackerClient {
  /** `null` when the count could not be fetched. */
  totalCount(kind: TrackerKind): Promise<number | null>;
  page(kind: TrackerKind, cursor: string | null): Promise<TrackerPage>;
  readonly lastRateLimit: RateLimit | null;
}
