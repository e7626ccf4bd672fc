import type { TrackerKind } from "@repometrics/core";
import type { TrackerItem } from "../domain/tracker-types.js";
import type { TrackerClient } from "./tracker-client.js";

export type TrackerFetchProgressEvent =
  | { stage: "counting_items"; kind: TrackerKind }
  | { stage: "items_counted"; kind: TrackerKind; total: number | null }
  | {
      stage: "page_fetched";
      kind: TrackerKind;
      page: number;
      items: number;
      fetched: number;
      total: number | null;
      rateLimitRemaining: number | null;
    }
  | { stage: "page_failed"; kind: TrackerKind; page: number; reason: string };

export type FetchAllTrackerItemsResult = {
  kind: TrackerKind;
  items: readonly TrackerItem[];
  totalCount: number | null;
  /** False when a page failed and the remaining pages were not requested. */
  complete: boolean;
};

export const fetchAllTrackerItems = async (
  client: TrackerClient,
  kind: TrackerKind,
  onProgress?: (event: TrackerFetchProgressEvent) => void,
): Promise<FetchAllTrackerItemsResult> => {
  onProgress?.({ stage: "counting_items", kind });
  const totalCount = await client.totalCount(kind);
  onProgress?.({ stage: "items_counted", kind, total: totalCount });

  const items: TrackerItem[] = [];
  let cursor: string | null = null;
  let pageNumber = 0;

  for (;;) {
    pageNumber += 1;
    const page = await client.page(kind, cursor);
    if (page.failure !== null) {
      onProgress?.({ stage: "page_failed", kind, page: pageNumber, reason: page.failure });
      return { kind, items, totalCount, complete: false };
    }

    items.push(...page.items);
    onProgress?.({
      stage: "page_fetched",
      kind,
      page: pageNumber,
      items: page.items.length,
      fetched: items.length,
      total: totalCount,
      rateLimitRemaining: client.lastRateLimit?.remaining ?? null,
    });

    // a page that claims more without a cursor cannot be continued
    if (!page.hasMore || page.nextCursor === null) {
      return { kind, items, totalCount, complete: true };
    }

    cursor = page.nextCursor;
  }
};
