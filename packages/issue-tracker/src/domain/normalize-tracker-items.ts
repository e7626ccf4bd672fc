import type {
  NormalizedTrackerBatch,
  NormalizedTrackerItem,
  TrackerItemClosure,
  TrackerKind,
} from "@repometrics/core";
import type { TrackerItem } from "./tracker-types.js";

export type NormalizeTrackerItemsInput = {
  kind: TrackerKind;
  items: readonly TrackerItem[];
  previousItemIds: ReadonlySet<string>;
};

/**
 * Splits fetched items into an id table and item rows that reference it by 0-based ordinal.
 * Items already stored only contribute their close time, so a store can close rows it holds as open.
 */
export const normalizeTrackerItems = (input: NormalizeTrackerItemsInput): NormalizedTrackerBatch => {
  const itemIds: string[] = [];
  const items: NormalizedTrackerItem[] = [];
  const closures: TrackerItemClosure[] = [];
  const seen = new Set<string>();

  for (const item of input.items) {
    if (seen.has(item.id)) {
      continue;
    }

    seen.add(item.id);
    if (input.previousItemIds.has(item.id)) {
      if (item.closedAt !== null) {
        closures.push({ itemId: item.id, closedAt: item.closedAt });
      }
      continue;
    }

    items.push({ itemIdIndex: itemIds.length, createdAt: item.createdAt, closedAt: item.closedAt });
    itemIds.push(item.id);
  }

  return {
    kind: input.kind,
    itemIds,
    items,
    closures,
    skippedItems: input.items.length - items.length,
  };
};
