import { describe, expect, it } from "vitest";
import { normalizeTrackerItems } from "./normalize-tracker-items.js";

describe("normalizeTrackerItems", () => {
  it("builds the id table in first-seen order and skips known or repeated ids", () => {
    const batch = normalizeTrackerItems({
      kind: "issues",
      items: [
        { id: "I_1", createdAt: "2024-01-01T10:00:00Z", closedAt: null },
        { id: "I_2", createdAt: "2024-01-02T10:00:00Z", closedAt: "2024-01-03T09:00:00Z" },
        { id: "I_3", createdAt: "2024-01-04T10:00:00Z", closedAt: null },
        { id: "I_2", createdAt: "2024-01-02T10:00:00Z", closedAt: "2024-01-03T09:00:00Z" },
      ],
      previousItemIds: new Set(["I_1"]),
    });

    expect(batch).toEqual({
      kind: "issues",
      itemIds: ["I_2", "I_3"],
      items: [
        { itemIdIndex: 0, createdAt: "2024-01-02T10:00:00Z", closedAt: "2024-01-03T09:00:00Z" },
        { itemIdIndex: 1, createdAt: "2024-01-04T10:00:00Z", closedAt: null },
      ],
      closures: [],
      skippedItems: 2,
    });
  });

  it("passes on the close time of items that are already stored", () => {
    const batch = normalizeTrackerItems({
      kind: "issues",
      items: [
        { id: "I_1", createdAt: "2024-01-01T10:00:00Z", closedAt: "2024-01-02T00:00:00Z" },
        { id: "I_2", createdAt: "2024-01-01T11:00:00Z", closedAt: null },
      ],
      previousItemIds: new Set(["I_1", "I_2"]),
    });

    expect(batch.itemIds).toEqual([]);
    expect(batch.items).toEqual([]);
    expect(batch.closures).toEqual([{ itemId: "I_1", closedAt: "2024-01-02T00:00:00Z" }]);
    expect(batch.skippedItems).toBe(2);
  });
});
