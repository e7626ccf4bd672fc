import type { TrackerKind } from "@repometrics/core";
import { describe, expect, it } from "vitest";
import type { RateLimit, TrackerItem, TrackerPage } from "../domain/tracker-types.js";
import {
  fetchAllTrackerItems,
  type TrackerFetchProgressEvent,
} from "./fetch-all-tracker-items.js";
import type { TrackerClient } from "./tracker-client.js";

const item = (id: string): TrackerItem => ({
  id,
  createdAt: "2024-01-01T00:00:00Z",
  closedAt: null,
});

class StubTrackerClient implements TrackerClient {
  readonly cursors: (string | null)[] = [];
  lastRateLimit: RateLimit | null = null;

  constructor(
    private readonly pages: readonly TrackerPage[],
    private readonly total: number | null = 3,
  ) {}

  async totalCount(_kind: TrackerKind): Promise<number | null> {
    return this.total;
  }

  async page(_kind: TrackerKind, cursor: string | null): Promise<TrackerPage> {
    this.cursors.push(cursor);
    this.lastRateLimit = { limit: 5000, remaining: 5000 - this.cursors.length, resetAt: "2024-01-01T01:00:00Z" };
    return (
      this.pages[this.cursors.length - 1] ?? { items: [], nextCursor: null, hasMore: false, failure: null }
    );
  }
}

describe("fetchAllTrackerItems", () => {
  it("follows cursors until the last page", async () => {
    const client = new StubTrackerClient([
      { items: [item("I_1"), item("I_2")], nextCursor: "c1", hasMore: true, failure: null },
      { items: [item("I_3")], nextCursor: "c2", hasMore: false, failure: null },
    ]);
    const events: TrackerFetchProgressEvent[] = [];

    const result = await fetchAllTrackerItems(client, "issues", (event) => events.push(event));

    expect(client.cursors).toEqual([null, "c1"]);
    expect(result).toEqual({
      kind: "issues",
      items: [item("I_1"), item("I_2"), item("I_3")],
      totalCount: 3,
      complete: true,
    });
    expect(events.at(-1)).toEqual({
      stage: "page_fetched",
      kind: "issues",
      page: 2,
      items: 1,
      fetched: 3,
      total: 3,
      rateLimitRemaining: 4998,
    });
  });

  it("stops silently at a failed page and keeps what it has", async () => {
    const client = new StubTrackerClient([
      { items: [item("P_1")], nextCursor: "c1", hasMore: true, failure: null },
      { items: [], nextCursor: null, hasMore: false, failure: "HTTP 502" },
    ]);
    const events: TrackerFetchProgressEvent[] = [];

    const result = await fetchAllTrackerItems(client, "pull_requests", (event) =>
      events.push(event),
    );

    expect(result.items).toEqual([item("P_1")]);
    expect(result.complete).toBe(false);
    expect(events.at(-1)).toEqual({
      stage: "page_failed",
      kind: "pull_requests",
      page: 2,
      reason: "HTTP 502",
    });
  });

  it("does not loop on a page that reports more without a cursor", async () => {
    const client = new StubTrackerClient([
      { items: [item("I_1")], nextCursor: null, hasMore: true, failure: null },
    ]);

    const result = await fetchAllTrackerItems(client, "issues");

    expect(client.cursors).toEqual([null]);
    expect(result.complete).toBe(true);
  });
});
