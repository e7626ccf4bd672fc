import type { NormalizedRevisionBatch, ProjectSizePerDayRecord } from "@repometrics/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RowValidationError } from "./errors.js";
import { MetricsStore } from "./metrics-store.js";
import { TABLES } from "./schema/tables.js";

const sizeOn = (date: string, code: number): ProjectSizePerDayRecord => ({
  date,
  lines: code + 2,
  code,
  comments: 1,
  blanks: 1,
  bytes: code * 10,
});

const firstBatch: NormalizedRevisionBatch = {
  commitHashes: ["h1", "h2"],
  authors: [{ author: "Alice", authorEmail: "alice@example.com" }],
  committers: [{ committer: "Bob", committerEmail: "bob@example.com" }],
  commitLogs: [
    {
      commitHashIndex: 0,
      authorIndex: 0,
      committerIndex: 0,
      coAuthorIndices: [null],
      coAuthorEmails: [null],
      parentHashIndices: [null],
      parentHashes: [null],
      authoredAt: "2024-01-01T10:00:00.000Z",
      committedAt: "2024-01-01T10:00:00.000Z",
      message: "first",
      encoding: "UTF-8",
      signature: "N",
    },
    {
      commitHashIndex: 1,
      authorIndex: 0,
      committerIndex: 0,
      coAuthorIndices: [null],
      coAuthorEmails: ["carol@example.com"],
      parentHashIndices: [0],
      parentHashes: ["h1"],
      authoredAt: "2024-01-02T10:00:00.000Z",
      committedAt: "2024-01-02T11:00:00.000Z",
      message: "second",
      encoding: "UTF-8",
      signature: "G",
    },
  ],
  releases: [{ tag: "v1", commitHashIndex: 1 }],
  droppedTags: [],
  skippedRevisions: 0,
};

const secondBatch: NormalizedRevisionBatch = {
  commitHashes: ["h3"],
  authors: [{ author: "Carol", authorEmail: "carol@example.com" }],
  committers: [{ committer: "Bob Renamed", committerEmail: "bob@example.com" }],
  commitLogs: [
    {
      commitHashIndex: 0,
      authorIndex: 0,
      committerIndex: 0,
      coAuthorIndices: [null],
      coAuthorEmails: ["alice@example.com"],
      parentHashIndices: [null],
      parentHashes: ["h2"],
      authoredAt: "2024-01-03T10:00:00.000Z",
      committedAt: "2024-01-03T10:00:00.000Z",
      message: "third",
      encoding: "UTF-8",
      signature: "N",
    },
  ],
  releases: [],
  droppedTags: [],
  skippedRevisions: 2,
};

describe("MetricsStore", () => {
  let store: MetricsStore;

  beforeEach(() => {
    store = new MetricsStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  describe("writeTable", () => {
    it("appends validated rows with generated keys", () => {
      expect(store.writeTable(TABLES.projectSizePerDay, [sizeOn("2024-01-01", 10), sizeOn("2024-01-02", 12)])).toBe(
        true,
      );

      expect(store.readTable(TABLES.projectSizePerDay)).toEqual([
        { id: 1, ...sizeOn("2024-01-01", 10) },
        { id: 2, ...sizeOn("2024-01-02", 12) },
      ]);
    });

    it("rejects an invalid row before writing anything", () => {
      expect(() =>
        store.writeTable(TABLES.projectSizePerDay, [sizeOn("2024-01-01", 10), sizeOn("2024/01/02", 12)]),
      ).toThrow(RowValidationError);
      expect(store.readTable(TABLES.projectSizePerDay)).toEqual([]);
    });

    it("returns false and rolls back on a constraint violation", () => {
      expect(store.writeTable(TABLES.projectSizePerDay, [sizeOn("2024-01-01", 10)])).toBe(true);

      expect(
        store.writeTable(TABLES.projectSizePerDay, [sizeOn("2024-01-02", 11), sizeOn("2024-01-01", 12)]),
      ).toBe(false);
      expect(
        store.writeTable(TABLES.fileSizes, [
          { commitHashId: 99, language: "Go", path: "main.go", lines: 1, code: 1, comments: 0, blanks: 0, bytes: 9 },
        ]),
      ).toBe(false);
      expect(store.readTable(TABLES.projectSizePerDay).map((row) => row.date)).toEqual(["2024-01-01"]);
    });
  });

  describe("appendNew", () => {
    it("skips rows whose natural key is already stored", () => {
      store.writeTable(TABLES.projectSizePerDay, [sizeOn("2024-01-01", 10)]);

      const result = store.appendNew(TABLES.projectSizePerDay, [
        sizeOn("2024-01-01", 99),
        sizeOn("2024-01-02", 12),
        sizeOn("2024-01-02", 13),
      ]);

      expect(result).toEqual({ written: true, appended: 1, skipped: 2 });
      expect(store.readTable(TABLES.projectSizePerDay).map((row) => [row.date, row.code])).toEqual([
        ["2024-01-01", 10],
        ["2024-01-02", 12],
      ]);
    });

    it("keys bus factor rows by day and committer", () => {
      const row = {
        date: "2024-01-01",
        committerId: -1,
        deltaLines: -1,
        deltaCode: -1,
        deltaComments: -1,
        deltaBlanks: -1,
        deltaBytes: -1,
      };

      expect(store.appendNew(TABLES.busFactorPerDay, [row, { ...row, committerId: 1 }])).toEqual({
        written: true,
        appended: 2,
        skipped: 0,
      });
      expect(store.appendNew(TABLES.busFactorPerDay, [row])).toEqual({
        written: true,
        appended: 0,
        skipped: 1,
      });
    });
  });

  describe("insertRevisionBatch", () => {
    it("maps ordinals to generated keys", () => {
      expect(store.insertRevisionBatch(firstBatch)).toEqual({
        commitHashes: 2,
        authors: 1,
        committers: 1,
        commitLogs: 2,
        releases: 1,
      });

      expect(store.readTable(TABLES.commitLogs)).toEqual([
        {
          id: 1,
          commitHashId: 1,
          authorId: 1,
          committerId: 1,
          coAuthorIds: [null],
          parentHashIds: [null],
          authoredAt: "2024-01-01T10:00:00.000Z",
          committedAt: "2024-01-01T10:00:00.000Z",
          message: "first",
          encoding: "UTF-8",
          signature: "N",
        },
        {
          id: 2,
          commitHashId: 2,
          authorId: 1,
          committerId: 1,
          coAuthorIds: [null],
          parentHashIds: [1],
          authoredAt: "2024-01-02T10:00:00.000Z",
          committedAt: "2024-01-02T11:00:00.000Z",
          message: "second",
          encoding: "UTF-8",
          signature: "G",
        },
      ]);
      expect(store.readTable(TABLES.releases)).toEqual([{ id: 1, commitHashId: 2, tag: "v1" }]);
    });

    it("adds nothing when the same batch is inserted again", () => {
      store.insertRevisionBatch(firstBatch);

      expect(store.insertRevisionBatch(firstBatch)).toEqual({
        commitHashes: 0,
        authors: 0,
        committers: 0,
        commitLogs: 0,
        releases: 0,
      });
      expect(store.readTable(TABLES.commitLogs)).toHaveLength(2);
    });

    it("resolves references to rows stored by earlier runs", () => {
      store.insertRevisionBatch(firstBatch);

      expect(store.insertRevisionBatch(secondBatch)).toEqual({
        commitHashes: 1,
        authors: 1,
        committers: 0,
        commitLogs: 1,
        releases: 0,
      });

      const [, , third] = store.readTable(TABLES.commitLogs);
      expect(third).toMatchObject({
        commitHashId: 3,
        authorId: 2,
        committerId: 1,
        coAuthorIds: [1],
        parentHashIds: [2],
      });
      expect(store.readTable(TABLES.committers)).toEqual([
        { id: 1, committer: "Bob", committerEmail: "bob@example.com" },
      ]);
      expect([...store.storedCommitHashes()]).toEqual(["h1", "h2", "h3"]);
    });
  });

  describe("insertTrackerBatch", () => {
    it("stores ids and items per tracker kind and skips known ids", () => {
      const batch = {
        kind: "issues" as const,
        itemIds: ["I_1", "I_2"],
        items: [
          { itemIdIndex: 0, createdAt: "2024-01-01T09:00:00Z", closedAt: null },
          { itemIdIndex: 1, createdAt: "2024-01-02T09:00:00Z", closedAt: "2024-01-04T09:00:00Z" },
        ],
        closures: [],
        skippedItems: 0,
      };

      expect(store.insertTrackerBatch(batch)).toEqual({ kind: "issues", itemIds: 2, items: 2, closed: 0 });
      expect(store.insertTrackerBatch(batch)).toEqual({ kind: "issues", itemIds: 0, items: 0, closed: 0 });
      expect(store.readTable(TABLES.issues)).toEqual([
        { id: 1, itemIdKey: 1, createdAt: "2024-01-01T09:00:00Z", closedAt: null },
        { id: 2, itemIdKey: 2, createdAt: "2024-01-02T09:00:00Z", closedAt: "2024-01-04T09:00:00Z" },
      ]);
      expect([...store.storedTrackerItemIds("issues")]).toEqual(["I_1", "I_2"]);
      expect(store.storedTrackerItemIds("pull_requests").size).toBe(0);
    });

    it("closes a stored open item once and keeps the first close time", () => {
      store.insertTrackerBatch({
        kind: "pull_requests",
        itemIds: ["PR_1"],
        items: [{ itemIdIndex: 0, createdAt: "2024-01-01T09:00:00Z", closedAt: null }],
        closures: [],
        skippedItems: 0,
      });
      const closing = {
        kind: "pull_requests" as const,
        itemIds: [],
        items: [],
        skippedItems: 1,
      };

      expect(
        store.insertTrackerBatch({ ...closing, closures: [{ itemId: "PR_1", closedAt: "2024-01-02T00:00:00Z" }] }),
      ).toEqual({ kind: "pull_requests", itemIds: 0, items: 0, closed: 1 });
      expect(
        store.insertTrackerBatch({ ...closing, closures: [{ itemId: "PR_1", closedAt: "2024-01-05T00:00:00Z" }] }),
      ).toEqual({ kind: "pull_requests", itemIds: 0, items: 0, closed: 0 });
      expect(store.readTable(TABLES.pullRequests)).toEqual([
        { id: 1, itemIdKey: 1, createdAt: "2024-01-01T09:00:00Z", closedAt: "2024-01-02T00:00:00Z" },
      ]);
    });

    it("rejects a closure with a malformed close time", () => {
      store.insertTrackerBatch({
        kind: "issues",
        itemIds: ["I_1"],
        items: [{ itemIdIndex: 0, createdAt: "2024-01-01T09:00:00Z", closedAt: null }],
        closures: [],
        skippedItems: 0,
      });

      expect(() =>
        store.insertTrackerBatch({
          kind: "issues",
          itemIds: [],
          items: [],
          closures: [{ itemId: "I_1", closedAt: "yesterday" }],
          skippedItems: 1,
        }),
      ).toThrow(RowValidationError);
      expect(store.readTable(TABLES.issues)[0]?.closedAt).toBeNull();
    });
  });

  describe("query", () => {
    it("runs parameterized SQL", () => {
      store.insertRevisionBatch(firstBatch);

      expect(store.query("SELECT commit_hash FROM commit_hashes WHERE id = ?", [2])).toEqual([
        { commit_hash: "h2" },
      ]);
    });
  });
});
