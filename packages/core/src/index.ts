import { resolve } from "node:path";

/** UTC calendar day, `YYYY-MM-DD`. */
export type UtcDay = string;

export type CommitHashRecord = {
  commitHash: string;
};

export type AuthorRecord = {
  author: string;
  authorEmail: string;
};

export type CommitterRecord = {
  committer: string;
  committerEmail: string;
};

export type CommitLogRecord = {
  commitHashId: number;
  authorId: number;
  committerId: number;
  coAuthorIds: readonly (number | null)[];
  parentHashIds: readonly (number | null)[];
  authoredAt: string;
  committedAt: string;
  message: string;
  encoding: string;
  signature: string;
};

export type ReleaseRecord = {
  commitHashId: number;
  tag: string;
};

export type NormalizedCommitLog = {
  commitHashIndex: number;
  authorIndex: number;
  committerIndex: number;
  coAuthorIndices: readonly (number | null)[];
  coAuthorEmails: readonly (string | null)[];
  parentHashIndices: readonly (number | null)[];
  parentHashes: readonly (string | null)[];
  authoredAt: string;
  committedAt: string;
  message: string;
  encoding: string;
  signature: string;
};

export type NormalizedRelease = {
  tag: string;
  commitHashIndex: number;
};

export type NormalizedRevisionBatch = {
  commitHashes: readonly string[];
  authors: readonly AuthorRecord[];
  committers: readonly CommitterRecord[];
  commitLogs: readonly NormalizedCommitLog[];
  releases: readonly NormalizedRelease[];
  droppedTags: readonly string[];
  skippedRevisions: number;
};

export const SIZE_FIELDS = ["lines", "code", "comments", "blanks", "bytes"] as const;

export type SizeField = (typeof SIZE_FIELDS)[number];

export type SizeMetrics = Record<SizeField, number>;

export const DELTA_FIELDS = [
  "deltaLines",
  "deltaCode",
  "deltaComments",
  "deltaBlanks",
  "deltaBytes",
] as const;

export type DeltaField = (typeof DELTA_FIELDS)[number];

export type DeltaMetrics = Record<DeltaField, number>;

export type FileSizeRecord = SizeMetrics & {
  commitHashId: number;
  language: string;
  path: string;
};

export type ProjectSizePerCommitRecord = SizeMetrics & {
  commitHashId: number;
};

export type ProjectSizePerDayRecord = SizeMetrics & {
  date: UtcDay;
};

export type ProjectProductivityPerCommitRecord = DeltaMetrics & {
  commitHashId: number;
};

export type ProjectProductivityPerDayRecord = DeltaMetrics & {
  date: UtcDay;
};

export type BusFactorRecord = DeltaMetrics & {
  date: UtcDay;
  committerId: number;
};

export type TrackerKind = "issues" | "pull_requests";

export type TrackerItemIdRecord = {
  itemId: string;
};

export type TrackerItemRecord = {
  itemIdKey: number;
  createdAt: string;
  closedAt: string | null;
};

export type NormalizedTrackerItem = {
  itemIdIndex: number;
  createdAt: string;
  closedAt: string | null;
};

/** A close time reported for an item that is already stored. */
export type TrackerItemClosure = {
  itemId: string;
  closedAt: string;
};

export type NormalizedTrackerBatch = {
  kind: TrackerKind;
  itemIds: readonly string[];
  items: readonly NormalizedTrackerItem[];
  closures: readonly TrackerItemClosure[];
  skippedItems: number;
};

export type IssueRecord = {
  issueId: number;
  createdDay: UtcDay;
  closedDay: UtcDay | null;
};

export type IssueSpoilageRecord = {
  start: string;
  end: string;
  openIssues: number;
};

export type IssueDensityRecord = {
  date: UtcDay;
  openIssues: number;
  lines: number | null;
  code: number | null;
  comments: number | null;
  blanks: number | null;
  bytes: number | null;
};

export type Stored<T> = T & { id: number };

export const BUS_FACTOR_SENTINEL = -1;

export type TargetPath = {
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string = process.cwd()): TargetPath => ({
  absolutePath: resolve(cwd, inputPath ?? "."),
});
