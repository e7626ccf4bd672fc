import type {
  AuthorRecord,
  BusFactorRecord,
  CommitHashRecord,
  CommitLogRecord,
  CommitterRecord,
  FileSizeRecord,
  IssueDensityRecord,
  IssueSpoilageRecord,
  ProjectProductivityPerCommitRecord,
  ProjectProductivityPerDayRecord,
  ProjectSizePerCommitRecord,
  ProjectSizePerDayRecord,
  ReleaseRecord,
  TrackerItemIdRecord,
  TrackerItemRecord,
  TrackerKind,
} from "@repometrics/core";
import { z } from "zod";
import { column, createTableSql, defineTable, type TableDefinition } from "./table-definition.js";

const key = z.number().int().positive();
const count = z.number().int().nonnegative();
const delta = z.number().int();
const utcDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
const timestamp = z.string().datetime({ offset: true });
const nonEmpty = z.string().min(1);

const sizeShape = {
  lines: count,
  code: count,
  comments: count,
  blanks: count,
  bytes: count,
};

const deltaShape = {
  deltaLines: delta,
  deltaCode: delta,
  deltaComments: delta,
  deltaBlanks: delta,
  deltaBytes: delta,
};

const sizeColumns = <Row extends Record<"lines" | "code" | "comments" | "blanks" | "bytes", unknown>>() => [
  column<Row>("lines", "INTEGER"),
  column<Row>("code", "INTEGER"),
  column<Row>("comments", "INTEGER"),
  column<Row>("blanks", "INTEGER"),
  column<Row>("bytes", "INTEGER"),
];

const deltaColumns = <
  Row extends Record<"deltaLines" | "deltaCode" | "deltaComments" | "deltaBlanks" | "deltaBytes", unknown>,
>() => [
  column<Row>("deltaLines", "INTEGER"),
  column<Row>("deltaCode", "INTEGER"),
  column<Row>("deltaComments", "INTEGER"),
  column<Row>("deltaBlanks", "INTEGER"),
  column<Row>("deltaBytes", "INTEGER"),
];

const commitHashes = defineTable<CommitHashRecord>({
  name: "commit_hashes",
  schema: z.object({ commitHash: nonEmpty }),
  columns: [column("commitHash", "TEXT")],
  naturalKey: ["commitHash"],
});

const authors = defineTable<AuthorRecord>({
  name: "authors",
  schema: z.object({ author: z.string(), authorEmail: z.string() }),
  columns: [column("author", "TEXT"), column("authorEmail", "TEXT")],
  naturalKey: ["authorEmail"],
});

const committers = defineTable<CommitterRecord>({
  name: "committers",
  schema: z.object({ committer: z.string(), committerEmail: z.string() }),
  columns: [column("committer", "TEXT"), column("committerEmail", "TEXT")],
  naturalKey: ["committerEmail"],
});

const commitLogs = defineTable<CommitLogRecord>({
  name: "commit_logs",
  schema: z.object({
    commitHashId: key,
    authorId: key,
    committerId: key,
    // never empty: a commit without co-authors or parents stores [null]
    coAuthorIds: z.array(key.nullable()).min(1),
    parentHashIds: z.array(key.nullable()).min(1),
    authoredAt: timestamp,
    committedAt: timestamp,
    message: z.string(),
    encoding: nonEmpty,
    signature: z.string(),
  }),
  columns: [
    column("commitHashId", "INTEGER", { references: "commit_hashes" }),
    column("authorId", "INTEGER", { references: "authors" }),
    column("committerId", "INTEGER", { references: "committers" }),
    column("coAuthorIds", "TEXT", { json: true }),
    column("parentHashIds", "TEXT", { json: true }),
    column("authoredAt", "TEXT"),
    column("committedAt", "TEXT"),
    column("message", "TEXT"),
    column("encoding", "TEXT"),
    column("signature", "TEXT"),
  ],
  naturalKey: ["commitHashId"],
});

const releases = defineTable<ReleaseRecord>({
  name: "releases",
  schema: z.object({ commitHashId: key, tag: nonEmpty }),
  columns: [
    column("commitHashId", "INTEGER", { references: "commit_hashes" }),
    column("tag", "TEXT"),
  ],
  naturalKey: ["tag"],
});

const fileSizes = defineTable<FileSizeRecord>({
  name: "file_sizes",
  schema: z.object({ commitHashId: key, language: z.string(), path: nonEmpty, ...sizeShape }),
  columns: [
    column("commitHashId", "INTEGER", { references: "commit_hashes" }),
    column("language", "TEXT"),
    column("path", "TEXT"),
    ...sizeColumns<FileSizeRecord>(),
  ],
  naturalKey: ["commitHashId", "path"],
});

const projectSizePerCommit = defineTable<ProjectSizePerCommitRecord>({
  name: "project_size_per_commit",
  schema: z.object({ commitHashId: key, ...sizeShape }),
  columns: [
    column("commitHashId", "INTEGER", { references: "commit_hashes" }),
    ...sizeColumns<ProjectSizePerCommitRecord>(),
  ],
  naturalKey: ["commitHashId"],
});

const projectSizePerDay = defineTable<ProjectSizePerDayRecord>({
  name: "project_size_per_day",
  schema: z.object({ date: utcDay, ...sizeShape }),
  columns: [column("date", "TEXT"), ...sizeColumns<ProjectSizePerDayRecord>()],
  naturalKey: ["date"],
});

const projectProductivityPerCommit = defineTable<ProjectProductivityPerCommitRecord>({
  name: "project_productivity_per_commit",
  schema: z.object({ commitHashId: key, ...deltaShape }),
  columns: [
    column("commitHashId", "INTEGER", { references: "commit_hashes" }),
    ...deltaColumns<ProjectProductivityPerCommitRecord>(),
  ],
  naturalKey: ["commitHashId"],
});

const projectProductivityPerDay = defineTable<ProjectProductivityPerDayRecord>({
  name: "project_productivity_per_day",
  schema: z.object({ date: utcDay, ...deltaShape }),
  columns: [column("date", "TEXT"), ...deltaColumns<ProjectProductivityPerDayRecord>()],
  naturalKey: ["date"],
});

// committer_id is -1 on sentinel rows, so it carries no foreign key
const busFactorPerDay = defineTable<BusFactorRecord>({
  name: "bus_factor_per_day",
  schema: z.object({ date: utcDay, committerId: z.number().int(), ...deltaShape }),
  columns: [
    column("date", "TEXT"),
    column("committerId", "INTEGER"),
    ...deltaColumns<BusFactorRecord>(),
  ],
  naturalKey: ["date", "committerId"],
});

const trackerIdTable = (name: string): TableDefinition<TrackerItemIdRecord> =>
  defineTable<TrackerItemIdRecord>({
    name,
    schema: z.object({ itemId: nonEmpty }),
    columns: [column("itemId", "TEXT")],
    naturalKey: ["itemId"],
  });

const trackerItemTable = (name: string, idTable: string): TableDefinition<TrackerItemRecord> =>
  defineTable<TrackerItemRecord>({
    name,
    schema: z.object({ itemIdKey: key, createdAt: timestamp, closedAt: timestamp.nullable() }),
    columns: [
      column("itemIdKey", "INTEGER", { references: idTable }),
      column("createdAt", "TEXT"),
      column("closedAt", "TEXT", { nullable: true }),
    ],
    naturalKey: ["itemIdKey"],
  });

const issueSpoilagePerDay = defineTable<IssueSpoilageRecord>({
  name: "issue_spoilage_per_day",
  schema: z.object({ start: timestamp, end: timestamp, openIssues: count }),
  columns: [column("start", "TEXT"), column("end", "TEXT"), column("openIssues", "INTEGER")],
  naturalKey: ["start"],
});

const nullableCount = count.nullable();

const issueDensityPerDay = defineTable<IssueDensityRecord>({
  name: "issue_density_per_day",
  schema: z.object({
    date: utcDay,
    openIssues: count,
    lines: nullableCount,
    code: nullableCount,
    comments: nullableCount,
    blanks: nullableCount,
    bytes: nullableCount,
  }),
  columns: [
    column("date", "TEXT"),
    column("openIssues", "INTEGER"),
    column("lines", "INTEGER", { nullable: true }),
    column("code", "INTEGER", { nullable: true }),
    column("comments", "INTEGER", { nullable: true }),
    column("blanks", "INTEGER", { nullable: true }),
    column("bytes", "INTEGER", { nullable: true }),
  ],
  naturalKey: ["date"],
});

export const TABLES = {
  commitHashes,
  authors,
  committers,
  commitLogs,
  releases,
  fileSizes,
  projectSizePerCommit,
  projectSizePerDay,
  projectProductivityPerCommit,
  projectProductivityPerDay,
  busFactorPerDay,
  issueIds: trackerIdTable("issue_ids"),
  issues: trackerItemTable("issues", "issue_ids"),
  pullRequestIds: trackerIdTable("pull_request_ids"),
  pullRequests: trackerItemTable("pull_requests", "pull_request_ids"),
  issueSpoilagePerDay,
  issueDensityPerDay,
} as const;

export type TrackerTables = {
  ids: TableDefinition<TrackerItemIdRecord>;
  items: TableDefinition<TrackerItemRecord>;
};

export const TRACKER_TABLES: Record<TrackerKind, TrackerTables> = {
  issues: { ids: TABLES.issueIds, items: TABLES.issues },
  pull_requests: { ids: TABLES.pullRequestIds, items: TABLES.pullRequests },
};

/** Creation order; referenced tables come first. */
export const SCHEMA_SQL: readonly string[] = [
  createTableSql(TABLES.commitHashes),
  createTableSql(TABLES.authors),
  createTableSql(TABLES.committers),
  createTableSql(TABLES.commitLogs),
  createTableSql(TABLES.releases),
  createTableSql(TABLES.fileSizes),
  createTableSql(TABLES.projectSizePerCommit),
  createTableSql(TABLES.projectSizePerDay),
  createTableSql(TABLES.projectProductivityPerCommit),
  createTableSql(TABLES.projectProductivityPerDay),
  createTableSql(TABLES.busFactorPerDay),
  createTableSql(TABLES.issueIds),
  createTableSql(TABLES.issues),
  createTableSql(TABLES.pullRequestIds),
  createTableSql(TABLES.pullRequests),
  createTableSql(TABLES.issueSpoilagePerDay),
  createTableSql(TABLES.issueDensityPerDay),
];
