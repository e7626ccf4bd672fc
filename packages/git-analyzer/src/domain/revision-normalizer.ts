import type {
  AuthorRecord,
  CommitterRecord,
  NormalizedCommitLog,
  NormalizedRelease,
  NormalizedRevisionBatch,
} from "@repometrics/core";
import type { RawRevision, TagTarget } from "./revision-types.js";

export type NormalizeRevisionsInput = {
  revisions: readonly RawRevision[];
  previousCommitHashes: ReadonlySet<string>;
  tagTargets: readonly TagTarget[];
};

type OrderedTable<T> = {
  rows: T[];
  indexByKey: Map<string, number>;
};

const createOrderedTable = <T>(): OrderedTable<T> => ({
  rows: [],
  indexByKey: new Map<string, number>(),
});

// first row seen for a key wins
const insertFirstSeen = <T>(table: OrderedTable<T>, key: string, row: T): void => {
  if (table.indexByKey.has(key)) {
    return;
  }

  table.indexByKey.set(key, table.rows.length);
  table.rows.push(row);
};

const withNullPlaceholder = <T>(values: readonly T[]): readonly (T | null)[] =>
  values.length === 0 ? [null] : values;

export const toIsoTimestamp = (unixSeconds: number): string =>
  new Date(unixSeconds * 1000).toISOString();

const selectNewRevisions = (
  revisions: readonly RawRevision[],
  previousCommitHashes: ReadonlySet<string>,
): readonly RawRevision[] => {
  const seen = new Set<string>();
  const selected: RawRevision[] = [];

  for (const revision of revisions) {
    if (previousCommitHashes.has(revision.hash) || seen.has(revision.hash)) {
      continue;
    }

    seen.add(revision.hash);
    selected.push(revision);
  }

  return selected;
};

const resolveReleases = (
  tagTargets: readonly TagTarget[],
  commitHashIndex: ReadonlyMap<string, number>,
): { releases: readonly NormalizedRelease[]; droppedTags: readonly string[] } => {
  const releases: NormalizedRelease[] = [];
  const droppedTags: string[] = [];

  for (const target of tagTargets) {
    const index = target.commitHash === null ? undefined : commitHashIndex.get(target.commitHash);
    if (index === undefined) {
      droppedTags.push(target.tag);
      continue;
    }

    releases.push({ tag: target.tag, commitHashIndex: index });
  }

  return { releases, droppedTags };
};

/**
 * Splits raw revisions into commit hash, author, committer, commit log and release tables.
 *
 * References in the commit log and release rows are 0-based ordinals into the tables of the
 * returned batch. Co-authors and parents that are not part of the batch resolve to `null`;
 * their literal email/hash is kept alongside so a store can resolve them against rows from
 * earlier runs.
 */
export const normalizeRevisions = (input: NormalizeRevisionsInput): NormalizedRevisionBatch => {
  const revisions = selectNewRevisions(input.revisions, input.previousCommitHashes);

  const commitHashes = createOrderedTable<string>();
  const authors = createOrderedTable<AuthorRecord>();
  const committers = createOrderedTable<CommitterRecord>();

  for (const revision of revisions) {
    insertFirstSeen(commitHashes, revision.hash, revision.hash);
    insertFirstSeen(authors, revision.authorEmail, {
      author: revision.author,
      authorEmail: revision.authorEmail,
    });
    insertFirstSeen(committers, revision.committerEmail, {
      committer: revision.committer,
      committerEmail: revision.committerEmail,
    });
  }

  const commitLogs: NormalizedCommitLog[] = [];
  for (const revision of revisions) {
    const commitHashIndex = commitHashes.indexByKey.get(revision.hash);
    const authorIndex = authors.indexByKey.get(revision.authorEmail);
    const committerIndex = committers.indexByKey.get(revision.committerEmail);
    if (commitHashIndex === undefined || authorIndex === undefined || committerIndex === undefined) {
      continue;
    }

    const coAuthorEmails = revision.coAuthors.map((coAuthor) => coAuthor.email);

    commitLogs.push({
      commitHashIndex,
      authorIndex,
      committerIndex,
      coAuthorIndices: withNullPlaceholder(
        coAuthorEmails.map((email) => authors.indexByKey.get(email) ?? null),
      ),
      coAuthorEmails: withNullPlaceholder(coAuthorEmails),
      parentHashIndices: withNullPlaceholder(
        revision.parentHashes.map((parent) => commitHashes.indexByKey.get(parent) ?? null),
      ),
      parentHashes: withNullPlaceholder(revision.parentHashes),
      authoredAt: toIsoTimestamp(revision.authoredAtUnix),
      committedAt: toIsoTimestamp(revision.committedAtUnix),
      message: revision.message,
      encoding: revision.encoding,
      signature: revision.signature,
    });
  }

  const { releases, droppedTags } = resolveReleases(input.tagTargets, commitHashes.indexByKey);

  return {
    commitHashes: commitHashes.rows,
    authors: authors.rows,
    committers: committers.rows,
    commitLogs,
    releases,
    droppedTags,
    skippedRevisions: input.revisions.length - revisions.length,
  };
};
