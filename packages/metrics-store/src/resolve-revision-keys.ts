import type { CommitLogRecord, NormalizedRevisionBatch, ReleaseRecord } from "@repometrics/core";

/** Store keys of the batch tables, indexed by the batch's ordinals. */
export type RevisionKeys = {
  commitHashKeys: readonly number[];
  authorKeys: readonly number[];
  committerKeys: readonly number[];
};

/** Resolves references the batch could not resolve against rows stored by earlier runs. */
export type StoredReferenceLookup = {
  authorIdByEmail(email: string): number | null;
  commitHashIdByHash(hash: string): number | null;
};

export type ResolvedRevisionRows = {
  commitLogs: readonly CommitLogRecord[];
  releases: readonly ReleaseRecord[];
};

const keyAt = (keys: readonly number[], index: number, table: string): number => {
  const value = keys[index];
  if (value === undefined) {
    throw new Error(`no ${table} key for ordinal ${index}`);
  }

  return value;
};

/**
 * Maps the ordinal references of a normalized batch to the keys the store generated for it.
 * Commit logs of commits listed in `storedCommitIndices` are left out: their rows already exist.
 */
export const resolveRevisionKeys = (
  batch: NormalizedRevisionBatch,
  keys: RevisionKeys,
  lookup: StoredReferenceLookup,
  storedCommitIndices: ReadonlySet<number> = new Set(),
): ResolvedRevisionRows => {
  const commitLogs = batch.commitLogs
    .filter((log) => !storedCommitIndices.has(log.commitHashIndex))
    .map((log): CommitLogRecord => ({
      commitHashId: keyAt(keys.commitHashKeys, log.commitHashIndex, "commit hash"),
      authorId: keyAt(keys.authorKeys, log.authorIndex, "author"),
      committerId: keyAt(keys.committerKeys, log.committerIndex, "committer"),
      coAuthorIds: log.coAuthorIndices.map((index, position) => {
        if (index !== null) {
          return keyAt(keys.authorKeys, index, "author");
        }

        const email = log.coAuthorEmails[position];
        return email === undefined || email === null ? null : lookup.authorIdByEmail(email);
      }),
      parentHashIds: log.parentHashIndices.map((index, position) => {
        if (index !== null) {
          return keyAt(keys.commitHashKeys, index, "commit hash");
        }

        const hash = log.parentHashes[position];
        return hash === undefined || hash === null ? null : lookup.commitHashIdByHash(hash);
      }),
      authoredAt: log.authoredAt,
      committedAt: log.committedAt,
      message: log.message,
      encoding: log.encoding,
      signature: log.signature,
    }));

  const releases = batch.releases.map(
    (release): ReleaseRecord => ({
      commitHashId: keyAt(keys.commitHashKeys, release.commitHashIndex, "commit hash"),
      tag: release.tag,
    }),
  );

  return { commitLogs, releases };
};
