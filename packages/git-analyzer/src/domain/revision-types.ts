export type CoAuthor = {
  name: string;
  email: string;
};

export type RawRevision = {
  hash: string;
  author: string;
  authorEmail: string;
  authoredAtUnix: number;
  committer: string;
  committerEmail: string;
  committedAtUnix: number;
  message: string;
  encoding: string;
  signature: string;
  parentHashes: readonly string[];
  coAuthors: readonly CoAuthor[];
};

export type TagTarget = {
  tag: string;
  commitHash: string | null;
};
