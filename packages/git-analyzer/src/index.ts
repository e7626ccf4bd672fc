import {
  ingestRevisions,
  type IngestRevisionsInput,
  type RevisionIngestionProgressEvent,
  type RevisionIngestionResult,
} from "./application/ingest-revisions.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliRevisionProvider } from "./infrastructure/git-revision-provider.js";

export type {
  IngestRevisionsInput,
  RevisionIngestionProgressEvent,
  RevisionIngestionResult,
} from "./application/ingest-revisions.js";
export type {
  RevisionHistoryProgressEvent,
  RevisionProvider,
} from "./application/revision-provider.js";
export type { CoAuthor, RawRevision, TagTarget } from "./domain/revision-types.js";
export { ingestRevisions } from "./application/ingest-revisions.js";
export { normalizeRevisions, toIsoTimestamp } from "./domain/revision-normalizer.js";
export { parseGitLog } from "./parsing/git-log-parser.js";
export { parseTagRefs } from "./parsing/tag-ref-parser.js";
export { GitCommandError, ExecGitCommandClient } from "./infrastructure/git-command-client.js";
export { GitCliRevisionProvider } from "./infrastructure/git-revision-provider.js";

export const createGitRevisionProvider = (repositoryPath: string): GitCliRevisionProvider =>
  new GitCliRevisionProvider(repositoryPath, new ExecGitCommandClient());

export const ingestRevisionsFromGit = (
  repositoryPath: string,
  input: IngestRevisionsInput,
  onProgress?: (event: RevisionIngestionProgressEvent) => void,
): RevisionIngestionResult =>
  ingestRevisions(input, createGitRevisionProvider(repositoryPath), onProgress);
