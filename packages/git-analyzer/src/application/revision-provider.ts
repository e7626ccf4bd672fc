import type { RawRevision, TagTarget } from "../domain/revision-types.js";
import type { ParseGitLogProgressEvent } from "../parsing/git-log-parser.js";

export type RevisionHistoryProgressEvent =
  | { stage: "git_log_received"; bytes: number }
  | { stage: "git_log_parsed"; revisions: number }
  | { stage: "git_log_parse_progress"; parsedRecords: number; totalRecords: number };

export interface RevisionProvider {
  readonly repositoryPath: string;
  isGitRepository(): boolean;
  revisions(onProgress?: (event: RevisionHistoryProgressEvent) => void): readonly RawRevision[];
  tagTargets(): readonly TagTarget[];
  checkout(commitHash: string): void;
  checkoutLatest(): void;
}

export const mapParseProgressToHistoryProgress = (
  event: ParseGitLogProgressEvent,
): RevisionHistoryProgressEvent => ({
  stage: "git_log_parse_progress",
  parsedRecords: event.parsedRecords,
  totalRecords: event.totalRecords,
});
