import type { NormalizedRevisionBatch } from "@repometrics/core";
import { normalizeRevisions } from "../domain/revision-normalizer.js";
import type { RevisionHistoryProgressEvent, RevisionProvider } from "./revision-provider.js";

export type IngestRevisionsInput = {
  previousCommitHashes: ReadonlySet<string>;
};

export type RevisionIngestionProgressEvent =
  | { stage: "checking_git_repository" }
  | { stage: "not_git_repository" }
  | { stage: "loading_revisions" }
  | { stage: "loading_tags" }
  | { stage: "normalizing_revisions"; revisions: number }
  | {
      stage: "revisions_normalized";
      commits: number;
      skippedRevisions: number;
      droppedTags: number;
    }
  | { stage: "history"; event: RevisionHistoryProgressEvent };

export type RevisionIngestionResult =
  | { available: true; batch: NormalizedRevisionBatch }
  | { available: false; reason: "not_git_repository" };

export const ingestRevisions = (
  input: IngestRevisionsInput,
  provider: RevisionProvider,
  onProgress?: (event: RevisionIngestionProgressEvent) => void,
): RevisionIngestionResult => {
  onProgress?.({ stage: "checking_git_repository" });
  if (!provider.isGitRepository()) {
    onProgress?.({ stage: "not_git_repository" });
    return { available: false, reason: "not_git_repository" };
  }

  onProgress?.({ stage: "loading_revisions" });
  const revisions = provider.revisions((event) => onProgress?.({ stage: "history", event }));

  onProgress?.({ stage: "loading_tags" });
  const tagTargets = provider.tagTargets();

  onProgress?.({ stage: "normalizing_revisions", revisions: revisions.length });
  const batch = normalizeRevisions({
    revisions,
    previousCommitHashes: input.previousCommitHashes,
    tagTargets,
  });
  onProgress?.({
    stage: "revisions_normalized",
    commits: batch.commitHashes.length,
    skippedRevisions: batch.skippedRevisions,
    droppedTags: batch.droppedTags.length,
  });

  return { available: true, batch };
};
