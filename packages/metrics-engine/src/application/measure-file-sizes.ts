import type { CommitHashRecord, FileSizeRecord, Stored } from "@repometrics/core";
import type { LineCounter, RevisionCheckout } from "./line-counter.js";

export type MeasureFileSizesInput = {
  /** In insertion order. */
  commits: readonly Stored<CommitHashRecord>[];
  /** Commits that already have file size rows. */
  measuredCommitIds: ReadonlySet<number>;
};

export type FileSizeMeasurement = {
  files: readonly FileSizeRecord[];
  /** Every commit measured in this run, also those where nothing was counted. */
  measuredCommitIds: readonly number[];
};

export type FileSizeProgressEvent =
  | { stage: "commits_selected"; pending: number; skipped: number }
  | { stage: "commit_measured"; commitHash: string; files: number; measured: number; total: number }
  | { stage: "checkout_restored" };

/**
 * Checks out each pending commit in turn and measures its tree. The working tree is put back on
 * its latest revision afterwards, also when a checkout or measurement fails.
 */
export const measureFileSizes = (
  input: MeasureFileSizesInput,
  checkout: RevisionCheckout,
  lineCounter: LineCounter,
  onProgress?: (event: FileSizeProgressEvent) => void,
): FileSizeMeasurement => {
  const pending = input.commits.filter((commit) => !input.measuredCommitIds.has(commit.id));
  onProgress?.({
    stage: "commits_selected",
    pending: pending.length,
    skipped: input.commits.length - pending.length,
  });
  if (pending.length === 0) {
    return { files: [], measuredCommitIds: [] };
  }

  const rows: FileSizeRecord[] = [];
  const measuredCommitIds: number[] = [];
  try {
    pending.forEach((commit, index) => {
      checkout.checkout(commit.commitHash);
      const files = lineCounter.measure(checkout.repositoryPath);
      for (const file of files) {
        rows.push({
          commitHashId: commit.id,
          language: file.language,
          path: file.path,
          lines: file.lines,
          code: file.code,
          comments: file.comments,
          blanks: file.blanks,
          bytes: file.bytes,
        });
      }

      measuredCommitIds.push(commit.id);
      onProgress?.({
        stage: "commit_measured",
        commitHash: commit.commitHash,
        files: files.length,
        measured: index + 1,
        total: pending.length,
      });
    });
  } finally {
    checkout.checkoutLatest();
    onProgress?.({ stage: "checkout_restored" });
  }

  return { files: rows, measuredCommitIds };
};
