import type { CommitLogRecord, Stored, UtcDay } from "@repometrics/core";
import { minDay, toUtcDay } from "@repometrics/metrics-engine";

/** Committed day of every stored commit, keyed by commit hash key. */
export const commitDaysByKey = (
  commitLogs: readonly Stored<CommitLogRecord>[],
): ReadonlyMap<number, UtcDay> =>
  new Map(commitLogs.map((log) => [log.commitHashId, toUtcDay(log.committedAt)]));

export const firstCommitDay = (commitLogs: readonly Stored<CommitLogRecord>[]): UtcDay | null =>
  minDay(commitDaysByKey(commitLogs).values());
