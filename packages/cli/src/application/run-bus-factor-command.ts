import { computeBusFactorPerDay, toUtcDay, type CommitActivity } from "@repometrics/metrics-engine";
import { TABLES } from "@repometrics/metrics-store";
import { appendRows } from "./append-rows.js";
import type { AppendSummary, StageContext, StageResult } from "./stage-result.js";

export type BusFactorSummary = {
  days: number;
  unattributedDays: number;
  busFactorPerDay: AppendSummary;
};

export const runBusFactorCommand = (context: StageContext): StageResult<BusFactorSummary> => {
  const { logger, store } = context;
  const productivity = store.readTable(TABLES.projectProductivityPerCommit);
  if (productivity.length === 0) {
    return { status: "unavailable", stage: "bus-factor", reason: "no_productivity" };
  }

  const attributable = new Set(
    store
      .readTable(TABLES.committers)
      .filter((committer) => committer.committerEmail.trim().length > 0)
      .map((committer) => committer.id),
  );
  const logsByCommit = new Map(store.readTable(TABLES.commitLogs).map((log) => [log.commitHashId, log]));

  const activity: CommitActivity[] = [];
  for (const commit of productivity) {
    const log = logsByCommit.get(commit.commitHashId);
    if (log === undefined) {
      logger.debug(`bus-factor: commit key ${commit.commitHashId} has no commit log`);
      continue;
    }

    activity.push({
      date: toUtcDay(log.committedAt),
      committerId: attributable.has(log.committerId) ? log.committerId : null,
      deltaLines: commit.deltaLines,
      deltaCode: commit.deltaCode,
      deltaComments: commit.deltaComments,
      deltaBlanks: commit.deltaBlanks,
      deltaBytes: commit.deltaBytes,
    });
  }

  const rows = computeBusFactorPerDay(activity);
  const days = new Set(rows.map((row) => row.date));
  const unattributedDays = rows.filter((row) => row.committerId < 0).length;
  if (unattributedDays > 0) {
    logger.warn(`bus-factor: ${unattributedDays} days have no attributable committer`);
  }

  const busFactorPerDay = appendRows(context, TABLES.busFactorPerDay, rows);
  if (!busFactorPerDay.ok) {
    return { status: "write_failed", stage: "bus-factor", table: busFactorPerDay.table };
  }

  return {
    status: "completed",
    stage: "bus-factor",
    summary: { days: days.size, unattributedDays, busFactorPerDay: busFactorPerDay.summary },
  };
};
