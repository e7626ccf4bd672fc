import type { IssueRecord } from "@repometrics/core";
import {
  computeIssueSpoilagePerDay,
  createEffectiveMetricsConfig,
  toUtcDay,
  type MetricsEngineConfig,
} from "@repometrics/metrics-engine";
import { TABLES } from "@repometrics/metrics-store";
import { appendRows } from "./append-rows.js";
import { firstCommitDay } from "./commit-days.js";
import type { AppendSummary, StageContext, StageResult } from "./stage-result.js";

export type IssueSpoilageSummary = {
  issues: number;
  firstDay: string;
  issueSpoilagePerDay: AppendSummary;
};

export const runIssueSpoilageCommand = (
  context: StageContext,
  config?: Partial<MetricsEngineConfig>,
): StageResult<IssueSpoilageSummary> => {
  const { logger, store } = context;
  const { spoilageAlgorithm } = createEffectiveMetricsConfig(config);
  const firstDay = firstCommitDay(store.readTable(TABLES.commitLogs));
  if (firstDay === null) {
    return { status: "unavailable", stage: "issue-spoilage", reason: "no_commits" };
  }

  const issues: IssueRecord[] = store.readTable(TABLES.issues).map((issue) => ({
    issueId: issue.itemIdKey,
    createdDay: toUtcDay(issue.createdAt),
    closedDay: issue.closedAt === null ? null : toUtcDay(issue.closedAt),
  }));
  logger.info(`issue-spoilage: ${issues.length} issues from ${firstDay} (${spoilageAlgorithm})`);

  const rows = computeIssueSpoilagePerDay({
    issues,
    firstDay,
    now: context.now,
    algorithm: spoilageAlgorithm,
  });
  const issueSpoilagePerDay = appendRows(context, TABLES.issueSpoilagePerDay, rows);
  if (!issueSpoilagePerDay.ok) {
    return { status: "write_failed", stage: "issue-spoilage", table: issueSpoilagePerDay.table };
  }

  return {
    status: "completed",
    stage: "issue-spoilage",
    summary: { issues: issues.length, firstDay, issueSpoilagePerDay: issueSpoilagePerDay.summary },
  };
};
