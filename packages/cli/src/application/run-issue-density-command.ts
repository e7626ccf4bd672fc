import { computeIssueDensityPerDay } from "@repometrics/metrics-engine";
import { TABLES } from "@repometrics/metrics-store";
import { appendRows } from "./append-rows.js";
import type { AppendSummary, StageContext, StageResult } from "./stage-result.js";

export type IssueDensitySummary = {
  daysWithoutSize: number;
  issueDensityPerDay: AppendSummary;
};

export const runIssueDensityCommand = (context: StageContext): StageResult<IssueDensitySummary> => {
  const { logger, store } = context;
  const spoilage = store.readTable(TABLES.issueSpoilagePerDay);
  if (spoilage.length === 0) {
    return { status: "unavailable", stage: "issue-density", reason: "no_issue_spoilage" };
  }

  const rows = computeIssueDensityPerDay(spoilage, store.readTable(TABLES.projectSizePerDay));
  const daysWithoutSize = rows.filter((row) => row.lines === null).length;
  if (daysWithoutSize > 0) {
    logger.debug(`issue-density: ${daysWithoutSize} days precede the first measured size`);
  }

  const issueDensityPerDay = appendRows(context, TABLES.issueDensityPerDay, rows);
  if (!issueDensityPerDay.ok) {
    return { status: "write_failed", stage: "issue-density", table: issueDensityPerDay.table };
  }

  return {
    status: "completed",
    stage: "issue-density",
    summary: { daysWithoutSize, issueDensityPerDay: issueDensityPerDay.summary },
  };
};
