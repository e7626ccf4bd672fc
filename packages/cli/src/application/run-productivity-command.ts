import { computeProductivityPerCommit, computeProductivityPerDay } from "@repometrics/metrics-engine";
import { TABLES } from "@repometrics/metrics-store";
import { appendRows } from "./append-rows.js";
import type { AppendSummary, StageContext, StageResult } from "./stage-result.js";

export type ProductivitySummary = {
  projectProductivityPerCommit: AppendSummary;
  projectProductivityPerDay: AppendSummary;
};

export const runProductivityCommand = (context: StageContext): StageResult<ProductivitySummary> => {
  const { logger, store } = context;
  const perCommitSizes = store.readTable(TABLES.projectSizePerCommit);
  const perDaySizes = store.readTable(TABLES.projectSizePerDay);
  if (perCommitSizes.length === 0 || perDaySizes.length === 0) {
    return { status: "unavailable", stage: "productivity", reason: "no_sizes" };
  }

  logger.info(`productivity: differencing ${perCommitSizes.length} commits and ${perDaySizes.length} days`);
  const perCommit = appendRows(
    context,
    TABLES.projectProductivityPerCommit,
    computeProductivityPerCommit(perCommitSizes),
  );
  if (!perCommit.ok) {
    return { status: "write_failed", stage: "productivity", table: perCommit.table };
  }

  const perDay = appendRows(context, TABLES.projectProductivityPerDay, computeProductivityPerDay(perDaySizes));
  if (!perDay.ok) {
    return { status: "write_failed", stage: "productivity", table: perDay.table };
  }

  return {
    status: "completed",
    stage: "productivity",
    summary: {
      projectProductivityPerCommit: perCommit.summary,
      projectProductivityPerDay: perDay.summary,
    },
  };
};
