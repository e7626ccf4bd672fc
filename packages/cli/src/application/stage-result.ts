import type { MetricsStore } from "@repometrics/metrics-store";
import type { Logger } from "./logger.js";

export type StageName =
  | "vcs"
  | "size"
  | "productivity"
  | "bus-factor"
  | "issues"
  | "pull-requests"
  | "issue-spoilage"
  | "issue-density";

export type UnavailableReason =
  | "not_git_repository"
  | "no_commits"
  | "no_sizes"
  | "no_productivity"
  | "no_issue_spoilage"
  | "missing_token";

export type StageResult<Summary> =
  | { status: "completed"; stage: StageName; summary: Summary }
  | { status: "unavailable"; stage: StageName; reason: UnavailableReason }
  | { status: "write_failed"; stage: StageName; table: string };

export type StageContext = {
  store: MetricsStore;
  logger: Logger;
  now: Date;
};

/** Rows a derived table gained and the rows already stored under the same key. */
export type AppendSummary = {
  appended: number;
  skipped: number;
};

export const exitCodeFor = (result: StageResult<unknown>): number =>
  result.status === "completed" ? 0 : 1;
