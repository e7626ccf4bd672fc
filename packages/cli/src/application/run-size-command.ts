import { SIZE_FIELDS, type ProjectSizePerDayRecord } from "@repometrics/core";
import {
  computeProjectSizePerCommit,
  computeProjectSizePerDay,
  measureFileSizes,
  type FileSizeProgressEvent,
  type LineCounter,
} from "@repometrics/metrics-engine";
import type { RevisionProvider } from "@repometrics/git-analyzer";
import { TABLES } from "@repometrics/metrics-store";
import { appendRows } from "./append-rows.js";
import { commitDaysByKey } from "./commit-days.js";
import type { Logger } from "./logger.js";
import type { AppendSummary, StageContext, StageResult } from "./stage-result.js";

export type SizeSummary = {
  measuredCommits: number;
  fileSizes: AppendSummary;
  projectSizePerCommit: AppendSummary;
  projectSizePerDay: AppendSummary;
};

const createSizeProgressReporter = (logger: Logger): ((event: FileSizeProgressEvent) => void) => {
  let lastLogged = 0;

  return (event) => {
    switch (event.stage) {
      case "commits_selected":
        logger.info(`size: measuring ${event.pending} commits (${event.skipped} already measured)`);
        break;
      case "commit_measured":
        if (event.measured === event.total || event.measured === 1 || event.measured - lastLogged >= 25) {
          lastLogged = event.measured;
          logger.info(`size: measured ${event.measured}/${event.total} commits`);
        }
        logger.debug(`size: ${event.commitHash} has ${event.files} files`);
        break;
      case "checkout_restored":
        logger.debug("size: working tree restored to its latest revision");
        break;
    }
  };
};

// stored day rows are never rewritten
const warnOnStaleDays = (
  logger: Logger,
  stored: readonly ProjectSizePerDayRecord[],
  computed: readonly ProjectSizePerDayRecord[],
): void => {
  const storedByDay = new Map(stored.map((row) => [row.date, row]));
  const staleDays = computed
    .filter((row) => {
      const previous = storedByDay.get(row.date);
      return previous !== undefined && SIZE_FIELDS.some((field) => previous[field] !== row[field]);
    })
    .map((row) => row.date);

  if (staleDays.length > 0) {
    logger.warn(
      `size: ${staleDays.length} stored days keep their earlier size (${staleDays.join(", ")}); commits landed on them after they were written`,
    );
  }
};

export const runSizeCommand = (
  provider: RevisionProvider,
  lineCounter: LineCounter,
  context: StageContext,
): StageResult<SizeSummary> => {
  const { logger, store } = context;
  if (!provider.isGitRepository()) {
    return { status: "unavailable", stage: "size", reason: "not_git_repository" };
  }

  const commits = store.readTable(TABLES.commitHashes);
  if (commits.length === 0) {
    return { status: "unavailable", stage: "size", reason: "no_commits" };
  }

  // a commit without countable files has a zero per-commit size but no file rows
  const measuredCommitIds = new Set([
    ...store.readTable(TABLES.projectSizePerCommit).map((row) => row.commitHashId),
    ...store.readTable(TABLES.fileSizes).map((row) => row.commitHashId),
  ]);
  const measured = measureFileSizes(
    { commits, measuredCommitIds },
    provider,
    lineCounter,
    createSizeProgressReporter(logger),
  );
  const measuredCommits = measured.measuredCommitIds.length;

  const fileSizes = appendRows(context, TABLES.fileSizes, measured.files);
  if (!fileSizes.ok) {
    return { status: "write_failed", stage: "size", table: fileSizes.table };
  }

  const perCommit = computeProjectSizePerCommit(store.readTable(TABLES.fileSizes), [
    ...measuredCommitIds,
    ...measured.measuredCommitIds,
  ]);
  const projectSizePerCommit = appendRows(context, TABLES.projectSizePerCommit, perCommit);
  if (!projectSizePerCommit.ok) {
    return { status: "write_failed", stage: "size", table: projectSizePerCommit.table };
  }

  const perDay = computeProjectSizePerDay({
    sizes: perCommit,
    commitDays: commitDaysByKey(store.readTable(TABLES.commitLogs)),
    now: context.now,
  });
  warnOnStaleDays(logger, store.readTable(TABLES.projectSizePerDay), perDay);
  const projectSizePerDay = appendRows(context, TABLES.projectSizePerDay, perDay);
  if (!projectSizePerDay.ok) {
    return { status: "write_failed", stage: "size", table: projectSizePerDay.table };
  }

  logger.info(`size: ${perDay.length} days from ${perDay[0]?.date ?? "-"} to ${perDay.at(-1)?.date ?? "-"}`);
  return {
    status: "completed",
    stage: "size",
    summary: {
      measuredCommits,
      fileSizes: fileSizes.summary,
      projectSizePerCommit: projectSizePerCommit.summary,
      projectSizePerDay: projectSizePerDay.summary,
    },
  };
};
