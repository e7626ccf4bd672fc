import {
  ingestRevisions,
  type RevisionIngestionProgressEvent,
  type RevisionProvider,
} from "@repometrics/git-analyzer";
import type { RevisionBatchInsertResult } from "@repometrics/metrics-store";
import type { Logger } from "./logger.js";
import type { StageContext, StageResult } from "./stage-result.js";

export type VcsSummary = {
  repositoryPath: string;
  inserted: RevisionBatchInsertResult;
  skippedRevisions: number;
  droppedTags: readonly string[];
};

const createRevisionProgressReporter = (
  logger: Logger,
): ((event: RevisionIngestionProgressEvent) => void) => {
  let lastParsedRecords = 0;

  return (event) => {
    switch (event.stage) {
      case "checking_git_repository":
        logger.debug("vcs: checking git repository");
        break;
      case "not_git_repository":
        logger.warn("vcs: target path is not a git repository");
        break;
      case "loading_revisions":
        logger.info("vcs: loading git history");
        break;
      case "loading_tags":
        logger.debug("vcs: resolving tags");
        break;
      case "normalizing_revisions":
        logger.info(`vcs: normalizing ${event.revisions} revisions`);
        break;
      case "revisions_normalized":
        logger.info(
          `vcs: ${event.commits} new commits (${event.skippedRevisions} already stored, ${event.droppedTags} tags dropped)`,
        );
        break;
      case "history":
        if (event.event.stage === "git_log_received") {
          logger.debug(`vcs: git log loaded (${event.event.bytes} bytes)`);
          break;
        }

        if (event.event.stage === "git_log_parsed") {
          logger.info(`vcs: parsed ${event.event.revisions} revisions`);
          break;
        }

        if (
          event.event.stage === "git_log_parse_progress" &&
          (event.event.parsedRecords === event.event.totalRecords ||
            event.event.parsedRecords - lastParsedRecords >= 500)
        ) {
          lastParsedRecords = event.event.parsedRecords;
          logger.debug(`vcs: parse progress ${event.event.parsedRecords}/${event.event.totalRecords}`);
        }
        break;
    }
  };
};

export const runVcsCommand = (
  provider: RevisionProvider,
  context: StageContext,
): StageResult<VcsSummary> => {
  const { logger, store } = context;
  logger.info(`vcs: ingesting ${provider.repositoryPath}`);

  const result = ingestRevisions(
    { previousCommitHashes: store.storedCommitHashes() },
    provider,
    createRevisionProgressReporter(logger),
  );
  if (!result.available) {
    return { status: "unavailable", stage: "vcs", reason: result.reason };
  }

  for (const tag of result.batch.droppedTags) {
    logger.debug(`vcs: dropped tag ${tag}`);
  }

  const inserted = store.insertRevisionBatch(result.batch);
  logger.info(
    `vcs: stored ${inserted.commitLogs} commits, ${inserted.authors} authors, ${inserted.committers} committers, ${inserted.releases} releases`,
  );

  return {
    status: "completed",
    stage: "vcs",
    summary: {
      repositoryPath: provider.repositoryPath,
      inserted,
      skippedRevisions: result.batch.skippedRevisions,
      droppedTags: result.batch.droppedTags,
    },
  };
};
