import type { TrackerKind } from "@repometrics/core";
import {
  fetchAllTrackerItems,
  normalizeTrackerItems,
  type TrackerClient,
  type TrackerFetchProgressEvent,
} from "@repometrics/issue-tracker";
import type { TrackerBatchInsertResult } from "@repometrics/metrics-store";
import type { Logger } from "./logger.js";
import type { StageContext, StageResult } from "./stage-result.js";

export type TrackerTarget = {
  owner: string;
  repository: string;
  token: string | undefined;
};

export type TrackerClientFactory = (target: TrackerTarget & { token: string }) => TrackerClient;

export type TrackerSummary = {
  kind: TrackerKind;
  fetched: number;
  totalCount: number | null;
  complete: boolean;
  skippedItems: number;
  inserted: TrackerBatchInsertResult;
};

const stageFor = (kind: TrackerKind): "issues" | "pull-requests" =>
  kind === "issues" ? "issues" : "pull-requests";

const createTrackerProgressReporter = (
  logger: Logger,
): ((event: TrackerFetchProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "counting_items":
        logger.debug(`${event.kind}: requesting total count`);
        break;
      case "items_counted":
        logger.info(`${event.kind}: ${event.total ?? "unknown number of"} items reported`);
        break;
      case "page_fetched":
        logger.info(
          `${event.kind}: page ${event.page} fetched ${event.fetched}/${event.total ?? "?"} (rate limit remaining ${event.rateLimitRemaining ?? "?"})`,
        );
        break;
      case "page_failed":
        logger.warn(`${event.kind}: page ${event.page} failed, keeping items fetched so far: ${event.reason}`);
        break;
    }
  };
};

export const runTrackerCommand = async (
  kind: TrackerKind,
  target: TrackerTarget,
  createClient: TrackerClientFactory,
  context: StageContext,
): Promise<StageResult<TrackerSummary>> => {
  const stage = stageFor(kind);
  const { logger, store } = context;
  if (target.token === undefined || target.token.length === 0) {
    logger.warn(`${kind}: no access token given`);
    return { status: "unavailable", stage, reason: "missing_token" };
  }

  logger.info(`${kind}: fetching ${target.owner}/${target.repository}`);
  const client = createClient({ ...target, token: target.token });
  const fetched = await fetchAllTrackerItems(client, kind, createTrackerProgressReporter(logger));

  const batch = normalizeTrackerItems({
    kind,
    items: fetched.items,
    previousItemIds: store.storedTrackerItemIds(kind),
  });
  const inserted = store.insertTrackerBatch(batch);
  logger.info(`${kind}: stored ${inserted.items} new items (${batch.skippedItems} already stored)`);
  if (inserted.closed > 0) {
    logger.info(`${kind}: closed ${inserted.closed} stored items`);
  }

  return {
    status: "completed",
    stage,
    summary: {
      kind,
      fetched: fetched.items.length,
      totalCount: fetched.totalCount,
      complete: fetched.complete,
      skippedItems: batch.skippedItems,
      inserted,
    },
  };
};
