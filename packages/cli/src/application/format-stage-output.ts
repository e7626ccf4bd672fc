import type { StageResult } from "./stage-result.js";

export type StageOutputMode = "summary" | "json";

const LIST_PREVIEW = 10;

// Long lists are cut to a preview and their length is reported alongside.
const summarizeValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value;
    return items.length <= LIST_PREVIEW
      ? items.map(summarizeValue)
      : { count: items.length, first: items.slice(0, LIST_PREVIEW).map(summarizeValue) };
  }

  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, summarizeValue(entry)]));
  }

  return value;
};

const createSummaryShape = (result: StageResult<unknown>): Record<string, unknown> => {
  switch (result.status) {
    case "completed":
      return { stage: result.stage, status: result.status, summary: summarizeValue(result.summary) };
    case "unavailable":
      return { stage: result.stage, status: result.status, reason: result.reason };
    case "write_failed":
      return { stage: result.stage, status: result.status, table: result.table };
  }
};

export const formatStageOutput = (result: StageResult<unknown>, mode: StageOutputMode): string =>
  mode === "json" ? JSON.stringify(result, null, 2) : JSON.stringify(createSummaryShape(result), null, 2);
