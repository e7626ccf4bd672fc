import type { TableDefinition } from "@repometrics/metrics-store";
import type { AppendSummary, StageContext } from "./stage-result.js";

export type AppendOutcome = { ok: true; summary: AppendSummary } | { ok: false; table: string };

export const appendRows = <Row>(
  context: StageContext,
  table: TableDefinition<Row>,
  rows: readonly Row[],
): AppendOutcome => {
  const result = context.store.appendNew(table, rows);
  if (!result.written) {
    context.logger.error(`${table.name}: write rejected by a constraint violation`);
    return { ok: false, table: table.name };
  }

  context.logger.debug(`${table.name}: appended ${result.appended} rows, ${result.skipped} already stored`);
  return { ok: true, summary: { appended: result.appended, skipped: result.skipped } };
};
