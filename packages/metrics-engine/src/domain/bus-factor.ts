import {
  BUS_FACTOR_SENTINEL,
  type BusFactorRecord,
  type DeltaMetrics,
  type UtcDay,
} from "@repometrics/core";
import { addAbsoluteDeltas, zeroDeltaMetrics } from "./size-metrics.js";

export type CommitActivity = DeltaMetrics & {
  date: UtcDay;
  committerId: number | null;
};

const sentinelRow = (date: UtcDay): BusFactorRecord => ({
  date,
  committerId: BUS_FACTOR_SENTINEL,
  deltaLines: BUS_FACTOR_SENTINEL,
  deltaCode: BUS_FACTOR_SENTINEL,
  deltaComments: BUS_FACTOR_SENTINEL,
  deltaBlanks: BUS_FACTOR_SENTINEL,
  deltaBytes: BUS_FACTOR_SENTINEL,
});

/**
 * Sums absolute per-commit deltas by day and committer. A day whose commits cannot be attributed
 * to any committer yields a single sentinel row.
 */
export const computeBusFactorPerDay = (
  activity: readonly CommitActivity[],
): readonly BusFactorRecord[] => {
  const byDay = new Map<UtcDay, Map<number, DeltaMetrics>>();
  for (const commit of activity) {
    const committers = byDay.get(commit.date) ?? new Map<number, DeltaMetrics>();
    byDay.set(commit.date, committers);
    if (commit.committerId === null) {
      continue;
    }

    const total = committers.get(commit.committerId) ?? zeroDeltaMetrics();
    committers.set(commit.committerId, addAbsoluteDeltas(total, commit));
  }

  const rows: BusFactorRecord[] = [];
  const days = [...byDay.keys()].sort((left, right) => left.localeCompare(right));
  for (const date of days) {
    const committers = byDay.get(date);
    if (committers === undefined || committers.size === 0) {
      rows.push(sentinelRow(date));
      continue;
    }

    const ordered = [...committers.entries()].sort(([left], [right]) => left - right);
    for (const [committerId, totals] of ordered) {
      rows.push({ date, committerId, ...totals });
    }
  }

  return rows;
};
