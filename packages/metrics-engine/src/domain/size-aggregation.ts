import type {
  FileSizeRecord,
  ProjectSizePerCommitRecord,
  ProjectSizePerDayRecord,
  SizeMetrics,
  UtcDay,
} from "@repometrics/core";
import { dayRange, minDay, toUtcDay } from "./calendar.js";
import { addSizeMetrics, emptySizeMetrics, pickSizeMetrics } from "./size-metrics.js";

/** Sums file rows per commit. Measured commits without any file row get an all-zero size. */
export const computeProjectSizePerCommit = (
  files: readonly FileSizeRecord[],
  measuredCommitIds: Iterable<number> = [],
): readonly ProjectSizePerCommitRecord[] => {
  const totals = new Map<number, SizeMetrics>();
  for (const commitHashId of measuredCommitIds) {
    totals.set(commitHashId, emptySizeMetrics());
  }

  for (const file of files) {
    const total = totals.get(file.commitHashId) ?? emptySizeMetrics();
    totals.set(file.commitHashId, addSizeMetrics(total, pickSizeMetrics(file)));
  }

  return [...totals.entries()]
    .sort(([left], [right]) => left - right)
    .map(([commitHashId, total]) => ({ commitHashId, ...total }));
};

export type ProjectSizePerDayInput = {
  sizes: readonly ProjectSizePerCommitRecord[];
  commitDays: ReadonlyMap<number, UtcDay>;
  now: Date;
};

/**
 * Resamples per-commit sizes onto a daily calendar running from the earliest commit day through
 * `now`. The size of a day is the size of its last measured commit by key; days without one repeat
 * the previous day, and days before the first measured commit are zero.
 */
export const computeProjectSizePerDay = (
  input: ProjectSizePerDayInput,
): readonly ProjectSizePerDayRecord[] => {
  const lastSizeByDay = new Map<UtcDay, SizeMetrics>();
  const ordered = [...input.sizes].sort((left, right) => left.commitHashId - right.commitHashId);
  for (const size of ordered) {
    const day = input.commitDays.get(size.commitHashId);
    if (day === undefined) {
      continue;
    }

    lastSizeByDay.set(day, pickSizeMetrics(size));
  }

  const firstDay = minDay(input.commitDays.values());
  if (firstDay === null) {
    return [];
  }

  const rows: ProjectSizePerDayRecord[] = [];
  let current = emptySizeMetrics();
  for (const date of dayRange(firstDay, toUtcDay(input.now))) {
    current = lastSizeByDay.get(date) ?? current;
    rows.push({ date, ...current });
  }

  return rows;
};
