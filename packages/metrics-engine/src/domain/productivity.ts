import type {
  DeltaMetrics,
  ProjectProductivityPerCommitRecord,
  ProjectProductivityPerDayRecord,
  ProjectSizePerCommitRecord,
  ProjectSizePerDayRecord,
  SizeMetrics,
} from "@repometrics/core";
import { subtractSizeMetrics, zeroDeltaMetrics } from "./size-metrics.js";

const firstDifferences = (series: readonly SizeMetrics[]): readonly DeltaMetrics[] =>
  series.map((value, index) => {
    const previous = series[index - 1];
    return previous === undefined ? zeroDeltaMetrics() : subtractSizeMetrics(value, previous);
  });

export const computeProductivityPerCommit = (
  sizes: readonly ProjectSizePerCommitRecord[],
): readonly ProjectProductivityPerCommitRecord[] => {
  const ordered = [...sizes].sort((left, right) => left.commitHashId - right.commitHashId);
  const deltas = firstDifferences(ordered);
  return ordered.map((size, index) => ({
    commitHashId: size.commitHashId,
    ...(deltas[index] ?? zeroDeltaMetrics()),
  }));
};

export const computeProductivityPerDay = (
  sizes: readonly ProjectSizePerDayRecord[],
): readonly ProjectProductivityPerDayRecord[] => {
  const ordered = [...sizes].sort((left, right) => left.date.localeCompare(right.date));
  const deltas = firstDifferences(ordered);
  return ordered.map((size, index) => ({
    date: size.date,
    ...(deltas[index] ?? zeroDeltaMetrics()),
  }));
};
