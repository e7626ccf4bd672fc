import type {
  IssueDensityRecord,
  IssueSpoilageRecord,
  ProjectSizePerDayRecord,
  SizeMetrics,
  UtcDay,
} from "@repometrics/core";
import { pickSizeMetrics } from "./size-metrics.js";

/**
 * Joins each spoilage day with the project size of the same day. Days without a size row repeat
 * the latest earlier size; days before any size stay null.
 */
export const computeIssueDensityPerDay = (
  spoilage: readonly IssueSpoilageRecord[],
  sizes: readonly ProjectSizePerDayRecord[],
): readonly IssueDensityRecord[] => {
  const sizeByDay = new Map<UtcDay, SizeMetrics>(
    sizes.map((size) => [size.date, pickSizeMetrics(size)]),
  );
  const ordered = [...spoilage].sort((left, right) => left.start.localeCompare(right.start));

  let latest: SizeMetrics | null = null;
  return ordered.map((row) => {
    const date = row.start.slice(0, 10);
    latest = sizeByDay.get(date) ?? latest;

    return {
      date,
      openIssues: row.openIssues,
      lines: latest?.lines ?? null,
      code: latest?.code ?? null,
      comments: latest?.comments ?? null,
      blanks: latest?.blanks ?? null,
      bytes: latest?.bytes ?? null,
    };
  });
};
