import type { IssueRecord, IssueSpoilageRecord, UtcDay } from "@repometrics/core";
import type { SpoilageAlgorithm } from "../config.js";
import { dayEnd, dayNumber, dayRange, dayStart, toUtcDay } from "./calendar.js";

export type IssueSpoilageInput = {
  issues: readonly IssueRecord[];
  /** Day of the first commit; the series starts here. */
  firstDay: UtcDay;
  now: Date;
  algorithm: SpoilageAlgorithm;
};

type IssueInterval = {
  openedDay: number;
  closedDay: number;
};

// Open issues stay open through today. Intervals that close before they open cover no day.
const toIntervals = (issues: readonly IssueRecord[], today: UtcDay): readonly IssueInterval[] =>
  issues
    .map((issue) => ({
      openedDay: dayNumber(issue.createdDay),
      closedDay: dayNumber(issue.closedDay ?? today),
    }))
    .filter((interval) => interval.openedDay <= interval.closedDay);

const countDense = (days: readonly number[], intervals: readonly IssueInterval[]): readonly number[] =>
  days.map(
    (day) =>
      intervals.filter((interval) => interval.openedDay <= day && interval.closedDay >= day).length,
  );

const countSweepLine = (
  days: readonly number[],
  intervals: readonly IssueInterval[],
): readonly number[] => {
  const openings = intervals.map((interval) => interval.openedDay).sort((a, b) => a - b);
  const closings = intervals.map((interval) => interval.closedDay).sort((a, b) => a - b);

  const counts: number[] = [];
  let open = 0;
  let openingIndex = 0;
  let closingIndex = 0;
  for (const day of days) {
    while (openingIndex < openings.length && (openings[openingIndex] ?? Infinity) <= day) {
      open += 1;
      openingIndex += 1;
    }

    // an interval closing on `day` still covers it
    while (closingIndex < closings.length && (closings[closingIndex] ?? Infinity) < day) {
      open -= 1;
      closingIndex += 1;
    }

    counts.push(open);
  }

  return counts;
};

/**
 * Counts, for every day from `firstDay` through today, the issues whose lifetime covers the whole
 * day: opened on or before it and closed on or after it.
 */
export const computeIssueSpoilagePerDay = (
  input: IssueSpoilageInput,
): readonly IssueSpoilageRecord[] => {
  const today = toUtcDay(input.now);
  const days = dayRange(input.firstDay, today);
  const intervals = toIntervals(input.issues, today);
  const dayNumbers = days.map(dayNumber);
  const counts =
    input.algorithm === "sweep_line"
      ? countSweepLine(dayNumbers, intervals)
      : countDense(dayNumbers, intervals);

  return days.map((day, index) => ({
    start: dayStart(day),
    end: dayEnd(day),
    openIssues: counts[index] ?? 0,
  }));
};
