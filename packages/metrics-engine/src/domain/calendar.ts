import type { UtcDay } from "@repometrics/core";

const DAY_MS = 24 * 60 * 60 * 1000;

export const toUtcDay = (value: Date | string): UtcDay => {
  const date = typeof value === "string" ? new Date(value) : value;
  return date.toISOString().slice(0, 10);
};

export const dayNumber = (day: UtcDay): number =>
  Math.floor(Date.parse(`${day}T00:00:00.000Z`) / DAY_MS);

export const fromDayNumber = (value: number): UtcDay => new Date(value * DAY_MS).toISOString().slice(0, 10);

/** Every day from `first` through `last`, both included; empty when `first` is later. */
export const dayRange = (first: UtcDay, last: UtcDay): readonly UtcDay[] => {
  const start = dayNumber(first);
  const end = dayNumber(last);
  const days: UtcDay[] = [];
  for (let value = start; value <= end; value += 1) {
    days.push(fromDayNumber(value));
  }

  return days;
};

export const dayStart = (day: UtcDay): string => `${day}T00:00:00.000Z`;

export const dayEnd = (day: UtcDay): string => `${day}T23:59:59.000Z`;

export const minDay = (days: Iterable<UtcDay>): UtcDay | null => {
  let earliest: UtcDay | null = null;
  for (const day of days) {
    if (earliest === null || day < earliest) {
      earliest = day;
    }
  }

  return earliest;
};
