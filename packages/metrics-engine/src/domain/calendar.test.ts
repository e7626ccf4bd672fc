import { describe, expect, it } from "vitest";
import { dayEnd, dayRange, dayStart, minDay, toUtcDay } from "./calendar.js";

describe("calendar", () => {
  it("lists every day of a range including both ends", () => {
    expect(dayRange("2024-02-27", "2024-03-01")).toEqual([
      "2024-02-27",
      "2024-02-28",
      "2024-02-29",
      "2024-03-01",
    ]);
    expect(dayRange("2024-01-02", "2024-01-01")).toEqual([]);
  });

  it("maps timestamps to their UTC day", () => {
    expect(toUtcDay("2024-01-01T23:30:00-02:00")).toBe("2024-01-02");
    expect(toUtcDay(new Date(Date.UTC(2024, 0, 31, 23, 59, 59)))).toBe("2024-01-31");
  });

  it("spans a year boundary", () => {
    expect(dayRange("2023-12-31", "2024-01-01")).toEqual(["2023-12-31", "2024-01-01"]);
  });

  it("formats day bounds and finds the earliest day", () => {
    expect(dayStart("2024-05-06")).toBe("2024-05-06T00:00:00.000Z");
    expect(dayEnd("2024-05-06")).toBe("2024-05-06T23:59:59.000Z");
    expect(minDay(["2024-05-06", "2023-01-09", "2024-01-01"])).toBe("2023-01-09");
    expect(minDay([])).toBeNull();
  });
});
