import type { IssueRecord } from "@repometrics/core";
import { describe, expect, it } from "vitest";
import type { SpoilageAlgorithm } from "../config.js";
import { computeIssueSpoilagePerDay } from "./issue-spoilage.js";

const issue = (issueId: number, createdDay: string, closedDay: string | null): IssueRecord => ({
  issueId,
  createdDay,
  closedDay,
});

const now = new Date("2024-01-05T08:00:00.000Z");

const algorithms: readonly SpoilageAlgorithm[] = ["dense", "sweep_line"];

describe.each(algorithms)("computeIssueSpoilagePerDay (%s)", (algorithm) => {
  it("counts issues open across each whole day", () => {
    const rows = computeIssueSpoilagePerDay({
      issues: [issue(1, "2024-01-01", "2024-01-03"), issue(2, "2024-01-02", null)],
      firstDay: "2024-01-01",
      now,
      algorithm,
    });

    expect(rows.map((row) => row.openIssues)).toEqual([1, 2, 2, 1, 1]);
    expect(rows[0]).toEqual({
      start: "2024-01-01T00:00:00.000Z",
      end: "2024-01-01T23:59:59.000Z",
      openIssues: 1,
    });
    expect(rows.at(-1)?.start).toBe("2024-01-05T00:00:00.000Z");
  });

  it("counts an issue closed on its opening day for that day only", () => {
    const rows = computeIssueSpoilagePerDay({
      issues: [issue(1, "2024-01-04", "2024-01-04")],
      firstDay: "2024-01-01",
      now,
      algorithm,
    });

    expect(rows.map((row) => row.openIssues)).toEqual([0, 0, 0, 1, 0]);
  });

  it("counts issues opened before the first commit from the first day on", () => {
    const rows = computeIssueSpoilagePerDay({
      issues: [issue(1, "2023-12-30", "2024-01-02"), issue(2, "2024-01-03", "2024-01-01")],
      firstDay: "2024-01-01",
      now,
      algorithm,
    });

    expect(rows.map((row) => row.openIssues)).toEqual([1, 1, 0, 0, 0]);
  });
});

describe("computeIssueSpoilagePerDay", () => {
  it("gives the same rows with both algorithms", () => {
    const issues = [
      issue(1, "2024-01-01", "2024-01-01"),
      issue(2, "2024-01-01", null),
      issue(3, "2024-01-02", "2024-01-04"),
      issue(4, "2024-01-03", "2024-01-03"),
      issue(5, "2024-01-03", null),
      issue(6, "2023-11-01", "2024-01-02"),
    ];
    const input = { issues, firstDay: "2024-01-01", now };

    const dense = computeIssueSpoilagePerDay({ ...input, algorithm: "dense" });
    const sweep = computeIssueSpoilagePerDay({ ...input, algorithm: "sweep_line" });

    expect(sweep).toEqual(dense);
    expect(dense.map((row) => row.openIssues)).toEqual([3, 3, 4, 3, 2]);
  });

  it("returns no rows when the first day is after today", () => {
    expect(
      computeIssueSpoilagePerDay({
        issues: [issue(1, "2024-01-01", null)],
        firstDay: "2024-02-01",
        now,
        algorithm: "dense",
      }),
    ).toEqual([]);
  });
});
