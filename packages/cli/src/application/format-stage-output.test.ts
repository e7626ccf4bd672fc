import { describe, expect, it } from "vitest";
import { formatStageOutput } from "./format-stage-output.js";
import type { StageResult } from "./stage-result.js";

const tags = Array.from({ length: 12 }, (_, index) => `v${index + 1}`);

const completed: StageResult<{ droppedTags: readonly string[]; inserted: { commitLogs: number } }> = {
  status: "completed",
  stage: "vcs",
  summary: { droppedTags: tags, inserted: { commitLogs: 3 } },
};

describe("formatStageOutput", () => {
  it("cuts long lists to a preview in summary mode", () => {
    expect(JSON.parse(formatStageOutput(completed, "summary"))).toEqual({
      stage: "vcs",
      status: "completed",
      summary: {
        droppedTags: { count: 12, first: tags.slice(0, 10) },
        inserted: { commitLogs: 3 },
      },
    });
  });

  it("prints the full result in json mode", () => {
    expect(JSON.parse(formatStageOutput(completed, "json"))).toEqual({
      status: "completed",
      stage: "vcs",
      summary: { droppedTags: tags, inserted: { commitLogs: 3 } },
    });
  });

  it("names the reason of an unavailable stage", () => {
    const output = formatStageOutput(
      { status: "unavailable", stage: "issues", reason: "missing_token" },
      "summary",
    );

    expect(output).toBe('{\n  "stage": "issues",\n  "status": "unavailable",\n  "reason": "missing_token"\n}');
  });

  it("names the table of a rejected write", () => {
    expect(
      JSON.parse(formatStageOutput({ status: "write_failed", stage: "size", table: "file_sizes" }, "summary")),
    ).toEqual({ stage: "size", status: "write_failed", table: "file_sizes" });
  });
});
