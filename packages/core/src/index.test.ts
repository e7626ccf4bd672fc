import { describe, expect, it } from "vitest";
import { resolveTargetPath } from "./index.js";

describe("resolveTargetPath", () => {
  it("resolves a relative repository path against cwd", () => {
    expect(resolveTargetPath("widgets", "/work").absolutePath).toBe("/work/widgets");
  });

  it("keeps an absolute repository path", () => {
    expect(resolveTargetPath("/srv/widgets", "/work").absolutePath).toBe("/srv/widgets");
  });

  it("defaults to cwd when no path is given", () => {
    expect(resolveTargetPath(undefined, "/work").absolutePath).toBe("/work");
  });
});
