import { describe, expect, it } from "vitest";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { GitCliRevisionProvider } from "./git-revision-provider.js";

class StubGitClient implements GitCommandClient {
  readonly calls: string[][] = [];

  constructor(private readonly respond: (args: readonly string[]) => string) {}

  run(_repositoryPath: string, args: readonly string[]): string {
    this.calls.push([...args]);
    return this.respond(args);
  }
}

describe("GitCliRevisionProvider", () => {
  it("treats a not-a-repository failure as a non-git directory", () => {
    const client = new StubGitClient((args) => {
      throw new GitCommandError("Command failed", args, "fatal: not a git repository");
    });

    expect(new GitCliRevisionProvider("/tmp/plain", client).isGitRepository()).toBe(false);
  });

  it("rethrows unrelated git failures", () => {
    const client = new StubGitClient((args) => {
      throw new GitCommandError("Command failed", args, "fatal: permission denied");
    });

    expect(() => new GitCliRevisionProvider("/tmp/locked", client).isGitRepository()).toThrow(
      GitCommandError,
    );
  });

  it("reads history oldest first", () => {
    const raw = `\u001e${["a1", "Alice", "alice@example.com", "1700000000", "Alice", "alice@example.com", "1700000000", "", "", "N", "first"].join("\u001f")}`;
    const client = new StubGitClient(() => raw);
    const provider = new GitCliRevisionProvider("/tmp/repo", client);

    const revisions = provider.revisions();

    expect(revisions.map((revision) => revision.hash)).toEqual(["a1"]);
    expect(client.calls[0]).toContain("--reverse");
  });

  it("returns no revisions for a repository without commits", () => {
    const client = new StubGitClient((args) => {
      throw new GitCommandError(
        "Command failed",
        args,
        "fatal: your current branch 'main' does not have any commits yet",
      );
    });

    expect(new GitCliRevisionProvider("/tmp/empty", client).revisions()).toEqual([]);
  });

  it("restores the branch that was checked out before the first checkout", () => {
    const client = new StubGitClient((args) => (args[0] === "symbolic-ref" ? "main\n" : ""));
    const provider = new GitCliRevisionProvider("/tmp/repo", client);

    provider.checkout("c1");
    provider.checkout("c2");
    provider.checkoutLatest();

    expect(client.calls).toEqual([
      ["symbolic-ref", "--quiet", "--short", "HEAD"],
      ["checkout", "--force", "--quiet", "c1"],
      ["checkout", "--force", "--quiet", "c2"],
      ["checkout", "--force", "--quiet", "main"],
    ]);
  });

  it("restores a detached head by commit", () => {
    const client = new StubGitClient((args) => {
      if (args[0] === "symbolic-ref") {
        throw new GitCommandError("Command failed", args);
      }

      return args[0] === "rev-parse" ? "deadbeef\n" : "";
    });
    const provider = new GitCliRevisionProvider("/tmp/repo", client);

    provider.checkout("c1");
    provider.checkoutLatest();
    provider.checkoutLatest();

    expect(client.calls.at(-1)).toEqual(["checkout", "--force", "--quiet", "deadbeef"]);
    expect(client.calls).toHaveLength(4);
  });
});
