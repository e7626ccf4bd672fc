import { GIT_LOG_FORMAT, TAG_REF_FORMAT } from "../domain/git-log-format.js";
import type { RawRevision, TagTarget } from "../domain/revision-types.js";
import {
  mapParseProgressToHistoryProgress,
  type RevisionHistoryProgressEvent,
  type RevisionProvider,
} from "../application/revision-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { parseGitLog } from "../parsing/git-log-parser.js";
import { parseTagRefs } from "../parsing/tag-ref-parser.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory"];
const EMPTY_HISTORY_CODES = ["does not have any commits yet", "bad default revision"];

const errorText = (error: GitCommandError): string =>
  `${error.message}\n${error.stderr}`.toLowerCase();

const isNotGitError = (error: GitCommandError): boolean => {
  const lower = errorText(error);
  return NON_GIT_CODES.some((code) => lower.includes(code));
};

const isEmptyHistoryError = (error: GitCommandError): boolean => {
  const lower = errorText(error);
  return EMPTY_HISTORY_CODES.some((code) => lower.includes(code));
};

export class GitCliRevisionProvider implements RevisionProvider {
  // what HEAD pointed at before the first checkout: a branch name or a detached commit
  private restoreTarget: string | null = null;

  constructor(
    readonly repositoryPath: string,
    private readonly gitClient: GitCommandClient,
  ) {}

  isGitRepository(): boolean {
    try {
      const output = this.gitClient.run(this.repositoryPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && isNotGitError(error)) {
        return false;
      }

      throw error;
    }
  }

  revisions(onProgress?: (event: RevisionHistoryProgressEvent) => void): readonly RawRevision[] {
    let output: string;
    try {
      output = this.gitClient.run(this.repositoryPath, [
        "-c",
        "core.quotepath=false",
        "log",
        "--reverse",
        "--date=unix",
        `--pretty=format:${GIT_LOG_FORMAT}`,
      ]);
    } catch (error) {
      if (error instanceof GitCommandError && isEmptyHistoryError(error)) {
        onProgress?.({ stage: "git_log_parsed", revisions: 0 });
        return [];
      }

      throw error;
    }

    onProgress?.({ stage: "git_log_received", bytes: Buffer.byteLength(output, "utf8") });
    const revisions = parseGitLog(output, (event) =>
      onProgress?.(mapParseProgressToHistoryProgress(event)),
    );
    onProgress?.({ stage: "git_log_parsed", revisions: revisions.length });
    return revisions;
  }

  tagTargets(): readonly TagTarget[] {
    const output = this.gitClient.run(this.repositoryPath, [
      "for-each-ref",
      `--format=${TAG_REF_FORMAT}`,
      "refs/tags",
    ]);
    return parseTagRefs(output);
  }

  checkout(commitHash: string): void {
    if (this.restoreTarget === null) {
      this.restoreTarget = this.resolveCurrentRef();
    }

    this.gitClient.run(this.repositoryPath, ["checkout", "--force", "--quiet", commitHash]);
  }

  checkoutLatest(): void {
    if (this.restoreTarget === null) {
      return;
    }

    this.gitClient.run(this.repositoryPath, ["checkout", "--force", "--quiet", this.restoreTarget]);
    this.restoreTarget = null;
  }

  private resolveCurrentRef(): string {
    try {
      const branch = this.gitClient.run(this.repositoryPath, ["symbolic-ref", "--quiet", "--short", "HEAD"]).trim();
      if (branch.length > 0) {
        return branch;
      }
    } catch (error) {
      // detached HEAD: symbolic-ref exits non-zero
      if (!(error instanceof GitCommandError)) {
        throw error;
      }
    }

    return this.gitClient.run(this.repositoryPath, ["rev-parse", "HEAD"]).trim();
  }
}
