import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly stderr: string;

  constructor(message: string, args: readonly string[], stderr = "") {
    super(message);
    this.name = "GitCommandError";
    this.args = args;
    this.stderr = stderr;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
}

const readStderr = (error: unknown): string => {
  if (typeof error !== "object" || error === null || !("stderr" in error)) {
    return "";
  }

  const { stderr } = error;
  if (typeof stderr === "string") {
    return stderr;
  }

  return Buffer.isBuffer(stderr) ? stderr.toString("utf8") : "";
};

export class ExecGitCommandClient implements GitCommandClient {
  constructor(private readonly maxBufferBytes = 1024 * 1024 * 256) {}

  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, ...args], {
        encoding: "utf8",
        maxBuffer: this.maxBufferBytes,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown git execution error";
      throw new GitCommandError(message, args, readStderr(error));
    }
  }
}
