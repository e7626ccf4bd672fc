import { execFileSync } from "node:child_process";
import { isAbsolute, relative, resolve, sep } from "node:path";
import type { FileMeasurement, LineCounter } from "../application/line-counter.js";
import { parseSccCsv } from "../parsing/scc-csv-parser.js";

export class LineCounterError extends Error {
  readonly directory: string;

  constructor(message: string, directory: string) {
    super(message);
    this.name = "LineCounterError";
    this.directory = directory;
  }
}

export const SCC_ARGS = [
  "--format=csv",
  "--by-file",
  "--no-cocomo",
  "--no-complexity",
  "--no-min-gen",
  "--no-size",
] as const;

export interface SccCommandRunner {
  run(directory: string, args: readonly string[]): string;
}

const isMissingBinary = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

export class ExecSccCommandRunner implements SccCommandRunner {
  constructor(
    private readonly binary = "scc",
    private readonly maxBufferBytes = 1024 * 1024 * 256,
  ) {}

  run(directory: string, args: readonly string[]): string {
    try {
      return execFileSync(this.binary, [...args], {
        cwd: directory,
        encoding: "utf8",
        maxBuffer: this.maxBufferBytes,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      if (isMissingBinary(error)) {
        throw new LineCounterError(`line counter "${this.binary}" not found on PATH`, directory);
      }

      const message = error instanceof Error ? error.message : "Unknown scc execution error";
      throw new LineCounterError(message, directory);
    }
  }
}

const toRelativePath = (directory: string, path: string): string => {
  const absolute = isAbsolute(path) ? path : resolve(directory, path);
  return relative(directory, absolute).split(sep).join("/");
};

export class SccLineCounter implements LineCounter {
  constructor(private readonly runner: SccCommandRunner) {}

  measure(directory: string): readonly FileMeasurement[] {
    const root = resolve(directory);
    const output = this.runner.run(root, [...SCC_ARGS, root]);
    const parsed = parseSccCsv(output);
    if (!parsed.ok) {
      throw new LineCounterError(`could not read scc output: ${parsed.reason}`, root);
    }

    return parsed.rows.map((row) => ({ ...row, path: toRelativePath(root, row.path) }));
  }
}
