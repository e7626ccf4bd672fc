import { Command, Option } from "commander";
import { resolveTargetPath, type TrackerKind } from "@repometrics/core";
import { createGitRevisionProvider } from "@repometrics/git-analyzer";
import { GitHubTrackerClient } from "@repometrics/issue-tracker";
import { createSccLineCounter, type SpoilageAlgorithm } from "@repometrics/metrics-engine";
import { MetricsStore } from "@repometrics/metrics-store";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { formatStageOutput, type StageOutputMode } from "./application/format-stage-output.js";
import { LOG_LEVELS, createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { runBusFactorCommand } from "./application/run-bus-factor-command.js";
import { runIssueDensityCommand } from "./application/run-issue-density-command.js";
import { runIssueSpoilageCommand } from "./application/run-issue-spoilage-command.js";
import { runProductivityCommand } from "./application/run-productivity-command.js";
import { runSizeCommand } from "./application/run-size-command.js";
import { runTrackerCommand } from "./application/run-tracker-command.js";
import { runVcsCommand } from "./application/run-vcs-command.js";
import { exitCodeFor, type StageContext, type StageResult } from "./application/stage-result.js";

type CommonOptions = {
  db: string;
  logLevel: LogLevel;
  output: StageOutputMode;
  json?: boolean;
};

type TrackerOptions = CommonOptions & {
  owner: string;
  repo: string;
  token?: string;
};

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, "utf8")));

const withCommonOptions = (command: Command): Command =>
  command
    .option("--db <path>", "SQLite database the metrics are written to", "repometrics.db")
    .addOption(
      new Option(
        "--log-level <level>",
        "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
      )
        .choices(LOG_LEVELS)
        .default(parseLogLevel(process.env["REPOMETRICS_LOG_LEVEL"])),
    )
    .addOption(
      new Option("--output <mode>", "output mode: summary (default) or json (full stage result)")
        .choices(["summary", "json"])
        .default("summary"),
    )
    .option("--json", "shortcut for --output json");

// Opens the store for one stage, prints its result and sets the exit code.
const runStage = async (
  options: CommonOptions,
  stage: (context: StageContext) => StageResult<unknown> | Promise<StageResult<unknown>>,
): Promise<void> => {
  const logger = createStderrLogger(options.logLevel);
  const store = new MetricsStore(resolve(options.db));
  try {
    const result = await stage({ store, logger, now: new Date() });
    if (result.status === "unavailable") {
      logger.warn(`${result.stage} unavailable: ${result.reason}`);
    }

    const outputMode: StageOutputMode = options.json === true ? "json" : options.output;
    process.stdout.write(`${formatStageOutput(result, outputMode)}\n`);
    process.exitCode = exitCodeFor(result);
  } finally {
    store.close();
  }
};

const trackerAction =
  (kind: TrackerKind) =>
  (options: TrackerOptions): Promise<void> =>
    runStage(options, (context) =>
      runTrackerCommand(
        kind,
        {
          owner: options.owner,
          repository: options.repo,
          token: options.token ?? process.env["REPOMETRICS_GITHUB_TOKEN"] ?? process.env["GITHUB_TOKEN"],
        },
        (target) => new GitHubTrackerClient(target),
        context,
      ),
    );

program
  .name("repometrics")
  .description("Longitudinal engineering metrics mined from git history and issue trackers")
  .version(version);

withCommonOptions(
  program
    .command("vcs")
    .description("ingest commits, authors, committers and releases")
    .argument("[path]", "path to the git repository"),
).action((path: string | undefined, options: CommonOptions) =>
  runStage(options, (context) =>
    runVcsCommand(createGitRevisionProvider(resolveTargetPath(path).absolutePath), context),
  ),
);

withCommonOptions(
  program
    .command("size")
    .description("measure file sizes per commit and aggregate project size per commit and per day")
    .argument("[path]", "path to the git repository"),
).action((path: string | undefined, options: CommonOptions) =>
  runStage(options, (context) =>
    runSizeCommand(
      createGitRevisionProvider(resolveTargetPath(path).absolutePath),
      createSccLineCounter(process.env["REPOMETRICS_SCC_BINARY"] ?? "scc"),
      context,
    ),
  ),
);

withCommonOptions(
  program.command("productivity").description("difference project size per commit and per day"),
).action((options: CommonOptions) => runStage(options, runProductivityCommand));

withCommonOptions(
  program.command("bus-factor").description("sum absolute productivity per day and committer"),
).action((options: CommonOptions) => runStage(options, runBusFactorCommand));

withCommonOptions(
  program
    .command("issues")
    .description("ingest issues from GitHub")
    .requiredOption("--owner <owner>", "repository owner")
    .requiredOption("--repo <name>", "repository name")
    .option("--token <token>", "GitHub token (defaults to REPOMETRICS_GITHUB_TOKEN or GITHUB_TOKEN)"),
).action(trackerAction("issues"));

withCommonOptions(
  program
    .command("pull-requests")
    .description("ingest pull requests from GitHub")
    .requiredOption("--owner <owner>", "repository owner")
    .requiredOption("--repo <name>", "repository name")
    .option("--token <token>", "GitHub token (defaults to REPOMETRICS_GITHUB_TOKEN or GITHUB_TOKEN)"),
).action(trackerAction("pull_requests"));

withCommonOptions(
  program
    .command("issue-spoilage")
    .description("count issues open through each day since the first commit")
    .addOption(
      new Option("--algorithm <name>", "counting algorithm: dense (default) or sweep_line")
        .choices(["dense", "sweep_line"])
        .default("dense"),
    ),
).action((options: CommonOptions & { algorithm: SpoilageAlgorithm }) =>
  runStage(options, (context) => runIssueSpoilageCommand(context, { spoilageAlgorithm: options.algorithm })),
);

withCommonOptions(
  program.command("issue-density").description("join issue spoilage with project size per day"),
).action((options: CommonOptions) => runStage(options, runIssueDensityCommand));

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

try {
  await program.parseAsync(argv);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[repometrics] ERROR ${message}\n`);
  process.exitCode = 1;
}
