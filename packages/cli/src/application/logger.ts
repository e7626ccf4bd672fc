export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, "silent">;

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

export type LogSink = (line: string) => void;

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const writeToStderr: LogSink = (line) => {
  process.stderr.write(line);
};

/** Writes `[repometrics] LEVEL message` lines for every level up to `level`. */
export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  const threshold = LOG_LEVELS.indexOf(level);
  const at =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(messageLevel) <= threshold) {
        sink(`[repometrics] ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return level === "silent"
    ? createSilentLogger()
    : { error: at("error"), warn: at("warn"), info: at("info"), debug: at("debug") };
};

// unknown or missing levels fall back to info
export const parseLogLevel = (value: string | undefined): LogLevel =>
  value !== undefined && isLogLevel(value) ? value : "info";
