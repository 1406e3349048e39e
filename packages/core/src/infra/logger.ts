import { inspect } from "node:util";
import { Logger } from "tslog";

export const LOG_LEVELS = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_LEVEL: LogLevel = "warn";

let currentLevel: LogLevel = DEFAULT_LEVEL;
const loggers = new Set<Logger<unknown>>();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatArg(arg: unknown): string {
  return typeof arg === "string" ? arg : inspect(arg, { depth: 4 });
}

/**
 * Standard output carries the transcript, so every log line goes to stderr.
 */
function writeToStderr(
  logMetaMarkup: string,
  logArgs: unknown[],
  logErrors: string[],
): void {
  const parts = [...logArgs.map(formatArg), ...logErrors];
  process.stderr.write(`${logMetaMarkup}${parts.join(" ")}\n`);
}

export function createLogger(
  name: string,
  options?: { level?: LogLevel },
): Logger<unknown> {
  const level = options?.level ?? currentLevel;

  const logger = new Logger<unknown>({
    name,
    minLevel: LOG_LEVEL_MAP[level],
    type: "pretty",
    hideLogPositionForProduction: true,
    overwrite: {
      transportFormatted: writeToStderr,
    },
  });

  if (!options?.level) {
    loggers.add(logger);
  }
  return logger;
}

/**
 * Change the level of every logger that follows the process-wide level.
 * Loggers created with an explicit level keep it.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const logger of loggers) {
    logger.settings.minLevel = LOG_LEVEL_MAP[level];
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
