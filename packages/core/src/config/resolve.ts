import { InvalidArgumentError } from "../infra/errors.js";
import { isLogLevel, type LogLevel } from "../infra/logger.js";
import type { ChatSelector, TimeRange } from "../store/types.js";
import { parseBound, resolveTimeZone } from "../time/zone.js";
import { CliOptionsSchema, OutputFormatSchema, SessionGapSchema } from "./schema.js";
import type { ChatlogConfig, CliOptions, ExportOptions } from "./types.js";

export const ENV_TIMEZONE = "CHATLOG_TZ";
export const ENV_LOG_LEVEL = "CHATLOG_LOG_LEVEL";

type Env = Readonly<Record<string, string | undefined>>;

function getEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return value.trim();
}

export function parseCliOptions(raw: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(
      `Invalid option ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown"}`,
    );
  }
  return parsed.data;
}

/**
 * Merge flags, environment and the defaults file (in that order of
 * precedence) into validated export options.
 */
export function resolveOptions(
  dbPath: string,
  flags: CliOptions,
  env: Env = {},
  fileConfig: ChatlogConfig = {},
): ExportOptions {
  if (!dbPath.trim()) {
    throw new InvalidArgumentError("A database path is required");
  }

  const selector = resolveSelector(flags.chat, flags.chatId);
  const listChats = flags.listChats === true;
  if (!listChats && !selector) {
    throw new InvalidArgumentError(
      "No chat selected: pass --chat <name> or --chat-id <id> (use --list-chats to see them)",
    );
  }

  const timeZone = resolveTimeZone(
    flags.timezone ?? getEnv(env, ENV_TIMEZONE) ?? fileConfig.timezone,
  );
  const range = resolveRange(flags.from, flags.to, timeZone);
  const gapMinutes =
    flags.session !== undefined ? parseSessionGap(flags.session) : fileConfig.session;

  const format = flags.format ?? fileConfig.format ?? "plain";
  const formatResult = OutputFormatSchema.safeParse(format);
  if (!formatResult.success) {
    throw new InvalidArgumentError(`Unknown output format "${format}" (expected plain or markdown)`);
  }

  return {
    dbPath,
    listChats,
    selector,
    range,
    timeZone,
    gapMinutes,
    format: formatResult.data,
    describeMedia: flags.media ?? fileConfig.media ?? false,
    logLevel: resolveLogLevel(flags.verbose, env, fileConfig),
  };
}

function resolveSelector(name?: string, id?: string): ChatSelector | undefined {
  if (name !== undefined && id !== undefined) {
    throw new InvalidArgumentError("--chat and --chat-id cannot be used together");
  }
  if (id !== undefined) {
    if (!/^\d+$/.test(id.trim())) {
      throw new InvalidArgumentError(`Invalid chat id "${id}": expected a whole number`);
    }
    return { by: "id", id: Number(id.trim()) };
  }
  if (name !== undefined) {
    if (!name.trim()) {
      throw new InvalidArgumentError("--chat needs a non-empty name");
    }
    return { by: "name", name };
  }
  return undefined;
}

function resolveRange(from: string | undefined, to: string | undefined, zone: string): TimeRange {
  const range: TimeRange = {};
  if (from !== undefined) range.start = parseBound(from, zone, "from");
  if (to !== undefined) range.end = parseBound(to, zone, "to");

  if (range.start !== undefined && range.end !== undefined && range.start > range.end) {
    throw new InvalidArgumentError(`--from (${from}) is after --to (${to})`);
  }
  return range;
}

export function parseSessionGap(raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+(\.\d+)?$/.test(trimmed)) {
    throw new InvalidArgumentError(
      `Invalid --session "${raw}": session gap must be a number of minutes`,
    );
  }
  const result = SessionGapSchema.safeParse(Number(trimmed));
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid --session "${raw}": ${result.error.issues[0]?.message ?? "invalid session gap"}`,
    );
  }
  return result.data;
}

function resolveLogLevel(verbose: boolean | undefined, env: Env, fileConfig: ChatlogConfig): LogLevel {
  if (verbose) return "debug";
  const fromEnv = getEnv(env, ENV_LOG_LEVEL);
  if (fromEnv !== undefined) {
    if (!isLogLevel(fromEnv)) {
      throw new InvalidArgumentError(`Invalid ${ENV_LOG_LEVEL} "${fromEnv}"`);
    }
    return fromEnv;
  }
  return fileConfig.logging?.level ?? "warn";
}
