import { Command, CommanderError } from "commander";
import { loadConfig } from "../config/loader.js";
import { parseCliOptions, resolveOptions } from "../config/resolve.js";
import { AppError } from "../infra/errors.js";
import { createLogger, setLogLevel } from "../infra/logger.js";
import { runExport } from "./export.js";

export const VERSION = "0.1.0";

/** Exit code for usage errors reported by the argument parser itself. */
const USAGE_EXIT_CODE = 2;

const log = createLogger("chatlog");

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  env: Readonly<Record<string, string | undefined>>;
}

export function processIO(): CliIO {
  return {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
  };
}

/**
 * A closed pipe on stdout (`chatlog db -c x | head`) ends the run quietly.
 * Any other stream error is rethrown.
 */
export function exitQuietlyOnEpipe(
  stream: NodeJS.EventEmitter,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  stream.on("error", (err: Error) => {
    if ("code" in err && err.code === "EPIPE") {
      exit(0);
      return;
    }
    throw err;
  });
}

function execute(dbPath: string, rawFlags: unknown, io: CliIO): number {
  try {
    const flags = parseCliOptions(rawFlags);
    const fileConfig = flags.config ? loadConfig(flags.config) : {};
    const options = resolveOptions(dbPath, flags, io.env, fileConfig);
    setLogLevel(options.logLevel);
    log.debug("Resolved options", options);

    for (const line of runExport(options)) {
      io.stdout(line);
    }
    return 0;
  } catch (err) {
    if (err instanceof AppError) {
      io.stderr(`error: ${err.message}`);
      return err.exitCode;
    }
    log.error(err);
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

export function createProgram(io: CliIO, onExit: (code: number) => void): Command {
  return new Command()
    .name("chatlog")
    .description("Extract messages from a Viber desktop message database")
    .version(VERSION)
    .argument("<db>", "path to the Viber database file")
    .option("-c, --chat <name>", "select the chat by its display name")
    .option("--chat-id <id>", "select the chat by its numeric id")
    .option("-l, --list-chats", "list chats and exit")
    .option("-f, --from <date>", "start date(-time) to filter from, inclusive")
    .option("-t, --to <date>", "end date(-time) to filter to, exclusive; a bare date includes that day")
    .option("-z, --timezone <zone>", "IANA zone or offset for parsing and display (default: local)")
    .option(
      "-s, --session <minutes>",
      "split the log into sessions separated by at least this many minutes of inactivity",
    )
    .option("--format <format>", "output layout: plain or markdown")
    .option("--media", "describe images, stickers and other non-text messages")
    .option("--no-media", "leave non-text messages empty")
    .option("--config <path>", "JSON or JSON5 file with default options")
    .option("-v, --verbose", "log debug output to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str.replace(/\n$/, "")),
      writeErr: (str) => io.stderr(str.replace(/\n$/, "")),
    })
    .action((dbPath: string, flags: unknown) => {
      onExit(execute(dbPath, flags, io));
    });
}

/**
 * Parse `argv` (without the node and script entries) and run the export.
 * Returns the process exit code.
 */
export function runCli(argv: readonly string[], io: CliIO = processIO()): number {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
    }
    throw err;
  }
  return exitCode;
}
