import type { z } from "zod";
import type { LogLevel } from "../infra/logger.js";
import type { OutputFormat } from "../render/transcript.js";
import type { ChatSelector, TimeRange } from "../store/types.js";
import type { ChatlogConfigSchema, CliOptionsSchema } from "./schema.js";

export type ChatlogConfig = z.infer<typeof ChatlogConfigSchema>;
export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Everything one run needs, resolved once at startup.
 */
export interface ExportOptions {
  dbPath: string;
  listChats: boolean;
  selector?: ChatSelector;
  range: TimeRange;
  /** Explicit zone name, never "local". */
  timeZone: string;
  gapMinutes?: number;
  format: OutputFormat;
  describeMedia: boolean;
  logLevel: LogLevel;
}
