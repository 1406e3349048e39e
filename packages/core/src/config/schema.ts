import { z } from "zod";
import { LOG_LEVELS } from "../infra/logger.js";

const LogLevelSchema = z.enum(LOG_LEVELS);

export const OutputFormatSchema = z.enum(["plain", "markdown"]);

export const SessionGapSchema = z
  .number({ invalid_type_error: "session gap must be a number of minutes" })
  .int("session gap must be a whole number of minutes")
  .positive("session gap must be a positive number of minutes");

export const LoggingSchema = z.object({
  level: LogLevelSchema.default("warn"),
});

/**
 * Defaults file passed with `--config`. Every field is optional; flags and
 * environment variables override it.
 */
export const ChatlogConfigSchema = z
  .object({
    timezone: z.string().min(1).optional(),
    session: SessionGapSchema.optional(),
    format: OutputFormatSchema.optional(),
    media: z.boolean().optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

/** Flag values as commander hands them over. */
export const CliOptionsSchema = z.object({
  chat: z.string().optional(),
  chatId: z.string().optional(),
  listChats: z.boolean().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  timezone: z.string().optional(),
  session: z.string().optional(),
  format: z.string().optional(),
  media: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});
