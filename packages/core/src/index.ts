// Config
export { ChatlogConfigSchema, CliOptionsSchema, OutputFormatSchema } from "./config/schema.js";
export type { ChatlogConfig, CliOptions, ExportOptions } from "./config/types.js";
export { loadConfig } from "./config/loader.js";
export {
  parseCliOptions,
  parseSessionGap,
  resolveOptions,
  ENV_LOG_LEVEL,
  ENV_TIMEZONE,
} from "./config/resolve.js";

// Infrastructure
export { createLogger, setLogLevel, getLogLevel, isLogLevel, LOG_LEVELS } from "./infra/logger.js";
export type { LogLevel } from "./infra/logger.js";
export {
  AppError,
  InvalidArgumentError,
  StoreUnavailableError,
  ChatNotFoundError,
  ChatAmbiguousError,
  SchemaMismatchError,
} from "./infra/errors.js";

// Store
export { openStore, withStore, REQUIRED_SCHEMA, OWNER_CONTACT_ID } from "./store/database.js";
export type { MessageStore } from "./store/database.js";
export { listChats, resolveChat } from "./store/chats.js";
export { fetchMessages } from "./store/messages.js";
export type { Chat, ChatSelector, Message, TimeRange } from "./store/types.js";

// Time
export { resolveTimeZone, parseBound, formatTimestamp } from "./time/zone.js";
export type { BoundEdge } from "./time/zone.js";

// Sessions
export { segmentSessions, groupSessions, countSessionBreaks } from "./sessions/segment.js";
export type { SessionTagged, Timestamped } from "./sessions/segment.js";

// Rendering
export { renderTranscript, formatMessageLine, SESSION_SEPARATOR } from "./render/transcript.js";
export type { OutputFormat, RenderOptions } from "./render/transcript.js";
export { messageContent, describeMediaMessage, formatDuration } from "./render/content.js";

// CLI
export { runExport, formatChatList, noMessagesNotice } from "./cli/export.js";
export { runCli, createProgram, processIO, VERSION } from "./cli/program.js";
export type { CliIO } from "./cli/program.js";
