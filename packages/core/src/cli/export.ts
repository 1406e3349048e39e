import type { ExportOptions } from "../config/types.js";
import { InvalidArgumentError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { renderTranscript } from "../render/transcript.js";
import { listChats, resolveChat } from "../store/chats.js";
import { withStore } from "../store/database.js";
import { fetchMessages } from "../store/messages.js";
import type { Chat } from "../store/types.js";

const log = createLogger("export");

export const CHAT_LIST_HEADER = "chatID\tname\tparticipants";

export function formatChatList(chats: readonly Chat[]): string[] {
  return [
    CHAT_LIST_HEADER,
    ...chats.map((chat) => `${chat.id}\t${chat.name}\t${chat.participants.join(", ")}`),
  ];
}

export function noMessagesNotice(chat: Chat): string {
  return `No messages found in chat "${chat.name}".`;
}

/**
 * Run one export against the store and return the output lines. Nothing is
 * written here, so a failure anywhere leaves the output empty.
 */
export function runExport(options: ExportOptions): string[] {
  return withStore(options.dbPath, (store) => {
    if (options.listChats) {
      return formatChatList(listChats(store));
    }
    if (!options.selector) {
      throw new InvalidArgumentError("No chat selected");
    }

    const chat = resolveChat(store, options.selector);
    const messages = fetchMessages(store, chat.id, options.range);
    log.info(`Fetched ${messages.length} messages from chat ${chat.id} (${chat.name})`);

    if (messages.length === 0) {
      return [noMessagesNotice(chat)];
    }
    return renderTranscript(messages, {
      timeZone: options.timeZone,
      gapMinutes: options.gapMinutes,
      format: options.format,
      describeMedia: options.describeMedia,
    });
  });
}
