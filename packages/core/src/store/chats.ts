import { ChatAmbiguousError, ChatNotFoundError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { OWNER_CONTACT_ID, type MessageStore } from "./database.js";
import type { Chat, ChatSelector } from "./types.js";

const log = createLogger("chats");

const LIST_CHATS_SQL = `
  SELECT ChatInfo.ChatID AS chatId,
         ChatInfo.Name AS chatName,
         COALESCE(Contact.Name, Contact.ClientName) AS contact
  FROM ChatInfo
  LEFT JOIN ChatRelation
         ON ChatRelation.ChatID = ChatInfo.ChatID
        AND ChatRelation.ContactID != ?
  LEFT JOIN Contact ON Contact.ContactID = ChatRelation.ContactID
  ORDER BY ChatInfo.ChatID
`;

interface ChatRow {
  chatId: number;
  chatName: string | null;
  contact: string | null;
}

/**
 * Every chat in the store with its participants, ordered by id.
 */
export function listChats(store: MessageStore): Chat[] {
  log.debug("Listing chats");
  const rows = store.db.prepare(LIST_CHATS_SQL).all(OWNER_CONTACT_ID) as ChatRow[];

  const byId = new Map<number, { chatName: string | null; contacts: string[] }>();
  for (const row of rows) {
    let entry = byId.get(row.chatId);
    if (!entry) {
      entry = { chatName: row.chatName, contacts: [] };
      byId.set(row.chatId, entry);
    }
    if (row.contact) {
      entry.contacts.push(row.contact);
    }
  }

  return [...byId].map(([id, { chatName, contacts }]) => {
    const participants = [...contacts].sort((a, b) => a.localeCompare(b));
    const ownName = chatName?.trim();
    return {
      id,
      name: ownName ? ownName : participants.join(", "),
      participants,
    };
  });
}

/**
 * Find exactly one chat for the selector.
 * Names match case-insensitively after trimming; ids match exactly.
 */
export function resolveChat(store: MessageStore, selector: ChatSelector): Chat {
  const chats = listChats(store);

  if (selector.by === "id") {
    const chat = chats.find((c) => c.id === selector.id);
    if (!chat) {
      throw new ChatNotFoundError(`No chat with id ${selector.id}`);
    }
    return chat;
  }

  const wanted = normalizeName(selector.name);
  const matches = chats.filter((c) => normalizeName(c.name) === wanted);

  if (matches.length === 0) {
    throw new ChatNotFoundError(`No chat named "${selector.name.trim()}"`);
  }
  if (matches.length > 1) {
    const ids = matches.map((c) => c.id);
    throw new ChatAmbiguousError(
      `Chat name "${selector.name.trim()}" matches ${matches.length} chats (ids ${ids.join(", ")}); use --chat-id`,
      ids,
    );
  }

  const [chat] = matches;
  if (!chat) {
    throw new ChatNotFoundError(`No chat named "${selector.name.trim()}"`);
  }
  return chat;
}

function normalizeName(name: string): string {
  return name.trim().toLocaleLowerCase();
}
