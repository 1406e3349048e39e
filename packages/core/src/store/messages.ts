import { createLogger } from "../infra/logger.js";
import type { MessageStore } from "./database.js";
import type { Message, TimeRange } from "./types.js";

const log = createLogger("messages");

const SELECT_MESSAGES_SQL = `
  SELECT Events.EventID AS id,
         Events.ChatID AS chatId,
         Events.TimeStamp AS timestamp,
         COALESCE(Contact.Name, Contact.ClientName) AS sender,
         Messages.Type AS type,
         Messages.Body AS body,
         Messages.Subject AS subject,
         Messages.Info AS info,
         Messages.Duration AS duration,
         Messages.StickerID AS stickerId
  FROM Events
  JOIN Messages ON Messages.EventID = Events.EventID
  LEFT JOIN Contact ON Contact.ContactID = Events.ContactID
`;

interface MessageRow {
  id: number;
  chatId: number;
  timestamp: number;
  sender: string | null;
  type: number | null;
  body: unknown;
  subject: unknown;
  info: unknown;
  duration: number | null;
  stickerId: number | null;
}

/**
 * Messages of one chat, ascending by time, within `[range.start, range.end)`.
 */
export function fetchMessages(
  store: MessageStore,
  chatId: number,
  range: TimeRange = {},
): Message[] {
  const filters = ["Events.ChatID = @chatId"];
  const params: Record<string, number> = { chatId };

  if (range.start !== undefined) {
    filters.push("Events.TimeStamp >= @start");
    params.start = range.start;
  }
  if (range.end !== undefined) {
    filters.push("Events.TimeStamp < @end");
    params.end = range.end;
  }

  const sql =
    `${SELECT_MESSAGES_SQL} WHERE ${filters.join(" AND ")}` +
    " ORDER BY Events.TimeStamp, Events.EventID";
  log.debug(sql.replace(/\s+/g, " ").trim(), params);

  const rows = store.db.prepare(sql).all(params) as MessageRow[];
  return rows.map(toMessage);
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    chatId: row.chatId,
    timestamp: row.timestamp,
    sender: row.sender ?? "",
    type: row.type ?? 0,
    body: textOrEmpty(row.body),
    subject: textOrNull(row.subject),
    info: textOrNull(row.info),
    duration: row.duration,
    stickerId: row.stickerId,
  };
}

// Blob or numeric bodies are not text.
function textOrEmpty(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function textOrNull(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}
