import { groupSessions, segmentSessions } from "../sessions/segment.js";
import type { Message } from "../store/types.js";
import { DATE_FORMAT, TIME_FORMAT, formatTimestamp } from "../time/zone.js";
import { messageContent } from "./content.js";

export type OutputFormat = "plain" | "markdown";

export interface RenderOptions {
  timeZone: string;
  gapMinutes?: number;
  format: OutputFormat;
  describeMedia: boolean;
}

export const SESSION_SEPARATOR = "";

/**
 * `[yyyy-MM-dd HH:mm:ss] sender: body`
 */
export function formatMessageLine(
  message: Message,
  timeZone: string,
  describeMedia = false,
): string {
  const when = formatTimestamp(message.timestamp, timeZone);
  return `[${when}] ${message.sender}: ${messageContent(message, describeMedia)}`;
}

export function renderTranscript(messages: readonly Message[], options: RenderOptions): string[] {
  return options.format === "markdown"
    ? renderMarkdown(messages, options)
    : renderPlain(messages, options);
}

function renderPlain(messages: readonly Message[], options: RenderOptions): string[] {
  const lines: string[] = [];
  for (const { item, sessionIndex, startsSession } of segmentSessions(
    messages,
    options.gapMinutes,
  )) {
    if (startsSession && sessionIndex > 0) {
      lines.push(SESSION_SEPARATOR);
    }
    lines.push(formatMessageLine(item, options.timeZone, options.describeMedia));
  }
  return lines;
}

/**
 * Sessions under a `## day` heading for the day each one starts on.
 * Without a gap every calendar day is one session.
 */
function renderMarkdown(messages: readonly Message[], options: RenderOptions): string[] {
  const dayOf = (m: Message) => formatTimestamp(m.timestamp, options.timeZone, DATE_FORMAT);
  const sessions =
    options.gapMinutes === undefined
      ? groupByDay(messages, dayOf)
      : groupSessions(messages, options.gapMinutes);

  const lines: string[] = [];
  let currentDay: string | undefined;
  for (const session of sessions) {
    const [first] = session;
    if (!first) continue;
    const day = dayOf(first);
    if (day !== currentDay) {
      lines.push(`## ${day}`, "");
      currentDay = day;
    }
    for (const message of session) {
      const when = formatTimestamp(message.timestamp, options.timeZone, TIME_FORMAT);
      const content = messageContent(message, options.describeMedia);
      lines.push(`[${when}] **${message.sender}**: ${content}`);
    }
    lines.push("");
  }
  return lines;
}

function groupByDay(messages: readonly Message[], dayOf: (m: Message) => string): Message[][] {
  const days: Message[][] = [];
  let currentDay: string | undefined;
  for (const message of messages) {
    const day = dayOf(message);
    const current = days[days.length - 1];
    if (day !== currentDay || !current) {
      days.push([message]);
      currentDay = day;
    } else {
      current.push(message);
    }
  }
  return days;
}
