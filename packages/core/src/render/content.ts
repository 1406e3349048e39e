import { lookup } from "mime-types";
import { z } from "zod";
import type { Message } from "../store/types.js";

export const TEXT_TYPES: ReadonlySet<number> = new Set([1, 15]);
export const URL_TYPE = 9;

export const MEDIA_TYPE_LABELS: Readonly<Record<number, string>> = {
  2: "image",
  3: "video",
  4: "sticker",
  6: "voice mail",
  7: "instant video",
  11: "audio",
};

const MessageInfoSchema = z
  .object({
    fileInfo: z
      .object({
        FileName: z.string().optional(),
        Duration: z.number().optional(),
      })
      .passthrough()
      .nullish(),
    ivmInfo: z.record(z.unknown()).nullish(),
  })
  .passthrough();

type MessageInfo = z.infer<typeof MessageInfoSchema>;

function parseInfo(raw: string | null): MessageInfo | undefined {
  if (!raw) return undefined;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = MessageInfoSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

export function formatDuration(ms: number): string {
  return `${Math.trunc(ms / 1000)} seconds`;
}

/**
 * Text of a message. Non-text messages have an empty body unless
 * `describeMedia` is set, in which case they render a short descriptor.
 */
export function messageContent(message: Message, describeMedia = false): string {
  if (TEXT_TYPES.has(message.type)) {
    return message.body.trim();
  }
  if (message.type === URL_TYPE) {
    const url = message.body.trim();
    return url || (describeMedia ? "_<URL not available>_" : "");
  }
  return describeMedia ? describeMediaMessage(message) : "";
}

/**
 * `Duration` (ms) becomes `<n> seconds`; other scalar fields render as `key=value`.
 */
function describeInstantVideo(
  ivmInfo: Record<string, unknown> | null | undefined,
  fallbackDuration: number | null,
): string[] {
  const details: string[] = [];
  const duration = ivmInfo?.Duration;
  if (typeof duration === "number") {
    details.push(formatDuration(duration));
  } else if (fallbackDuration !== null) {
    details.push(formatDuration(fallbackDuration));
  }
  for (const [key, value] of Object.entries(ivmInfo ?? {})) {
    if (key === "Duration") continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      details.push(`${key}=${value}`);
    }
  }
  return details;
}

export function describeMediaMessage(message: Message): string {
  const info = parseInfo(message.info);
  const fileName = info?.fileInfo?.FileName;

  let label = MEDIA_TYPE_LABELS[message.type] ?? `message type ${message.type}`;
  if (fileName) {
    const mimeType = lookup(fileName);
    if (mimeType) {
      label = mimeType.split("/")[0] ?? label;
    }
  }

  const details: string[] = [];
  if (fileName) details.push(fileName);

  if (label === "sticker" && message.stickerId !== null) {
    details.push(`#${message.stickerId}`);
  } else if (label === "voice mail" && message.duration !== null) {
    details.push(formatDuration(message.duration));
  } else if (label === "instant video") {
    details.push(...describeInstantVideo(info?.ivmInfo, message.duration));
  } else if (label === "audio") {
    const duration = info?.fileInfo?.Duration ?? message.duration;
    if (duration !== null && duration !== undefined) {
      details.push(formatDuration(duration));
    }
  }

  const descriptor = `_<${label}${details.length > 0 ? `: ${details.join(", ")}` : ""}>_`;
  return message.subject ? `${descriptor} ${message.subject.trim()}` : descriptor;
}
