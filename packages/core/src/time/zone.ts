import { DateTime } from "luxon";
import { InvalidArgumentError } from "../infra/errors.js";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";
export const DATE_FORMAT = "yyyy-MM-dd";
export const TIME_FORMAT = "HH:mm:ss";

const OFFSET_RE = /^(?:utc|gmt)?\s*([+-])(\d{1,2})(?::?(\d{2}))?$/i;
const DATE_LAYOUT = "yyyy-MM-dd";

/** Accepted `--from`/`--to` layouts; only the first is date-only. */
const BOUND_LAYOUTS = [
  DATE_LAYOUT,
  "yyyy-MM-dd'T'HH:mm",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd HH:mm:ss",
] as const;

/**
 * Resolve a zone argument to the name luxon uses for it. IANA names, `UTC`
 * and fixed offsets (`+02:00`, `UTC+2`, `-0530`) are accepted. Without an
 * argument the process's local zone is resolved once and returned by name.
 */
export function resolveTimeZone(input?: string): string {
  const raw = input?.trim();
  if (!raw) {
    return DateTime.local().zoneName;
  }

  const offset = OFFSET_RE.exec(raw);
  const candidate = offset
    ? `UTC${offset[1]}${Number(offset[2])}:${offset[3] ?? "00"}`
    : raw;

  const probe = DateTime.now().setZone(candidate);
  if (!probe.isValid) {
    throw new InvalidArgumentError(`Unknown time zone "${raw}"`);
  }
  return probe.zoneName;
}

export type BoundEdge = "from" | "to";

/**
 * Parse a `--from`/`--to` value in `zone` to epoch milliseconds.
 * A date-only `to` covers the whole day, so it resolves to the next midnight.
 */
export function parseBound(text: string, zone: string, edge: BoundEdge): number {
  const raw = text.trim();

  for (const layout of BOUND_LAYOUTS) {
    const parsed = DateTime.fromFormat(raw, layout, { zone });
    if (!parsed.isValid) continue;

    if (edge === "to" && layout === DATE_LAYOUT) {
      return parsed.startOf("day").plus({ days: 1 }).toMillis();
    }
    return parsed.toMillis();
  }

  throw new InvalidArgumentError(
    `Invalid --${edge} date "${text}": expected YYYY-MM-DD or YYYY-MM-DD HH:mm[:ss]`,
  );
}

export function formatTimestamp(
  epochMs: number,
  zone: string,
  format: string = TIMESTAMP_FORMAT,
): string {
  return DateTime.fromMillis(epochMs, { zone }).toFormat(format);
}
