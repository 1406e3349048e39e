export interface Timestamped {
  timestamp: number;
}

export interface SessionTagged<T> {
  item: T;
  /** 0-based position of the session in the stream. */
  sessionIndex: number;
  /** True for the first item of every session, including the very first. */
  startsSession: boolean;
}

const MINUTE_MS = 60_000;

/**
 * Tag each item of an ascending sequence with its session. A new session
 * starts when the gap to the previous item is at least `gapMinutes`.
 * Without `gapMinutes` everything stays in session 0.
 */
export function* segmentSessions<T extends Timestamped>(
  items: Iterable<T>,
  gapMinutes?: number,
): Generator<SessionTagged<T>> {
  const gapMs = gapMinutes === undefined ? undefined : gapMinutes * MINUTE_MS;
  let previous: number | undefined;
  let sessionIndex = 0;

  for (const item of items) {
    let startsSession = previous === undefined;
    if (previous !== undefined && gapMs !== undefined && item.timestamp - previous >= gapMs) {
      sessionIndex++;
      startsSession = true;
    }
    previous = item.timestamp;
    yield { item, sessionIndex, startsSession };
  }
}

/**
 * Group an ascending sequence into sessions.
 */
export function groupSessions<T extends Timestamped>(
  items: Iterable<T>,
  gapMinutes?: number,
): T[][] {
  const sessions: T[][] = [];
  for (const { item, startsSession } of segmentSessions(items, gapMinutes)) {
    const current = sessions[sessions.length - 1];
    if (startsSession || !current) {
      sessions.push([item]);
    } else {
      current.push(item);
    }
  }
  return sessions;
}

/**
 * Number of session breaks, i.e. consecutive gaps of at least `gapMinutes`.
 */
export function countSessionBreaks<T extends Timestamped>(
  items: Iterable<T>,
  gapMinutes?: number,
): number {
  let breaks = 0;
  for (const { sessionIndex } of segmentSessions(items, gapMinutes)) {
    breaks = sessionIndex;
  }
  return breaks;
}
