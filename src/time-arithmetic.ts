import { formatTimestamp } from './timestamp';
import { ExportRow, Session, Timestamp, Totals } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

/**
 * Whole seconds between two epoch values, truncated and never negative
 */
function clampedSeconds(fromMs: number, toMs: number): number {
  return Math.max(0, Math.trunc((toMs - fromMs) / 1000));
}

function endOrNow(session: Session, now: Timestamp): number {
  return (session.end ?? now).epochMs;
}

/**
 * Elapsed seconds of a session, using `now` for a running one.
 * A session whose end precedes its start (clock skew) lasts zero seconds.
 */
export function duration(session: Session, now: Timestamp): number {
  return clampedSeconds(session.start.epochMs, endOrNow(session, now));
}

/**
 * Midnight of the instant's local day, in the instant's own offset
 */
export function dayStart(instant: Timestamp): Timestamp {
  const offsetMs = instant.offsetMinutes * MINUTE_MS;
  const localMidnight = Math.floor((instant.epochMs + offsetMs) / DAY_MS) * DAY_MS;
  return {
    epochMs: localMidnight - offsetMs,
    offsetMinutes: instant.offsetMinutes,
  };
}

/**
 * Seconds of the session that fall inside [windowStart, windowEnd)
 */
export function overlapSeconds(
  session: Session,
  windowStart: Timestamp,
  windowEnd: Timestamp,
  now: Timestamp
): number {
  const from = Math.max(session.start.epochMs, windowStart.epochMs);
  const to = Math.min(endOrNow(session, now), windowEnd.epochMs);
  return clampedSeconds(from, to);
}

/**
 * Sum of all session durations
 */
export function totalSeconds(sessions: readonly Session[], now: Timestamp): number {
  let total = 0;
  for (const session of sessions) {
    total += duration(session, now);
  }
  return total;
}

/**
 * Seconds worked during the local day containing `day`.
 * Each session contributes only the part that overlaps that day.
 */
export function daySeconds(
  sessions: readonly Session[],
  day: Timestamp,
  now: Timestamp
): number {
  const windowStart = dayStart(day);
  const windowEnd: Timestamp = {
    epochMs: windowStart.epochMs + DAY_MS,
    offsetMinutes: windowStart.offsetMinutes,
  };

  let total = 0;
  for (const session of sessions) {
    total += overlapSeconds(session, windowStart, windowEnd, now);
  }
  return total;
}

/**
 * Seconds worked today, where "today" is the local day of `now`
 */
export function todaySeconds(sessions: readonly Session[], now: Timestamp): number {
  return daySeconds(sessions, now, now);
}

export function computeTotals(sessions: readonly Session[], now: Timestamp): Totals {
  return {
    todaySeconds: todaySeconds(sessions, now),
    totalSeconds: totalSeconds(sessions, now),
  };
}

/**
 * Project sessions into export rows. Running sessions have no end and no duration.
 */
export function exportRows(sessions: readonly Session[]): ExportRow[] {
  return sessions.map((session) => ({
    start: formatTimestamp(session.start),
    end: session.end ? formatTimestamp(session.end) : null,
    durationSeconds: session.end ? duration(session, session.end) : null,
    note: session.note,
  }));
}
