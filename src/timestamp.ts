import { Timestamp, ValidationError } from './types';

const MINUTE_MS = 60 * 1000;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|([+-])(\d{2}):?(\d{2}))$/;

/**
 * Parse an ISO-8601 timestamp that carries a UTC offset.
 * Text without an offset is rejected: local wall-clock time alone is ambiguous.
 */
export function parseTimestamp(text: string): Timestamp {
  const match = ISO_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(`Invalid timestamp "${text}": expected ISO-8601 with a UTC offset`);
  }

  const [, year, month, day, hour, minute, second, fraction, zone, sign, offH, offM] = match;

  let offsetMinutes = 0;
  if (zone !== 'Z') {
    const magnitude = Number(offH) * 60 + Number(offM);
    if (Number(offM) > 59 || magnitude > 18 * 60) {
      throw new ValidationError(`Invalid timestamp "${text}": offset out of range`);
    }
    offsetMinutes = sign === '-' ? -magnitude : magnitude;
  }

  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  const wallClock = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis
  );

  // Date.UTC rolls over out-of-range fields; a mismatch means the text named an impossible time
  const check = new Date(wallClock);
  if (
    check.getUTCFullYear() !== Number(year) ||
    check.getUTCMonth() !== Number(month) - 1 ||
    check.getUTCDate() !== Number(day) ||
    check.getUTCHours() !== Number(hour) ||
    check.getUTCMinutes() !== Number(minute) ||
    check.getUTCSeconds() !== Number(second)
  ) {
    throw new ValidationError(`Invalid timestamp "${text}": no such date or time`);
  }

  return {
    epochMs: wallClock - offsetMinutes * MINUTE_MS,
    // avoid -0 for "-00:00"
    offsetMinutes: offsetMinutes || 0,
  };
}

/**
 * Format as second-precision ISO-8601 in the timestamp's own offset,
 * e.g. 2024-01-02T00:30:00-05:00
 */
export function formatTimestamp(ts: Timestamp): string {
  return `${formatWallClock(ts, 'T')}${formatOffset(ts.offsetMinutes)}`;
}

/**
 * Format the local wall-clock time without offset, e.g. 2024-01-02 00:30:00
 */
export function formatWallClock(ts: Timestamp, separator = ' '): string {
  const local = new Date(Math.floor(ts.epochMs / 1000) * 1000 + ts.offsetMinutes * MINUTE_MS);
  const date = [
    local.getUTCFullYear(),
    pad(local.getUTCMonth() + 1),
    pad(local.getUTCDate()),
  ].join('-');
  const time = [
    pad(local.getUTCHours()),
    pad(local.getUTCMinutes()),
    pad(local.getUTCSeconds()),
  ].join(':');
  return `${date}${separator}${time}`;
}

/**
 * The machine's current instant, truncated to whole seconds and tagged with the
 * machine's local offset at that instant.
 */
export function currentTimestamp(date: Date = new Date()): Timestamp {
  const offset = date.getTimezoneOffset();
  return {
    epochMs: Math.floor(date.getTime() / 1000) * 1000,
    offsetMinutes: offset === 0 ? 0 : -offset,
  };
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const magnitude = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(magnitude / 60))}:${pad(magnitude % 60)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
