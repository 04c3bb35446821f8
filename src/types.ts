/**
 * An instant together with the UTC offset it was recorded in.
 * The offset decides which local day the instant belongs to.
 */
export interface Timestamp {
  /** Milliseconds since the Unix epoch */
  readonly epochMs: number;
  /** Minutes east of UTC (e.g. -300 for -05:00) */
  readonly offsetMinutes: number;
}

/**
 * A work session: a half-open interval with an optional note.
 */
export interface Session {
  /** Identity assigned when the session is created or loaded; never persisted */
  readonly id: string;
  readonly start: Timestamp;
  /** null while the session is running */
  readonly end: Timestamp | null;
  readonly note: string;
  /** Record fields this version does not know about, written back unchanged */
  readonly extra: Readonly<Record<string, unknown>>;
}

/**
 * Engine state, derived from the session list
 */
export type EngineState = 'idle' | 'running';

/**
 * Aggregates computed from a session list at a given instant
 */
export interface Totals {
  todaySeconds: number;
  totalSeconds: number;
}

/**
 * One row of the export projection
 */
export interface ExportRow {
  start: string;
  end: string | null;
  /** null while the session is running */
  durationSeconds: number | null;
  note: string;
}

/**
 * Base error class for the time clock
 */
export class TimeClockError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when starting while a session is already running
 */
export class AlreadyRunningError extends TimeClockError {}

/**
 * Thrown when stopping while no session is running
 */
export class NotRunningError extends TimeClockError {}

/**
 * Thrown when reading, writing or renaming the data file fails
 */
export class StorageIOError extends TimeClockError {}

/**
 * Thrown when the data file exists but is not a valid session collection
 */
export class StorageCorruptError extends TimeClockError {}

/**
 * Thrown when caller input is invalid
 */
export class ValidationError extends TimeClockError {}
