// Storage
export { SessionFile } from './storage';

// Session store
export { SessionStore, SessionStoreOptions, ToggleResult } from './session-store';

// Serialized access for UI, tray and timers
export {
  SessionController,
  SessionCommand,
  CommandResult,
  Snapshot,
  SnapshotListener,
} from './controller';

// Time arithmetic
export {
  duration,
  dayStart,
  overlapSeconds,
  totalSeconds,
  daySeconds,
  todaySeconds,
  computeTotals,
  exportRows,
} from './time-arithmetic';

// Timestamps
export { parseTimestamp, formatTimestamp, formatWallClock, currentTimestamp } from './timestamp';

// Configuration and logging
export { loadConfig, getDefaultDataFile, Config } from './config';
export { installTimestampLogging } from './logger';

// Types
export {
  Timestamp,
  Session,
  EngineState,
  Totals,
  ExportRow,
  TimeClockError,
  AlreadyRunningError,
  NotRunningError,
  StorageIOError,
  StorageCorruptError,
  ValidationError,
} from './types';
