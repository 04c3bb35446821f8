import { nanoid } from 'nanoid';
import { SessionFile } from './storage';
import { currentTimestamp, formatTimestamp } from './timestamp';
import {
  AlreadyRunningError,
  EngineState,
  NotRunningError,
  Session,
  Timestamp,
  ValidationError,
} from './types';

/**
 * Freeze a session and the timestamps it holds; the store hands these out as-is
 */
function freezeSession(session: Session): Session {
  return Object.freeze({
    ...session,
    start: Object.freeze({ ...session.start }),
    end: session.end ? Object.freeze({ ...session.end }) : null,
    extra: Object.freeze({ ...session.extra }),
  });
}

/**
 * Options for constructing a SessionStore
 */
export interface SessionStoreOptions {
  /** Source of the current instant; defaults to the machine clock */
  now?: () => Timestamp;
}

/**
 * Result of toggling the clock
 */
export interface ToggleResult {
  action: 'started' | 'stopped';
  session: Session;
}

/**
 * SessionStore owns the session list and keeps at most one session running.
 *
 * Every mutation is written to the SessionFile before the in-memory list is
 * replaced, so a failed write leaves both exactly as they were.
 */
export class SessionStore {
  private sessions: readonly Session[] = [];
  private readonly now: () => Timestamp;

  constructor(
    private readonly file: SessionFile,
    options: SessionStoreOptions = {}
  ) {
    this.now = options.now ?? (() => currentTimestamp());
  }

  // ============ Persistence ============

  /**
   * Replace the in-memory list with the file's contents
   */
  load(): readonly Session[] {
    this.sessions = Object.freeze(this.file.load().map(freezeSession));
    return this.sessions;
  }

  /**
   * Persist a full collection and adopt it as the current list
   */
  save(sessions: readonly Session[]): void {
    const runningCount = sessions.filter((session) => session.end === null).length;
    if (runningCount > 1) {
      throw new ValidationError(`Cannot save ${runningCount} running sessions; at most one is allowed`);
    }
    this.commit(sessions.map(freezeSession));
  }

  // ============ Lifecycle ============

  /**
   * Start a new session
   */
  start(note = ''): Session {
    const active = this.running();
    if (active) {
      throw new AlreadyRunningError(
        `Cannot start: a session has been running since ${formatTimestamp(active.start)}`
      );
    }

    const session = freezeSession({
      id: nanoid(),
      start: this.now(),
      end: null,
      note,
      extra: {},
    });
    this.commit([...this.sessions, session]);
    return session;
  }

  /**
   * Stop the running session and return it closed
   */
  stop(): Session {
    const active = this.running();
    if (!active) {
      throw new NotRunningError('No running session to stop');
    }

    const closed = freezeSession({ ...active, end: this.now() });
    this.commit(this.sessions.map((session) => (session.id === active.id ? closed : session)));
    return closed;
  }

  /**
   * Stop if running, otherwise start with the given note
   */
  toggle(note = ''): ToggleResult {
    if (this.running()) {
      return { action: 'stopped', session: this.stop() };
    }
    return { action: 'started', session: this.start(note) };
  }

  /**
   * Remove sessions by id. Unknown ids are ignored; nothing is written if none match.
   */
  delete(ids: Iterable<string>): Session[] {
    const doomed = new Set(ids);
    const removed = this.sessions.filter((session) => doomed.has(session.id));
    if (removed.length === 0) {
      return [];
    }

    this.commit(this.sessions.filter((session) => !doomed.has(session.id)));
    return removed;
  }

  // ============ Queries ============

  list(): readonly Session[] {
    return this.sessions;
  }

  running(): Session | null {
    return this.sessions.find((session) => session.end === null) ?? null;
  }

  state(): EngineState {
    return this.running() ? 'running' : 'idle';
  }

  currentTime(): Timestamp {
    return this.now();
  }

  private commit(next: Session[]): void {
    this.file.save(next);
    this.sessions = Object.freeze(next);
  }
}
