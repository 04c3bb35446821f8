import { SessionStore, ToggleResult } from './session-store';
import { computeTotals } from './time-arithmetic';
import { EngineState, Session, Timestamp } from './types';

/**
 * Requests a UI, tray or notifier may send to the engine
 */
export type SessionCommand =
  | { type: 'start'; note?: string }
  | { type: 'stop' }
  | { type: 'toggle'; note?: string }
  | { type: 'delete'; ids: string[] }
  | { type: 'shutdown' };

export type CommandResult =
  | { type: 'start'; session: Session }
  | { type: 'stop'; session: Session }
  | { type: 'toggle'; result: ToggleResult }
  | { type: 'delete'; removed: Session[] }
  | { type: 'shutdown'; session: Session | null };

/**
 * Everything a display needs, read at a single instant
 */
export interface Snapshot {
  now: Timestamp;
  state: EngineState;
  running: Session | null;
  sessions: readonly Session[];
  todaySeconds: number;
  totalSeconds: number;
}

export type SnapshotListener = (snapshot: Snapshot) => void;

/**
 * SessionController is the single point through which the store is mutated.
 *
 * Commands run one at a time in arrival order, whichever part of the
 * application sent them. A failing command rejects its own promise only.
 */
export class SessionController {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly store: SessionStore) {}

  dispatch(command: SessionCommand): Promise<CommandResult> {
    const result = this.queue.then(() => this.execute(command));
    // keep the chain alive after a rejection; the caller sees it through `result`
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  snapshot(): Snapshot {
    const now = this.store.currentTime();
    const sessions = this.store.list();
    const totals = computeTotals(sessions, now);
    return {
      now,
      state: this.store.state(),
      running: this.store.running(),
      sessions,
      todaySeconds: totals.todaySeconds,
      totalSeconds: totals.totalSeconds,
    };
  }

  /**
   * Emit a snapshot every `intervalMs` while a session is running.
   * Returns a function that stops the timer.
   */
  startTicker(listener: SnapshotListener, intervalMs = 1000): () => void {
    const timer = setInterval(() => {
      if (this.store.state() === 'running') {
        listener(this.snapshot());
      }
    }, intervalMs);
    return () => clearInterval(timer);
  }

  /**
   * Stop the running session, if any, before the application exits.
   * Commands queued earlier run first; the running check happens in turn.
   */
  async shutdown(): Promise<Session | null> {
    const result = await this.dispatch({ type: 'shutdown' });
    return result.type === 'shutdown' ? result.session : null;
  }

  private execute(command: SessionCommand): CommandResult {
    switch (command.type) {
      case 'start':
        return { type: 'start', session: this.store.start(command.note) };
      case 'stop':
        return { type: 'stop', session: this.store.stop() };
      case 'toggle':
        return { type: 'toggle', result: this.store.toggle(command.note) };
      case 'delete':
        return { type: 'delete', removed: this.store.delete(command.ids) };
      case 'shutdown':
        return { type: 'shutdown', session: this.store.running() ? this.store.stop() : null };
    }
  }
}
