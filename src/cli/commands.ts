import { writeFileSync } from 'fs';
import { SessionController, Snapshot } from '../controller';
import { duration, exportRows } from '../time-arithmetic';
import { formatWallClock } from '../timestamp';
import { StorageIOError, ValidationError } from '../types';
import { formatDuration, toCsv } from './format';

/**
 * What every command needs: the serialization point and somewhere to print
 */
export interface CliContext {
  controller: SessionController;
  write: (line: string) => void;
}

function joinNote(parts: string[]): string {
  return parts.join(' ').trim();
}

export async function startCommand(ctx: CliContext, noteParts: string[]): Promise<void> {
  const note = joinNote(noteParts);
  const result = await ctx.controller.dispatch({ type: 'start', note });
  if (result.type !== 'start') return;
  ctx.write(`Started at ${formatWallClock(result.session.start)}${note ? ` (${note})` : ''}`);
}

export async function stopCommand(ctx: CliContext): Promise<void> {
  const result = await ctx.controller.dispatch({ type: 'stop' });
  if (result.type !== 'stop') return;
  const closed = result.session;
  ctx.write(`Stopped after ${formatDuration(duration(closed, ctx.controller.snapshot().now))}`);
}

export async function toggleCommand(ctx: CliContext, noteParts: string[]): Promise<void> {
  const result = await ctx.controller.dispatch({ type: 'toggle', note: joinNote(noteParts) });
  if (result.type !== 'toggle') return;
  const { action, session } = result.result;
  if (action === 'started') {
    ctx.write(`Started at ${formatWallClock(session.start)}`);
  } else {
    ctx.write(`Stopped after ${formatDuration(duration(session, ctx.controller.snapshot().now))}`);
  }
}

/**
 * Status lines: running state, today's total, all-time total
 */
export function formatStatus(snapshot: Snapshot): string[] {
  const state = snapshot.running
    ? `Running… (${formatDuration(duration(snapshot.running, snapshot.now))})`
    : 'Not running';
  return [
    state,
    `Today total: ${formatDuration(snapshot.todaySeconds)}`,
    `All-time total: ${formatDuration(snapshot.totalSeconds)}`,
  ];
}

export function statusCommand(ctx: CliContext): void {
  for (const line of formatStatus(ctx.controller.snapshot())) {
    ctx.write(line);
  }
}

/**
 * Print a status line on every tick until the signal aborts.
 * Returns at once when no session is running, since nothing would change.
 */
export function watchStatus(
  ctx: CliContext,
  intervalMs: number,
  signal: AbortSignal
): Promise<void> {
  return new Promise((resolve) => {
    if (ctx.controller.snapshot().state === 'idle') {
      resolve();
      return;
    }

    const stopTicker = ctx.controller.startTicker((snapshot) => {
      ctx.write(formatStatus(snapshot).join('  '));
    }, intervalMs);

    const finish = () => {
      stopTicker();
      resolve();
    };
    if (signal.aborted) {
      finish();
    } else {
      signal.addEventListener('abort', finish, { once: true });
    }
  });
}

export function listCommand(ctx: CliContext): void {
  const { sessions, now } = ctx.controller.snapshot();
  if (sessions.length === 0) {
    ctx.write('No sessions recorded');
    return;
  }

  const line = (cells: string[]) =>
    [cells[0].padStart(3), cells[1].padEnd(19), cells[2].padEnd(19), cells[3].padStart(9), cells[4]]
      .join('  ')
      .trimEnd();

  ctx.write(line(['#', 'Start', 'End', 'Duration', 'Note']));
  sessions.forEach((session, index) => {
    ctx.write(
      line([
        String(index + 1),
        formatWallClock(session.start),
        session.end ? formatWallClock(session.end) : '—',
        formatDuration(duration(session, now)),
        session.note,
      ])
    );
  });
}

/**
 * Delete by the 1-based row numbers shown by `list`
 */
export async function deleteCommand(ctx: CliContext, rows: string[]): Promise<void> {
  const { sessions } = ctx.controller.snapshot();
  const ids = rows.map((row) => {
    const position = /^\d+$/.test(row) ? Number(row) : NaN;
    if (!(position >= 1 && position <= sessions.length)) {
      throw new ValidationError(`No session at row "${row}"`);
    }
    return sessions[position - 1].id;
  });

  const result = await ctx.controller.dispatch({ type: 'delete', ids });
  if (result.type !== 'delete') return;
  ctx.write(`Deleted ${result.removed.length} session(s)`);
}

export function exportCommand(ctx: CliContext, options: { output?: string }): void {
  const csv = toCsv(exportRows(ctx.controller.snapshot().sessions));
  if (options.output) {
    try {
      writeFileSync(options.output, csv, 'utf-8');
    } catch (error) {
      throw new StorageIOError(`Failed to write ${options.output}: ${error}`, { cause: error });
    }
    ctx.write(`Saved: ${options.output}`);
  } else {
    ctx.write(csv.trimEnd());
  }
}
