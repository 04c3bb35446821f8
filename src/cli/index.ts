#!/usr/bin/env node
/**
 * timeclock CLI
 *
 * Commands: start, stop, toggle, status, list, delete, export
 */

import { Command } from 'commander';
import { loadConfig } from '../config';
import { SessionController } from '../controller';
import { installTimestampLogging } from '../logger';
import { SessionStore } from '../session-store';
import { SessionFile } from '../storage';
import { StorageCorruptError, TimeClockError } from '../types';
import {
  CliContext,
  deleteCommand,
  exportCommand,
  listCommand,
  startCommand,
  statusCommand,
  stopCommand,
  toggleCommand,
  watchStatus,
} from './commands';

installTimestampLogging();

const config = loadConfig();
const program = new Command();

program
  .name('timeclock')
  .description('Track work sessions and their totals')
  .version('0.1.0')
  .option('--data-file <path>', 'Path to the sessions file', config.dataFile)
  .option('--recover', 'Move a corrupt sessions file aside and start fresh');

function openController(): SessionController {
  const options = program.opts<{ dataFile: string; recover?: boolean }>();
  const file = new SessionFile(options.dataFile);
  const store = new SessionStore(file);

  try {
    store.load();
  } catch (error) {
    if (!(error instanceof StorageCorruptError) || !options.recover) {
      throw error;
    }
    const movedTo = file.quarantine();
    console.warn(`${error.message}; moved it to ${movedTo} and started fresh`);
    store.load();
  }

  return new SessionController(store);
}

async function run(action: (ctx: CliContext) => Promise<void> | void): Promise<void> {
  try {
    await action({
      controller: openController(),
      write: (line) => process.stdout.write(`${line}\n`),
    });
  } catch (error) {
    if (error instanceof TimeClockError) {
      console.error(`Error: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

program
  .command('start [note...]')
  .description('Start a session')
  .action(async (note: string[]) => {
    await run((ctx) => startCommand(ctx, note));
  });

program
  .command('stop')
  .description('Stop the running session')
  .action(async () => {
    await run((ctx) => stopCommand(ctx));
  });

program
  .command('toggle [note...]')
  .description('Start a session, or stop the running one')
  .action(async (note: string[]) => {
    await run((ctx) => toggleCommand(ctx, note));
  });

program
  .command('status')
  .description("Show whether a session is running, today's total and the all-time total")
  .option('-w, --watch', 'Keep printing while a session runs, until interrupted')
  .action(async (options: { watch?: boolean }) => {
    await run(async (ctx) => {
      statusCommand(ctx);
      if (options.watch) {
        const abort = new AbortController();
        process.once('SIGINT', () => abort.abort());
        await watchStatus(ctx, config.tickIntervalMs, abort.signal);
      }
    });
  });

program
  .command('list')
  .description('List all sessions')
  .action(async () => {
    await run((ctx) => listCommand(ctx));
  });

program
  .command('delete <row...>')
  .description('Delete sessions by the row numbers shown by list')
  .action(async (rows: string[]) => {
    await run((ctx) => deleteCommand(ctx, rows));
  });

program
  .command('export')
  .description('Export sessions as CSV')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action(async (options: { output?: string }) => {
    await run((ctx) => exportCommand(ctx, options));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
