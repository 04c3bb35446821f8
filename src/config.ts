/**
 * Configuration management.
 * Reads from environment variables with defaults.
 */

import { homedir } from 'os';
import { join } from 'path';

/** Default data file in the user's home directory */
export function getDefaultDataFile(): string {
  return join(homedir(), '.timeclock', 'sessions.json');
}

export interface Config {
  /** Path to the sessions file (default: ~/.timeclock/sessions.json) */
  dataFile: string;

  /** Milliseconds between display refreshes while a session runs (default: 1000) */
  tickIntervalMs: number;
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const dataFile = env['TIMECLOCK_DATA_FILE'] || getDefaultDataFile();
  const tickIntervalMs = parseInt(env['TIMECLOCK_TICK_MS'] ?? '1000', 10);

  return {
    dataFile,
    tickIntervalMs: Number.isNaN(tickIntervalMs) || tickIntervalMs <= 0 ? 1000 : tickIntervalMs,
  };
}
