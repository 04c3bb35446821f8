/**
 * Prefixes diagnostic console output with timestamps.
 * console.log is left alone so command output stays clean.
 */

function formatTimestamp(): string {
  return new Date().toISOString();
}

let installed = false;

/**
 * Install timestamp prefixes on console.warn and console.error.
 * Calling it again has no further effect.
 */
export function installTimestampLogging(): void {
  if (installed) return;
  installed = true;

  const originalError = console.error;
  const originalWarn = console.warn;

  console.error = (...args: unknown[]) => {
    originalError(`[${formatTimestamp()}]`, ...args);
  };

  console.warn = (...args: unknown[]) => {
    originalWarn(`[${formatTimestamp()}]`, ...args);
  };
}
