/**
 * Check if quiet mode is enabled
 */
export function isQuiet(): boolean {
  return process.env.QUIET === 'true';
}

/**
 * Check if debug mode is enabled
 */
export function isDebug(): boolean {
  return process.env.DEBUG === 'true';
}

/**
 * Print message in normal mode (suppressed in quiet mode)
 */
export function normalLog(...args: unknown[]): void {
  if (!isQuiet()) {
    console.log(...args);
  }
}

/**
 * Print minimal output for scripts (always shown, even in quiet mode)
 */
export function outputResult(data: string): void {
  console.log(data);
}

/**
 * Print a value as indented JSON
 */
export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
