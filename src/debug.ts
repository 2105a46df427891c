export let DEBUG = false; // Enable to trace tween lifecycle and path construction

export function setDebug(value: boolean): void {
  DEBUG = value;
}

export function debugLog(...args: unknown[]): void {
  if (DEBUG) {
    console.log(...args);
  }
}

/**
 * Non-fatal configuration warnings. Always printed, regardless of DEBUG.
 */
export function warn(source: string, message: string): void {
  console.warn(`${source}: ${message}`);
}
