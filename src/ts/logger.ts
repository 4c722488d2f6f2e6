/**
 * Logger wrapper for consistent library logging
 */

const PREFIX = "[csvtable]";

let debugEnabled = process.env.CSVTABLE_DEBUG === "1" || process.env.CSVTABLE_DEBUG === "true";

/** Turn debug output on or off. */
export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export const logger = {
  info: (...args: unknown[]) => console.info(PREFIX, ...args),
  warn: (...args: unknown[]) => console.warn(PREFIX, ...args),
  error: (...args: unknown[]) => console.error(PREFIX, ...args),
  debug: (...args: unknown[]) => {
    if (debugEnabled) {
      console.debug(PREFIX, ...args);
    }
  },
};
