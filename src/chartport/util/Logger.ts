/**
 * Logger.ts - Diagnostics on stderr
 */

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string, debug: boolean): Logger {
  const prefix = `[chartport:${scope}]`;
  return {
    debug(message: string): void {
      if (debug) {
        console.warn(`${prefix} ${message}`);
      }
    },
    warn(message: string): void {
      console.warn(`${prefix} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug(): void {},
  warn(): void {},
};
