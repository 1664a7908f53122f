/**
 * Logging
 *
 * Components take a Logger argument instead of writing to a shared
 * global. The console logger prints with a `[tag]` prefix.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export function createConsoleLogger(
  tag: string,
  level: string = process.env.LOG_LEVEL || 'info',
): Logger {
  const verbose = level === 'debug';
  return {
    info: (message) => console.log(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    debug: (message) => {
      if (verbose) console.log(`[${tag}] ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};

/** Keeps every line in memory. */
export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }

  debug(message: string): void {
    this.lines.push(`debug: ${message}`);
  }
}
