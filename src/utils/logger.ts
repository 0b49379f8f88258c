import { appConfig } from '../config';

export interface Logger {
  debug(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

interface LoggerOptions {
  debug?: boolean;
}

/**
 * Console logger with a `[scope]` prefix. Debug output is off unless
 * VITE_DEBUG_RECOMPUTE is set.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? appConfig.debugRecompute;
  const prefix = `[${scope}]`;

  const write = (sink: (...args: unknown[]) => void, message: string, details: unknown) => {
    if (details === undefined) {
      sink(`${prefix} ${message}`);
    } else {
      sink(`${prefix} ${message}`, details);
    }
  };

  return {
    debug(message, details) {
      if (debugEnabled) write(console.log, message, details);
    },
    warn(message, details) {
      write(console.warn, message, details);
    },
    error(message, details) {
      write(console.error, message, details);
    },
  };
}
