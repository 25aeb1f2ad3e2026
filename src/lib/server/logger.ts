import type { LogLevel } from './env';

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

/**
 * Console logger that prefixes every line with `[scope]` and drops anything
 * below `level`.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = ORDER[level];
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (ORDER.debug >= threshold) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (ORDER.info >= threshold) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (ORDER.warn >= threshold) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (ORDER.error >= threshold) console.error(`${prefix} ${message}`, ...details);
    },
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
