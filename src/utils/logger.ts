export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  debug: boolean;
}

function stamp(level: string, message: string): string {
  return `${new Date().toISOString()} - ${level} - ${message}`;
}

/**
 * Console logger. Debug lines are dropped unless debug mode is on.
 */
export function createLogger(options: LoggerOptions): Logger {
  return {
    debug(message, ...details) {
      if (options.debug) {
        console.debug(stamp('DEBUG', message), ...details);
      }
    },
    info(message, ...details) {
      console.info(stamp('INFO', message), ...details);
    },
    warn(message, ...details) {
      console.warn(stamp('WARNING', message), ...details);
    },
    error(message, ...details) {
      console.error(stamp('ERROR', message), ...details);
    },
  };
}
