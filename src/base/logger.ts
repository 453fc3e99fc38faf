/**
 * Logger
 *
 * Console-backed logger with a module prefix. Debug output is off unless
 * DEBUG=true or NODE_ENV=development, or the caller turns it on explicitly.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = Record<LogLevel, (...args: unknown[]) => void>;

export interface LoggerOptions {
  enableDebug?: boolean;
}

function debugFromEnv(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.DEBUG === 'true';
}

/**
 * Create a logger instance for a module
 */
export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const enableDebug = options.enableDebug ?? debugFromEnv();
  const logPrefix = prefix ? `[${prefix}]` : '';

  return {
    debug: (...args: unknown[]) => {
      if (enableDebug) {
        console.log(logPrefix, ...args);
      }
    },
    info: (...args: unknown[]) => {
      console.log(logPrefix, ...args);
    },
    warn: (...args: unknown[]) => {
      console.warn(logPrefix, ...args);
    },
    error: (...args: unknown[]) => {
      console.error(logPrefix, ...args);
    },
  };
}
