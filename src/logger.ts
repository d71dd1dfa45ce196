/**
 * Logger
 *
 * Level-gated console logging. Components accept any object with this shape,
 * so tests can pass a recording logger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a console logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = 'info', scope = 'plant'): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (at: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[at] < threshold) {
      return;
    }
    const line = `[${scope}] ${at.toUpperCase()} ${message}`;
    const args: unknown[] = context ? [line, context] : [line];
    switch (at) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
